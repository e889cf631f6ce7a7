/**
 * Item Domain Types
 *
 * Shapes passed between layers (HTTP → Service → Repository)
 */

export interface Item {
  id: string;
  name: string;
  description: string | null;
  /** Decimal string with two fractional digits, e.g. "19.90" */
  price: string | null;
  userId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateItemData {
  name: string;
  description: string | null;
  price: string | null;
  userId: string;
}

/**
 * Partial update. Absent keys are left unchanged; null clears a field.
 */
export interface UpdateItemData {
  name?: string;
  description?: string | null;
  price?: string | null;
}

export interface ListItemsQuery {
  offset: number;
  limit: number;
  userId?: string;
}

export interface ItemListResult {
  items: Item[];
  total: number;
}

export interface CreateItemParams {
  name: string;
  description?: string | null;
  price?: string | number | null;
}

export interface UpdateItemParams {
  name?: string;
  description?: string | null;
  price?: string | number | null;
}

export interface ListItemsParams {
  page?: number;
  perPage?: number;
  userId?: string;
}

export interface ItemResponse {
  id: string;
  name: string;
  description: string | null;
  price: string | null;
  userId: string;
  createdAt: string;
  updatedAt: string;
}

export interface ItemPage {
  items: ItemResponse[];
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}
