/**
 * Item Service
 *
 * Business rules for items: ownership on writes, price normalization and
 * page clamping. Reads are public.
 */

import { InvalidItemError, ItemNotFoundError } from './item-errors.js';
import type { ItemRepository } from './item-repository.js';
import type {
  CreateItemParams,
  Item,
  ItemPage,
  ItemResponse,
  ListItemsParams,
  UpdateItemData,
  UpdateItemParams,
} from './item-types.js';

export const DEFAULT_PER_PAGE = 20;
export const MAX_PER_PAGE = 100;
export const MAX_NAME_LENGTH = 255;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
// numeric(10, 2)
const PRICE_PATTERN = /^\d{1,8}(\.\d{1,2})?$/;

/**
 * Formats a price as a decimal string with two fractional digits.
 */
export function normalizePrice(value: string | number): string {
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (!PRICE_PATTERN.test(text)) {
    throw new InvalidItemError(
      'price must be a non-negative amount below 100000000 with at most 2 decimals'
    );
  }
  const [whole = '0', fraction = ''] = text.split('.');
  return `${Number(whole)}.${fraction.padEnd(2, '0')}`;
}

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new InvalidItemError('name is required');
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new InvalidItemError(`name must be at most ${MAX_NAME_LENGTH} characters`);
  }
  return trimmed;
}

function optionalPrice(value: string | number | null | undefined): string | null {
  return value === null || value === undefined ? null : normalizePrice(value);
}

export class ItemService {
  constructor(private itemRepo: ItemRepository) {}

  async createItem(params: CreateItemParams, ownerId: string): Promise<ItemResponse> {
    const item = await this.itemRepo.create({
      name: normalizeName(params.name),
      description: params.description ?? null,
      price: optionalPrice(params.price),
      userId: ownerId,
    });
    return this.mapToItemResponse(item);
  }

  /**
   * @throws {ItemNotFoundError}
   */
  async getItem(id: string): Promise<ItemResponse> {
    const item = UUID_PATTERN.test(id) ? await this.itemRepo.findById(id) : null;
    if (!item) {
      throw new ItemNotFoundError();
    }
    return this.mapToItemResponse(item);
  }

  /**
   * Public listing, newest first. Out-of-range paging falls back to defaults
   * instead of failing.
   */
  async listItems(params: ListItemsParams = {}): Promise<ItemPage> {
    const page =
      params.page !== undefined && Number.isInteger(params.page) && params.page >= 1
        ? params.page
        : 1;
    const perPage =
      params.perPage !== undefined &&
      Number.isInteger(params.perPage) &&
      params.perPage >= 1 &&
      params.perPage <= MAX_PER_PAGE
        ? params.perPage
        : DEFAULT_PER_PAGE;

    const { items, total } =
      params.userId !== undefined && !UUID_PATTERN.test(params.userId)
        ? { items: [], total: 0 }
        : await this.itemRepo.list({
            offset: (page - 1) * perPage,
            limit: perPage,
            ...(params.userId !== undefined ? { userId: params.userId } : {}),
          });

    const totalPages = Math.ceil(total / perPage);
    return {
      items: items.map((item) => this.mapToItemResponse(item)),
      total,
      page,
      perPage,
      totalPages,
      hasNext: page < totalPages,
      hasPrev: page > 1,
    };
  }

  /**
   * @throws {ItemNotFoundError} when the item is missing or owned by someone else
   */
  async updateItem(id: string, params: UpdateItemParams, ownerId: string): Promise<ItemResponse> {
    const patch: UpdateItemData = {};
    if (params.name !== undefined) {
      patch.name = normalizeName(params.name);
    }
    if (params.description !== undefined) {
      patch.description = params.description;
    }
    if (params.price !== undefined) {
      patch.price = optionalPrice(params.price);
    }

    const item = UUID_PATTERN.test(id) ? await this.itemRepo.updateOwned(id, ownerId, patch) : null;
    if (!item) {
      throw new ItemNotFoundError();
    }
    return this.mapToItemResponse(item);
  }

  /**
   * @throws {ItemNotFoundError} when the item is missing or owned by someone else
   */
  async deleteItem(id: string, ownerId: string): Promise<void> {
    const deleted = UUID_PATTERN.test(id) ? await this.itemRepo.deleteOwned(id, ownerId) : false;
    if (!deleted) {
      throw new ItemNotFoundError();
    }
  }

  private mapToItemResponse(item: Item): ItemResponse {
    return {
      id: item.id,
      name: item.name,
      description: item.description,
      price: item.price,
      userId: item.userId,
      createdAt: item.createdAt.toISOString(),
      updatedAt: item.updatedAt.toISOString(),
    };
  }
}
