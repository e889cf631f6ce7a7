import { z } from 'zod';

// Amounts arrive as JSON numbers or decimal strings; the service formats them
const PriceSchema = z.union([
  z.number().nonnegative('Price must not be negative'),
  z.string().trim().regex(/^\d+(\.\d+)?$/, 'Price must be a decimal amount'),
]);

export const CreateItemSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
  description: z.string().nullish(),
  price: PriceSchema.nullish(),
});

export type CreateItemInput = z.infer<typeof CreateItemSchema>;

export const UpdateItemSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255).optional(),
  description: z.string().nullish(),
  price: PriceSchema.nullish(),
});

export type UpdateItemInput = z.infer<typeof UpdateItemSchema>;

export const ListItemsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(20),
  user_id: z.string().uuid().optional(),
});

export type ListItemsQuery = z.infer<typeof ListItemsQuerySchema>;

export const ItemResponseSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  description: z.string().nullable(),
  price: z.string().nullable(),
  userId: z.string().uuid(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type ItemResponse = z.infer<typeof ItemResponseSchema>;

export const ItemListResponseSchema = z.object({
  items: z.array(ItemResponseSchema),
  total: z.number().int(),
  page: z.number().int(),
  perPage: z.number().int(),
  hasNext: z.boolean(),
  hasPrev: z.boolean(),
});

export type ItemListResponse = z.infer<typeof ItemListResponseSchema>;
