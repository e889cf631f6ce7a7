/**
 * Items Domain
 */

export { DrizzleItemRepository } from './item-repository.js';
export type { ItemRepository } from './item-repository.js';

export {
  ItemService,
  normalizePrice,
  DEFAULT_PER_PAGE,
  MAX_PER_PAGE,
  MAX_NAME_LENGTH,
} from './item-service.js';

export type {
  Item,
  CreateItemData,
  UpdateItemData,
  ListItemsQuery,
  ItemListResult,
  CreateItemParams,
  UpdateItemParams,
  ListItemsParams,
  ItemResponse,
  ItemPage,
} from './item-types.js';

export { ItemError, ItemNotFoundError, InvalidItemError } from './item-errors.js';
