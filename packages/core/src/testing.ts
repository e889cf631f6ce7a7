/**
 * In-memory ItemRepository for tests. Newest-first ordering uses insertion
 * order to break createdAt ties.
 */
import { randomUUID } from 'node:crypto';
import type { ItemRepository } from './items/item-repository.js';
import type {
  CreateItemData,
  Item,
  ItemListResult,
  ListItemsQuery,
  UpdateItemData,
} from './items/item-types.js';

type StoredItem = Item & { sequence: number };

export class InMemoryItemRepository implements ItemRepository {
  private readonly rows = new Map<string, StoredItem>();
  private sequence = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateItemData): Promise<Item> {
    const timestamp = this.now();
    this.sequence += 1;
    const row: StoredItem = {
      ...data,
      id: randomUUID(),
      createdAt: timestamp,
      updatedAt: timestamp,
      sequence: this.sequence,
    };
    this.rows.set(row.id, row);
    return strip(row);
  }

  async findById(id: string): Promise<Item | null> {
    const row = this.rows.get(id);
    return row ? strip(row) : null;
  }

  async list(query: ListItemsQuery): Promise<ItemListResult> {
    const matching = Array.from(this.rows.values())
      .filter((row) => query.userId === undefined || row.userId === query.userId)
      .sort(
        (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.sequence - a.sequence
      );

    return {
      items: matching.slice(query.offset, query.offset + query.limit).map(strip),
      total: matching.length,
    };
  }

  async updateOwned(id: string, ownerId: string, data: UpdateItemData): Promise<Item | null> {
    const row = this.rows.get(id);
    if (!row || row.userId !== ownerId) {
      return null;
    }
    const next: StoredItem = { ...row, ...data, updatedAt: this.now() };
    this.rows.set(id, next);
    return strip(next);
  }

  async deleteOwned(id: string, ownerId: string): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.userId !== ownerId) {
      return false;
    }
    return this.rows.delete(id);
  }
}

function strip(row: StoredItem): Item {
  const { sequence: _sequence, ...item } = row;
  return item;
}
