/**
 * Item Repository
 *
 * Data access layer for items. Ownership is enforced in the WHERE clause of
 * every write so a foreign item is indistinguishable from a missing one.
 */

import { type Database, type ItemRow, items } from '@commerce/database';
import { and, count, desc, eq } from 'drizzle-orm';
import type {
  CreateItemData,
  Item,
  ItemListResult,
  ListItemsQuery,
  UpdateItemData,
} from './item-types.js';

export interface ItemRepository {
  create(data: CreateItemData): Promise<Item>;
  findById(id: string): Promise<Item | null>;
  list(query: ListItemsQuery): Promise<ItemListResult>;
  updateOwned(id: string, ownerId: string, data: UpdateItemData): Promise<Item | null>;
  deleteOwned(id: string, ownerId: string): Promise<boolean>;
}

function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price,
    userId: row.userId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleItemRepository implements ItemRepository {
  constructor(private readonly db: Database) {}

  async create(data: CreateItemData): Promise<Item> {
    const [row] = await this.db.insert(items).values(data).returning();
    if (!row) {
      throw new Error('Item insert returned no row');
    }
    return toItem(row);
  }

  async findById(id: string): Promise<Item | null> {
    const [row] = await this.db.select().from(items).where(eq(items.id, id)).limit(1);
    return row ? toItem(row) : null;
  }

  /**
   * Newest first. Ties on created_at fall back to id for a stable order.
   */
  async list(query: ListItemsQuery): Promise<ItemListResult> {
    const filter = query.userId ? eq(items.userId, query.userId) : undefined;

    const [rows, totals] = await Promise.all([
      this.db
        .select()
        .from(items)
        .where(filter)
        .orderBy(desc(items.createdAt), desc(items.id))
        .limit(query.limit)
        .offset(query.offset),
      this.db.select({ total: count() }).from(items).where(filter),
    ]);

    return { items: rows.map(toItem), total: totals[0]?.total ?? 0 };
  }

  async updateOwned(id: string, ownerId: string, data: UpdateItemData): Promise<Item | null> {
    const [row] = await this.db
      .update(items)
      .set({ ...data, updatedAt: new Date() })
      .where(and(eq(items.id, id), eq(items.userId, ownerId)))
      .returning();
    return row ? toItem(row) : null;
  }

  async deleteOwned(id: string, ownerId: string): Promise<boolean> {
    const rows = await this.db
      .delete(items)
      .where(and(eq(items.id, id), eq(items.userId, ownerId)))
      .returning({ id: items.id });
    return rows.length > 0;
  }
}
