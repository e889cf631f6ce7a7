import { relations } from 'drizzle-orm';
import { index, numeric, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const items = pgTable(
  'items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description'),
    price: numeric('price', { precision: 10, scale: 2 }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('items_user_id_idx').on(table.userId),
    createdAtIdx: index('items_created_at_idx').on(table.createdAt),
  })
);

export const itemsRelations = relations(items, ({ one }) => ({
  owner: one(users, {
    fields: [items.userId],
    references: [users.id],
  }),
}));

export type ItemRow = typeof items.$inferSelect;
export type NewItemRow = typeof items.$inferInsert;
