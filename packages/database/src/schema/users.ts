import { sql } from 'drizzle-orm';
import { boolean, pgTable, text, timestamp, uniqueIndex, uuid, varchar } from 'drizzle-orm/pg-core';

export const OAUTH_PROVIDERS = ['google', 'apple'] as const;

export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    email: varchar('email', { length: 255 }).notNull(),
    passwordHash: text('password_hash'),
    oauthProvider: varchar('oauth_provider', { length: 50, enum: OAUTH_PROVIDERS }),
    oauthId: varchar('oauth_id', { length: 255 }),
    displayName: varchar('display_name', { length: 255 }),
    avatarUrl: text('avatar_url'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    // Uniqueness only binds active rows; deactivated accounts keep their data.
    emailActiveUnique: uniqueIndex('users_email_active_unique')
      .on(sql`lower(${table.email})`)
      .where(sql`${table.isActive} = true`),
    oauthUnique: uniqueIndex('users_oauth_unique')
      .on(table.oauthProvider, table.oauthId)
      .where(sql`${table.isActive} = true`),
  })
);

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
