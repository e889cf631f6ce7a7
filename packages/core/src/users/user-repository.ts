/**
 * User Repository
 *
 * Postgres-backed AccountStore. Pure drizzle operations with no business logic;
 * every finder is scoped to active rows.
 */

import {
  type AccountRecord,
  type AccountStore,
  type NewAccount,
  type OAuthProviderId,
  UniqueViolationError,
} from '@commerce/auth-core';
import { type Database, type UserRow, uniqueViolationConstraint, users } from '@commerce/database';
import { and, eq, sql } from 'drizzle-orm';

function toAccountRecord(row: UserRow): AccountRecord {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.passwordHash,
    oauthProvider: row.oauthProvider,
    oauthId: row.oauthId,
    displayName: row.displayName,
    avatarUrl: row.avatarUrl,
    isActive: row.isActive,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Rethrows Postgres unique violations as UniqueViolationError.
 */
function mapWriteError(error: unknown): never {
  const constraint = uniqueViolationConstraint(error);
  if (constraint !== undefined) {
    throw new UniqueViolationError(constraint, { cause: error });
  }
  throw error;
}

export class DrizzleAccountStore implements AccountStore {
  constructor(private readonly db: Database) {}

  async findByEmail(email: string): Promise<AccountRecord | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(and(eq(sql`lower(${users.email})`, email.trim().toLowerCase()), eq(users.isActive, true)))
      .limit(1);
    return row ? toAccountRecord(row) : null;
  }

  async findByOAuth(provider: OAuthProviderId, oauthId: string): Promise<AccountRecord | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(
        and(eq(users.oauthProvider, provider), eq(users.oauthId, oauthId), eq(users.isActive, true))
      )
      .limit(1);
    return row ? toAccountRecord(row) : null;
  }

  async findById(id: string): Promise<AccountRecord | null> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(and(eq(users.id, id), eq(users.isActive, true)))
      .limit(1);
    return row ? toAccountRecord(row) : null;
  }

  async insert(account: NewAccount): Promise<AccountRecord> {
    const rows = await this.db
      .insert(users)
      .values({
        email: account.email,
        passwordHash: account.passwordHash,
        oauthProvider: account.oauthProvider,
        oauthId: account.oauthId,
        displayName: account.displayName,
        avatarUrl: account.avatarUrl,
      })
      .returning()
      .catch(mapWriteError);

    const [row] = rows;
    if (!row) {
      throw new Error('Account insert returned no row');
    }
    return toAccountRecord(row);
  }

  async update(account: AccountRecord): Promise<AccountRecord> {
    const rows = await this.db
      .update(users)
      .set({
        email: account.email,
        passwordHash: account.passwordHash,
        oauthProvider: account.oauthProvider,
        oauthId: account.oauthId,
        displayName: account.displayName,
        avatarUrl: account.avatarUrl,
        updatedAt: new Date(),
      })
      .where(and(eq(users.id, account.id), eq(users.isActive, true)))
      .returning()
      .catch(mapWriteError);

    const [row] = rows;
    if (!row) {
      throw new Error(`Account ${account.id} not found`);
    }
    return toAccountRecord(row);
  }

  /**
   * Soft delete. Rows are never removed by this store.
   */
  async deactivate(id: string): Promise<boolean> {
    const rows = await this.db
      .update(users)
      .set({ isActive: false, updatedAt: new Date() })
      .where(and(eq(users.id, id), eq(users.isActive, true)))
      .returning({ id: users.id });
    return rows.length > 0;
  }
}
