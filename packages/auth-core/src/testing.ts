/**
 * In-memory AccountStore for tests. Enforces the same uniqueness rules as the
 * Postgres indexes: one active account per email and per (provider, oauthId).
 */
import { randomUUID } from 'node:crypto';
import { UniqueViolationError } from './errors.js';
import type { AccountStore } from './interfaces.js';
import type { AccountRecord, NewAccount, OAuthProviderId } from './types.js';

export class InMemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, AccountRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findByEmail(email: string): Promise<AccountRecord | null> {
    return this.findActive((account) => account.email === email);
  }

  async findByOAuth(provider: OAuthProviderId, oauthId: string): Promise<AccountRecord | null> {
    return this.findActive(
      (account) => account.oauthProvider === provider && account.oauthId === oauthId
    );
  }

  async findById(id: string): Promise<AccountRecord | null> {
    return this.findActive((account) => account.id === id);
  }

  async insert(account: NewAccount): Promise<AccountRecord> {
    const now = this.now();
    const candidate: AccountRecord = {
      ...account,
      id: randomUUID(),
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.assertUnique(candidate);
    this.accounts.set(candidate.id, candidate);
    return { ...candidate };
  }

  async update(account: AccountRecord): Promise<AccountRecord> {
    const current = this.accounts.get(account.id);
    if (!current || !current.isActive) {
      throw new Error(`Account ${account.id} not found`);
    }
    const next: AccountRecord = {
      ...account,
      createdAt: current.createdAt,
      updatedAt: this.now(),
    };
    this.assertUnique(next);
    this.accounts.set(next.id, next);
    return { ...next };
  }

  async deactivate(id: string): Promise<boolean> {
    const current = this.accounts.get(id);
    if (!current || !current.isActive) {
      return false;
    }
    this.accounts.set(id, { ...current, isActive: false, updatedAt: this.now() });
    return true;
  }

  /**
   * Raw rows including inactive ones, for assertions.
   */
  all(): AccountRecord[] {
    return Array.from(this.accounts.values(), (account) => ({ ...account }));
  }

  /**
   * Overwrites a stored row without uniqueness checks. Lets tests plant
   * records a well-behaved store would never return.
   */
  seed(account: AccountRecord): void {
    this.accounts.set(account.id, { ...account });
  }

  clear(): void {
    this.accounts.clear();
  }

  private findActive(predicate: (account: AccountRecord) => boolean): AccountRecord | null {
    for (const account of this.accounts.values()) {
      if (account.isActive && predicate(account)) {
        return { ...account };
      }
    }
    return null;
  }

  private assertUnique(candidate: AccountRecord): void {
    for (const other of this.accounts.values()) {
      if (other.id === candidate.id || !other.isActive) {
        continue;
      }
      if (other.email === candidate.email) {
        throw new UniqueViolationError('users_email_active_unique');
      }
      if (
        candidate.oauthProvider !== null &&
        candidate.oauthId !== null &&
        other.oauthProvider === candidate.oauthProvider &&
        other.oauthId === candidate.oauthId
      ) {
        throw new UniqueViolationError('users_oauth_unique');
      }
    }
  }
}
