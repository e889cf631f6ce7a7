import type { AccountStore } from './interfaces.js';
import type { AccountRecord, OAuthProfile, OAuthResolution } from './types.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Maps credential claims onto stored accounts.
 *
 * OAuth identities are matched by provider id first, then by email (linking),
 * then created.
 */
export class AccountResolver {
  constructor(private readonly store: AccountStore) {}

  async resolveOAuthIdentity(profile: OAuthProfile): Promise<OAuthResolution> {
    const bound = await this.store.findByOAuth(profile.provider, profile.providerId);
    if (bound) {
      return { account: bound, outcome: 'matched' };
    }

    const email = normalizeEmail(profile.email);
    const existing = await this.store.findByEmail(email);
    if (existing) {
      const linked: AccountRecord = {
        ...existing,
        oauthProvider: profile.provider,
        oauthId: profile.providerId,
        displayName: existing.displayName || profile.displayName || null,
        avatarUrl: existing.avatarUrl || profile.avatarUrl || null,
      };
      return { account: await this.store.update(linked), outcome: 'linked' };
    }

    const created = await this.store.insert({
      email,
      passwordHash: null,
      oauthProvider: profile.provider,
      oauthId: profile.providerId,
      displayName: profile.displayName || null,
      avatarUrl: profile.avatarUrl || null,
    });
    return { account: created, outcome: 'created' };
  }

  async resolvePasswordIdentity(email: string): Promise<AccountRecord | null> {
    return this.store.findByEmail(normalizeEmail(email));
  }

  async resolveSubject(id: string): Promise<AccountRecord | null> {
    if (!UUID_PATTERN.test(id)) {
      return null;
    }
    return this.store.findById(id);
  }
}
