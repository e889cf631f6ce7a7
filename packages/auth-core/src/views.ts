import type { AccountRecord, PublicUser } from './types.js';

export function toPublicUser(account: AccountRecord): PublicUser {
  return {
    id: account.id,
    email: account.email,
    displayName: account.displayName,
    avatarUrl: account.avatarUrl,
    oauthProvider: account.oauthProvider,
    isActive: account.isActive,
    createdAt: account.createdAt.toISOString(),
  };
}
