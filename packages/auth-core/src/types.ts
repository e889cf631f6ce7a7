import type { OAuthProviderId } from '@commerce/auth';

export type { OAuthProviderId };

/**
 * Stored account, as the account store returns it.
 * Lookups are scoped to active accounts; isActive is still carried so a
 * store that does not filter cannot slip an inactive record through.
 */
export type AccountRecord = {
  id: string;
  email: string;
  passwordHash: string | null;
  oauthProvider: OAuthProviderId | null;
  oauthId: string | null;
  displayName: string | null;
  avatarUrl: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * Insert shape. id and timestamps come from the store.
 */
export type NewAccount = {
  email: string;
  passwordHash: string | null;
  oauthProvider: OAuthProviderId | null;
  oauthId: string | null;
  displayName: string | null;
  avatarUrl: string | null;
};

/**
 * Identity claim produced by an OAuth provider after the code exchange
 */
export type OAuthProfile = {
  provider: OAuthProviderId;
  providerId: string;
  email: string;
  displayName?: string | null;
  avatarUrl?: string | null;
};

export type OAuthResolutionOutcome = 'matched' | 'linked' | 'created';

export type OAuthResolution = {
  account: AccountRecord;
  outcome: OAuthResolutionOutcome;
};

/**
 * Account view returned to callers. Never carries the password hash.
 */
export type PublicUser = {
  id: string;
  email: string;
  displayName: string | null;
  avatarUrl: string | null;
  oauthProvider: OAuthProviderId | null;
  isActive: boolean;
  createdAt: string;
};

/**
 * Decoded payload of a verified session token (seconds since epoch)
 */
export type SessionClaims = {
  sub: string;
  email: string;
  iat: number;
  exp: number;
};

export type IssuedSessionToken = {
  token: string;
  claims: SessionClaims;
};

export type AuthResult = {
  accessToken: string;
  tokenType: 'bearer';
  expiresAt: string;
  user: PublicUser;
};

export type RegisterInput = {
  email: string;
  password: string;
  displayName?: string | null;
  ip?: string;
};

export type LoginInput = {
  email: string;
  password: string;
  ip?: string;
};

export type OAuthLoginInput = {
  provider: OAuthProviderId;
  code: string;
  state: string;
  /** State issued with the authorization URL; compared when present */
  expectedState?: string;
  /** Name sent alongside the callback (Apple's first-consent `user` field) */
  displayNameHint?: string | null;
  ip?: string;
};

export type AuthenticateInput = {
  authorizationHeader?: string | null;
  cookieToken?: string | null;
};

export type AuthorizationUrl = {
  authorizationUrl: string;
  state: string;
};
