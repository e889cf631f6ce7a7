/**
 * Authentication constants
 * Single source of truth for auth configuration
 */

// Password hashing (scrypt). N=2^15, r=8 needs 32 MiB per hash.
export const PASSWORD_HASH_ALGORITHM = 'scrypt';
export const SCRYPT_COST = 2 ** 15;
export const SCRYPT_BLOCK_SIZE = 8;
export const SCRYPT_PARALLELIZATION = 1;
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_BYTES = 16;

// Session token configuration
export const DEFAULT_SESSION_TTL_MINUTES = 30;
export const MIN_SESSION_TTL_MINUTES = 1;
export const MAX_SESSION_TTL_MINUTES = 1440; // 24 hours

// Cookie configuration
export const COOKIE_NAME = 'access_token';
export const OAUTH_STATE_COOKIE_PREFIX = 'oauth_state_';
export const OAUTH_STATE_MAX_AGE_SECONDS = 600; // 10 minutes

// OAuth provider identifiers stored in users.oauth_provider
export const GOOGLE_PROVIDER_ID = 'google';
export const APPLE_PROVIDER_ID = 'apple';
export const OAUTH_PROVIDER_IDS = [GOOGLE_PROVIDER_ID, APPLE_PROVIDER_ID] as const;
export type OAuthProviderId = (typeof OAUTH_PROVIDER_IDS)[number];
