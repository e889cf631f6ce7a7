/**
 * @commerce/auth
 *
 * Authentication primitives for the commerce API
 * - Password hashing/verification
 * - Auth constants (cookie name, TTL bounds, provider IDs)
 * - Auth event emitter
 *
 * All higher-order auth flows live in @commerce/auth-core.
 */

// Password utilities
export { hashPassword, verifyPassword } from './password.js';

// Constants
export {
  PASSWORD_HASH_ALGORITHM,
  SCRYPT_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELIZATION,
  SCRYPT_KEY_LENGTH,
  SCRYPT_SALT_BYTES,
  DEFAULT_SESSION_TTL_MINUTES,
  MIN_SESSION_TTL_MINUTES,
  MAX_SESSION_TTL_MINUTES,
  COOKIE_NAME,
  OAUTH_STATE_COOKIE_PREFIX,
  OAUTH_STATE_MAX_AGE_SECONDS,
  GOOGLE_PROVIDER_ID,
  APPLE_PROVIDER_ID,
  OAUTH_PROVIDER_IDS,
} from './constants.js';
export type { OAuthProviderId } from './constants.js';

// Events
export { authEvents, AuthEventEmitter } from './events.js';
export type {
  AuthEvent,
  AuthEventInput,
  AuthEventHandler,
  AuthEventType,
  LoginFailedEvent,
  OAuthLoginEvent,
  TokenAuthFailedEvent,
} from './events.js';
