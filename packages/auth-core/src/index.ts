export * from './types.js';
export * from './interfaces.js';
export * from './errors.js';
export {
  ConfigError,
  JWT_ALGORITHMS,
  WEAK_SECRETS,
  formatZodIssues,
  loadAuthCoreConfig,
  type AuthCoreConfig,
  type JwtAlgorithm,
  type OAuthClientCredentials,
} from './config.js';
export { SessionTokenCodec, type SessionTokenCodecOptions } from './session-token.js';
export { AccountResolver, normalizeEmail } from './account-resolver.js';
export * from './oauth/index.js';
export {
  AuthCoreService,
  createAuthService,
  extractBearer,
  type CreateAuthServiceOptions,
} from './service.js';
export { toPublicUser } from './views.js';
