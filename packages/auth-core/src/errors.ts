/**
 * Caller-visible failure kinds. Several internal causes collapse into one kind
 * on purpose (see InvalidCredentialsError, TokenInvalidError, OAuthFailedError).
 */
export type AuthErrorKind =
  | 'duplicate_account'
  | 'invalid_credentials'
  | 'account_disabled'
  | 'oauth_not_configured'
  | 'oauth_failed'
  | 'token_invalid'
  | 'not_found'
  | 'internal_error';

export class AuthCoreError extends Error {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class DuplicateAccountError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('duplicate_account', 'User with this email already exists', options);
  }
}

/**
 * Unknown email, no password set, and wrong password all surface as this error.
 */
export class InvalidCredentialsError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('invalid_credentials', 'Invalid email or password', options);
  }
}

export class AccountDisabledError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('account_disabled', 'User account is disabled', options);
  }
}

export class OAuthNotConfiguredError extends AuthCoreError {
  constructor(provider: string, options?: ErrorOptions) {
    super('oauth_not_configured', `${providerLabel(provider)} OAuth is not configured`, options);
  }
}

/**
 * Network, timeout, provider response and decode failures. The cause is kept
 * for server logs only.
 */
export class OAuthFailedError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('oauth_failed', 'OAuth authentication failed', options);
  }
}

/**
 * Bad signature, malformed token and expiry are indistinguishable.
 */
export class TokenInvalidError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('token_invalid', 'Could not validate credentials', options);
  }
}

export class AccountNotFoundError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('not_found', 'User not found', options);
  }
}

export class AuthInternalError extends AuthCoreError {
  constructor(options?: ErrorOptions) {
    super('internal_error', 'Authentication service unavailable', options);
  }
}

/**
 * Thrown by account stores when a uniqueness constraint rejects a write.
 * Concurrent registrations race; the store decides the loser.
 */
export class UniqueViolationError extends Error {
  readonly constraint: string | null;

  constructor(constraint: string | null = null, options?: ErrorOptions) {
    super(
      constraint ? `Unique constraint violated: ${constraint}` : 'Unique constraint violated',
      options
    );
    this.name = 'UniqueViolationError';
    this.constraint = constraint;
  }
}

export function isAuthCoreError(error: unknown): error is AuthCoreError {
  return error instanceof AuthCoreError;
}

function providerLabel(provider: string): string {
  return provider.charAt(0).toUpperCase() + provider.slice(1);
}
