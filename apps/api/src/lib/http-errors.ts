import type { AuthCoreError, AuthErrorKind } from '@commerce/auth-core';
import type { Logger } from '@commerce/observability';
import type { Context } from 'hono';

type AuthErrorStatus = 400 | 401 | 409 | 500 | 501;

export const AUTH_ERROR_STATUS: Record<AuthErrorKind, AuthErrorStatus> = {
  duplicate_account: 409,
  invalid_credentials: 401,
  account_disabled: 401,
  oauth_not_configured: 501,
  oauth_failed: 400,
  token_invalid: 401,
  not_found: 401,
  internal_error: 500,
};

const BEARER_CHALLENGE_KINDS = new Set<AuthErrorKind>(['token_invalid', 'not_found']);

/**
 * Translates an auth-core error into its HTTP response. Causes are logged,
 * never returned.
 */
export function authErrorResponse(c: Context, error: AuthCoreError, logger: Logger): Response {
  const status = AUTH_ERROR_STATUS[error.kind];
  const requestId = c.get('requestId');

  if (error.kind === 'internal_error') {
    logger.error({ err: error.cause, requestId }, error.message);
  } else if (error.kind === 'oauth_failed') {
    logger.warn({ err: error.cause, requestId }, error.message);
  }

  if (BEARER_CHALLENGE_KINDS.has(error.kind)) {
    c.header('WWW-Authenticate', 'Bearer');
  }
  return c.json({ error: error.message }, status);
}
