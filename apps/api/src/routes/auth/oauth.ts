/**
 * OAuth sign-in for Google and Apple.
 *
 * GET /<provider> returns the authorization URL and pins the state in a
 * short-lived cookie; the callback must present the same state.
 */

import {
  AuthCoreError,
  type AuthResult,
  type OAuthProviderId,
  parseAppleUserName,
} from '@commerce/auth-core';
import { AppleCallbackFormSchema, GoogleCallbackQuerySchema } from '@commerce/types';
import { zValidator } from '@hono/zod-validator';
import { type Context, Hono } from 'hono';
import { authErrorResponse } from '../../lib/http-errors.js';
import { clientIp } from '../../lib/request-meta.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';
import { consumeStateCookie, setSessionCookie, setStateCookie } from './cookies.js';

type CallbackParams = {
  code: string;
  state: string;
  displayNameHint?: string | null;
};

export function createOAuthRoutes(services: AppServices) {
  const oauthRoutes = new Hono<AppBindings>();

  const authorize = (c: Context, provider: OAuthProviderId) => {
    try {
      const result = services.auth.getAuthorizationUrl(provider);
      setStateCookie(c, provider, result.state, services.settings);
      return c.json(result);
    } catch (error) {
      if (error instanceof AuthCoreError) {
        return authErrorResponse(c, error, services.logger);
      }
      throw error;
    }
  };

  const complete = async (c: Context, provider: OAuthProviderId, params: CallbackParams) => {
    // A missing cookie yields '' which never matches
    const expectedState = consumeStateCookie(c, provider);
    const ip = clientIp(c);

    let result: AuthResult;
    try {
      result = await services.auth.oauthLogin({
        provider,
        code: params.code,
        state: params.state,
        expectedState,
        ...(params.displayNameHint !== undefined && { displayNameHint: params.displayNameHint }),
        ...(ip !== undefined && { ip }),
      });
    } catch (error) {
      if (error instanceof AuthCoreError) {
        return authErrorResponse(c, error, services.logger);
      }
      throw error;
    }

    setSessionCookie(c, result.accessToken, services.settings);
    return c.json(result);
  };

  oauthRoutes.get('/google', (c) => authorize(c, 'google'));

  oauthRoutes.get('/google/callback', zValidator('query', GoogleCallbackQuerySchema), (c) => {
    const { code, state } = c.req.valid('query');
    return complete(c, 'google', { code, state });
  });

  oauthRoutes.get('/apple', (c) => authorize(c, 'apple'));

  // Apple sends the name only on first consent, as JSON in the `user` field
  oauthRoutes.post('/apple/callback', zValidator('form', AppleCallbackFormSchema), (c) => {
    const { code, state, user } = c.req.valid('form');
    return complete(c, 'apple', { code, state, displayNameHint: parseAppleUserName(user) });
  });

  return oauthRoutes;
}
