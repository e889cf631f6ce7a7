/**
 * Authentication middleware for protected routes.
 * Accepts `Authorization: Bearer <token>` first, then the session cookie.
 */

import { COOKIE_NAME } from '@commerce/auth';
import { AuthCoreError } from '@commerce/auth-core';
import { getCookie } from 'hono/cookie';
import { createMiddleware } from 'hono/factory';
import { authErrorResponse } from '../lib/http-errors.js';
import type { AppServices } from '../services/index.js';
import type { AuthenticatedBindings } from '../types/context.js';

export function requireAuth(services: Pick<AppServices, 'auth' | 'logger'>) {
  return createMiddleware<AuthenticatedBindings>(async (c, next) => {
    try {
      const user = await services.auth.authenticate({
        authorizationHeader: c.req.header('authorization') ?? null,
        cookieToken: getCookie(c, COOKIE_NAME) ?? null,
      });
      c.set('user', user);
    } catch (error) {
      if (error instanceof AuthCoreError) {
        return authErrorResponse(c, error, services.logger);
      }
      throw error;
    }

    await next();
  });
}
