import { AuthCoreError } from '@commerce/auth-core';
import { LoginSchema } from '@commerce/types';
import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { authErrorResponse } from '../../lib/http-errors.js';
import { clientIp } from '../../lib/request-meta.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';
import { setSessionCookie } from './cookies.js';

export function createLoginRoute(services: AppServices) {
  const loginRoute = new Hono<AppBindings>();

  loginRoute.post('/', zValidator('json', LoginSchema), async (c) => {
    const { email, password } = c.req.valid('json');
    const ip = clientIp(c);

    try {
      const result = await services.auth.login({
        email,
        password,
        ...(ip !== undefined && { ip }),
      });

      // Browser clients use the cookie, API clients the returned token
      setSessionCookie(c, result.accessToken, services.settings);
      return c.json(result);
    } catch (error) {
      if (error instanceof AuthCoreError) {
        return authErrorResponse(c, error, services.logger);
      }
      throw error;
    }
  });

  return loginRoute;
}
