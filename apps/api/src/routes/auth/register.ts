import { AuthCoreError } from '@commerce/auth-core';
import { RegisterSchema } from '@commerce/types';
import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { authErrorResponse } from '../../lib/http-errors.js';
import { clientIp } from '../../lib/request-meta.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';

export function createRegisterRoute(services: AppServices) {
  const registerRoute = new Hono<AppBindings>();

  registerRoute.post('/', zValidator('json', RegisterSchema), async (c) => {
    const { email, password, displayName } = c.req.valid('json');
    const ip = clientIp(c);

    try {
      // No session is created; the client logs in afterwards
      const user = await services.auth.register({
        email,
        password,
        displayName: displayName ?? null,
        ...(ip !== undefined && { ip }),
      });
      return c.json(user, 201);
    } catch (error) {
      if (error instanceof AuthCoreError) {
        return authErrorResponse(c, error, services.logger);
      }
      // Let global error handler catch unexpected errors
      throw error;
    }
  });

  return registerRoute;
}
