import { COOKIE_NAME } from '@commerce/auth';
import { Hono } from 'hono';
import { getCookie } from 'hono/cookie';
import { clientIp } from '../../lib/request-meta.js';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';
import { clearSessionCookie } from './cookies.js';

/**
 * Tokens are stateless, so logout only clears the cookie. It succeeds with or
 * without a valid session; the event is emitted when the caller is known.
 */
export function createLogoutRoute(services: AppServices) {
  const logoutRoute = new Hono<AppBindings>();

  logoutRoute.post('/', async (c) => {
    const authorizationHeader = c.req.header('authorization') ?? null;
    const cookieToken = getCookie(c, COOKIE_NAME) ?? null;

    // A stale cookie is a normal logout, not an authentication failure
    const user = await services.auth.findSessionUser({ authorizationHeader, cookieToken });
    if (user) {
      const ip = clientIp(c);
      services.events.emit({
        type: 'user.logout',
        userId: user.id,
        email: user.email,
        ...(ip !== undefined && { ip }),
      });
    }

    clearSessionCookie(c, services.settings);
    return c.json({ message: 'Successfully logged out' });
  });

  return logoutRoute;
}
