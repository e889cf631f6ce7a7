import { Hono } from 'hono';
import { requireAuth } from '../../middleware/auth.js';
import type { AppServices } from '../../services/index.js';
import type { AuthenticatedBindings } from '../../types/context.js';

export function createMeRoute(services: AppServices) {
  const meRoute = new Hono<AuthenticatedBindings>();

  meRoute.get('/', requireAuth(services), (c) => c.json(c.get('user')));

  return meRoute;
}
