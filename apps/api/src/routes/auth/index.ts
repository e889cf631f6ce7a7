import { Hono } from 'hono';
import type { AppServices } from '../../services/index.js';
import type { AppBindings } from '../../types/context.js';
import { createLoginRoute } from './login.js';
import { createLogoutRoute } from './logout.js';
import { createMeRoute } from './me.js';
import { createOAuthRoutes } from './oauth.js';
import { createRegisterRoute } from './register.js';

export function createAuthRoutes(services: AppServices) {
  const authRoutes = new Hono<AppBindings>();

  authRoutes.route('/register', createRegisterRoute(services));
  authRoutes.route('/login', createLoginRoute(services));
  authRoutes.route('/logout', createLogoutRoute(services));
  authRoutes.route('/me', createMeRoute(services));
  authRoutes.route('/', createOAuthRoutes(services));

  return authRoutes;
}
