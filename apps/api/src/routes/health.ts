import { Hono } from 'hono';
import type { AppServices } from '../services/index.js';
import type { AppBindings } from '../types/context.js';

export function createHealthRoute(services: AppServices) {
  const healthRoute = new Hono<AppBindings>();

  healthRoute.get('/', async (c) => {
    const { appName, appVersion } = services.settings;

    let connected = false;
    try {
      connected = await services.checkDatabase();
    } catch (error) {
      services.logger.warn({ err: error, requestId: c.get('requestId') }, 'Database check failed');
    }

    const response = {
      status: connected ? ('healthy' as const) : ('unhealthy' as const),
      service: appName,
      version: appVersion,
      database: connected ? ('connected' as const) : ('disconnected' as const),
    };

    return c.json(response, connected ? 200 : 503);
  });

  return healthRoute;
}
