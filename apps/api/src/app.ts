import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { createCorsMiddleware } from './middleware/cors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createRequestLogger } from './middleware/request-logger.js';
import { createAuthRoutes } from './routes/auth/index.js';
import { createHealthRoute } from './routes/health.js';
import { createItemsRoute } from './routes/items.js';
import type { AppServices } from './services/index.js';
import type { AppBindings } from './types/context.js';

export function createApp(services: AppServices) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', createRequestLogger(services.logger));

  // Apply CORS middleware globally for cross-origin cookie support
  app.use('*', createCorsMiddleware(services.settings.corsOrigins));

  app.route('/healthz', createHealthRoute(services));
  app.route('/api/auth', createAuthRoutes(services));
  app.route('/api/items', createItemsRoute(services));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    services.logger.error(
      { err, requestId: c.get('requestId'), method: c.req.method, path: c.req.path },
      'Unhandled error'
    );
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
