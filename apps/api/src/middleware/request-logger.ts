import type { Logger } from '@commerce/observability';
import type { Context, Next } from 'hono';

export function createRequestLogger(logger: Logger) {
  return async function requestLogger(c: Context, next: Next) {
    const startedAt = performance.now();
    await next();

    const entry = {
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - startedAt),
    };

    if (c.res.status >= 500) {
      logger.error(entry, 'Request failed');
    } else {
      logger.info(entry, 'Request completed');
    }
  };
}
