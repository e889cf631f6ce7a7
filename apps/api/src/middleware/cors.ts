import { cors } from 'hono/cors';

export function createCorsMiddleware(origins: string[]) {
  const allowedOrigins = new Set(origins);

  return cors({
    origin: (origin) => (origin && allowedOrigins.has(origin) ? origin : ''),
    credentials: true, // Required for cookies
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposeHeaders: ['X-Request-Id'],
    maxAge: 86400, // browser caches preflight response for 24 hours
  });
}
