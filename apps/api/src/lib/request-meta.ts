import type { Context } from 'hono';

/**
 * Client IP for audit logging. The first X-Forwarded-For hop is the client
 * when the API sits behind a proxy.
 */
export function clientIp(c: Context): string | undefined {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return forwarded || c.req.header('x-real-ip') || undefined;
}
