import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

const INCOMING_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Request ID middleware
 * Reuses a well-formed upstream ID (e.g. from a load balancer) or generates one,
 * and echoes it on the response for log correlation.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const existingRequestId = c.req.header('x-request-id') || c.req.header('x-correlation-id');

  const requestId =
    existingRequestId && INCOMING_ID_PATTERN.test(existingRequestId)
      ? existingRequestId
      : randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
