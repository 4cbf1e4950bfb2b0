import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

// Upstream ids are echoed into logs and headers, so keep them short and printable
const FORWARDED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Request ID middleware
 * Reuses a well-formed x-request-id / x-correlation-id from the caller or
 * generates one, and echoes it on the response for log correlation
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const forwarded = c.req.header('x-request-id') ?? c.req.header('x-correlation-id');
  const requestId = forwarded && FORWARDED_ID.test(forwarded) ? forwarded : randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
