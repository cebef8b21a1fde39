/**
 * Request ID Middleware
 * Tags every request with an id, echoed in the X-Request-Id header
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Create middleware that assigns a request id, reusing a caller-supplied one
 */
export function createRequestIdMiddleware() {
  return async (c: Context, next: Next): Promise<void> => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && incoming.trim() !== '' ? incoming.trim() : nanoid();

    c.set('requestId', requestId);
    c.header(REQUEST_ID_HEADER, requestId);
    await next();
  };
}
