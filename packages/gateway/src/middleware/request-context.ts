/**
 * Per-request context: correlation id and response timing
 */

import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'X-Request-ID';
export const RESPONSE_TIME_HEADER = 'X-Response-Time';

// Alphanumeric plus . _ : = - (up to 128 chars); anything else is replaced
const VALID_REQUEST_ID = /^[a-zA-Z0-9._:=-]{1,128}$/;

/**
 * Reuse the caller's X-Request-ID when it is well formed, else mint one
 */
export const requestId = createMiddleware(async (c, next) => {
  const header = c.req.header(REQUEST_ID_HEADER);
  const id = header && VALID_REQUEST_ID.test(header) ? header : randomUUID();
  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
});

export const timing = createMiddleware(async (c, next) => {
  const start = performance.now();
  c.set('startTime', start);

  await next();

  c.header(RESPONSE_TIME_HEADER, `${(performance.now() - start).toFixed(2)}ms`);
});
