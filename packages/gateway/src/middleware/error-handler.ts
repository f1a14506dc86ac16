/**
 * Global error handler middleware
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { isAppError } from '@kookgate/core';
import { apiError, ERROR_CODES } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

/**
 * Map HTTP status to error code
 */
function statusToErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.BAD_REQUEST;
    case 401:
      return ERROR_CODES.UNAUTHORIZED;
    case 404:
      return ERROR_CODES.NOT_FOUND;
    case 413:
      return ERROR_CODES.PAYLOAD_TOO_LARGE;
    case 503:
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

const RESPONSE_STATUSES: readonly ContentfulStatusCode[] = [400, 401, 404, 413, 502, 503];

function toContentfulStatus(status: number): ContentfulStatusCode {
  return RESPONSE_STATUSES.find((known) => known === status) ?? 500;
}

/**
 * Global error handler
 */
export function errorHandler(err: Error, c: Context): Response {
  // Handle HTTP exceptions (from Hono)
  if (err instanceof HTTPException) {
    return apiError(
      c,
      { code: statusToErrorCode(err.status), message: err.message },
      toContentfulStatus(err.status)
    );
  }

  // Handle JSON parse errors (malformed request body)
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return apiError(
      c,
      { code: ERROR_CODES.BAD_REQUEST, message: 'Invalid JSON in request body' },
      400
    );
  }

  // Application errors carry their own code and status
  if (isAppError(err) && err.statusCode < 500) {
    return apiError(c, { code: err.code, message: err.message }, toContentfulStatus(err.statusCode));
  }

  log.error(`[${c.get('requestId') ?? 'unknown'}] Unexpected error`, { error: err.message });

  return apiError(
    c,
    { code: ERROR_CODES.INTERNAL_ERROR, message: 'An unexpected error occurred' },
    500
  );
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context): Response {
  return apiError(
    c,
    {
      code: ERROR_CODES.NOT_FOUND,
      message: `Route not found: ${c.req.method} ${c.req.path.replace(/[^\w/.\-~%]/g, '')}`,
    },
    404
  );
}
