/**
 * Route Helpers
 *
 * Response envelopes and token comparison shared by the route handlers.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiError, ApiResponse, ResponseMeta } from '../types/index.js';

export { ERROR_CODES, type ErrorCode } from './error-codes.js';

/**
 * Constant-time comparison of two verify tokens.
 * An empty or missing value never matches.
 */
export function safeKeyCompare(a: string | undefined, b: string | undefined): boolean {
  if (!a || !b) return false;
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) return false;
  return timingSafeEqual(aBuf, bBuf);
}

function responseMeta(c: Context): ResponseMeta {
  return {
    requestId: c.get('requestId') ?? 'unknown',
    timestamp: new Date().toISOString(),
  };
}

/**
 * Success envelope: `{ success: true, data, meta }`
 */
export function apiResponse<T>(c: Context, data: T, status?: ContentfulStatusCode) {
  const response: ApiResponse<T> = { success: true, data, meta: responseMeta(c) };
  return status ? c.json(response, status) : c.json(response);
}

/**
 * Error envelope: `{ success: false, error: { code, message }, meta }`
 *
 * @example
 * return apiError(c, { code: ERROR_CODES.UNAUTHORIZED, message: 'Webhook verify token mismatch' }, 401);
 */
export function apiError(
  c: Context,
  error: ApiError,
  status: ContentfulStatusCode = 400
) {
  const response: ApiResponse = { success: false, error, meta: responseMeta(c) };
  return c.json(response, status);
}
