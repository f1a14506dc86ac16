/**
 * Middleware exports
 */

export { requestId, timing, REQUEST_ID_HEADER, RESPONSE_TIME_HEADER } from './request-context.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
