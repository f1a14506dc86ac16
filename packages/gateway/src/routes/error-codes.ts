/**
 * Error codes carried in the `error.code` field of failed responses
 */

export const ERROR_CODES = {
  // Not Found Errors (404)
  NOT_FOUND: 'NOT_FOUND',

  // Request Errors (400)
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_REQUEST: 'INVALID_REQUEST',
  DECOMPRESSION_FAILED: 'DECOMPRESSION_FAILED',

  // Authentication Errors (401)
  UNAUTHORIZED: 'UNAUTHORIZED',

  // Payload Errors (413)
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // Service Unavailable (503)
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Server Errors (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  EVENT_PROCESSING_FAILED: 'EVENT_PROCESSING_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
