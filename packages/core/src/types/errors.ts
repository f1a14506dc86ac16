/**
 * Structured error classes for kookgate
 *
 * The session classifies every failure into one of these kinds and the
 * kind alone decides whether it is retried:
 * - TransportError, ProtocolError: retried under the reconnect policy
 * - DecodeError: the frame is dropped, the session continues
 * - AuthenticationError, ExhaustedError: terminal
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Connection-level I/O failure (socket error, unexpected close, network down)
 */
export class TransportError extends AppError {
  readonly code = 'TRANSPORT_ERROR' as const;
  readonly statusCode = 502;
  readonly closeCode?: number;

  constructor(message: string, options?: { closeCode?: number; cause?: unknown }) {
    super(message, options);
    this.closeCode = options?.closeCode;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      closeCode: this.closeCode,
    };
  }
}

export type DecodeFailure = 'decompress' | 'malformed';

/**
 * A single frame could not be decompressed or parsed
 */
export class DecodeError extends AppError {
  readonly code = 'DECODE_ERROR' as const;
  readonly statusCode = 400;
  readonly reason: DecodeFailure;

  constructor(reason: DecodeFailure, message: string, options?: { cause?: unknown }) {
    super(`Frame ${reason === 'decompress' ? 'decompression' : 'decoding'} failed: ${message}`, options);
    this.reason = reason;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
    };
  }
}

/**
 * The peer broke the protocol: handshake rejected, unexpected signal,
 * missed heartbeat acknowledgement, reorder buffer overflow
 */
export class ProtocolError extends AppError {
  readonly code = 'PROTOCOL_ERROR' as const;
  readonly statusCode = 502;
  /** Drop session state (session id, cursor, buffer) before the next attempt */
  readonly resetSession: boolean;

  constructor(message: string, options?: { resetSession?: boolean; cause?: unknown }) {
    super(message, options);
    this.resetSession = options?.resetSession ?? false;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      resetSession: this.resetSession,
    };
  }
}

/**
 * Token rejected or challenge token mismatch
 */
export class AuthenticationError extends AppError {
  readonly code = 'AUTHENTICATION_ERROR' as const;
  readonly statusCode = 401;

  constructor(message: string = 'Authentication required', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Reconnect attempts used up; the last failure is kept as `cause`
 */
export class ExhaustedError extends AppError {
  readonly code = 'RECONNECT_EXHAUSTED' as const;
  readonly statusCode = 503;
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Gave up after ${attempts} reconnect attempts${reason}`, options);
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
    };
  }
}

/**
 * Check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Classify an unknown failure. Anything that is not already an AppError is
 * treated as a transport failure, which the reconnect policy retries.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new TransportError(error.message, { cause: error });
  }
  return new TransportError(String(error));
}

/**
 * Extract an error message from an unknown catch value
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}
