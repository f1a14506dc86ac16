/**
 * Core types for kookgate
 * @packageDocumentation
 */

// Result pattern
export { type Result, ok, err, andThen, fromThrowable } from './result.js';

// Error classes
export {
  AppError,
  TransportError,
  DecodeError,
  type DecodeFailure,
  ProtocolError,
  AuthenticationError,
  ExhaustedError,
  isAppError,
  toAppError,
  getErrorMessage,
} from './errors.js';

// Type guards
export {
  isObject,
  isString,
  isNonEmptyString,
  isNumber,
  isInteger,
  isNonNegativeInteger,
} from './guards.js';
