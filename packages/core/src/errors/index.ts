/**
 * Tideway Error System
 *
 * Every terminal error signal a stream emits is a {@link StreamError}:
 * - Unique error codes (TIDE_U100, TIDE_O200, etc.)
 * - Suggestions for resolution
 * - Error categorization (usage, overflow, producer, timeout, internal)
 * - Error chaining through `cause`
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  BufferOverflowError,
  ConfigValidationError,
  DecodeError,
  GateTimeoutError,
  InvalidDemandError,
  ProducerError,
  QueryError,
  StreamError,
  SubscriberConflictError,
  TokenTimeoutError,
  ensureStreamError,
  toProducerError,
  type FieldValidationError,
  type SerializedStreamError,
  type StreamErrorOptions,
} from './stream-error.js';
