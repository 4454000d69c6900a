/**
 * StreamError - Structured error class for Tideway streams
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a StreamError
 */
export interface StreamErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a StreamError
 */
export interface SerializedStreamError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedStreamError | { name: string; message: string; stack?: string };
}

/**
 * Error class carried by every terminal error signal a stream emits.
 *
 * @example
 * ```typescript
 * source.subscribe({
 *   next: (row) => handle(row),
 *   complete: () => {},
 *   error: (err) => {
 *     if (StreamError.isCode(err, 'TIDE_O200')) {
 *       console.log('consumer fell behind:', err.format());
 *     }
 *   },
 * });
 * ```
 */
export class StreamError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: StreamErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'StreamError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StreamError);
    }
  }

  /**
   * Create a StreamError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): StreamError {
    return new StreamError({ code, context });
  }

  /**
   * Wrap an existing error with a StreamError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): StreamError {
    return new StreamError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a StreamError
   */
  static isStreamError(error: unknown): error is StreamError {
    return error instanceof StreamError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return StreamError.isStreamError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return StreamError.isStreamError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedStreamError {
    const result: SerializedStreamError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (StreamError.isStreamError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Field validation error detail
 */
export interface FieldValidationError {
  /** Field path (e.g., 'bufferSize') */
  path: string;
  /** Human-readable error message */
  message: string;
  /** The actual value that failed validation */
  value?: unknown;
}

/**
 * Thrown when a flow-control configuration fails validation
 */
export class ConfigValidationError extends StreamError {
  /** Field-level validation errors */
  readonly errors: FieldValidationError[];

  constructor(errors: FieldValidationError[], context?: Record<string, unknown>) {
    const message = errors.map((e) => `${e.path}: ${e.message}`).join('; ');

    super({
      code: 'TIDE_U102',
      message: `Invalid flow-control configuration: ${message}`,
      context: {
        ...context,
        fieldErrors: errors,
      },
    });

    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Thrown synchronously from request(n) when n is not a positive integer.
 * Does not terminate the stream.
 */
export class InvalidDemandError extends StreamError {
  /** The rejected demand value */
  readonly demand: unknown;

  constructor(demand: unknown) {
    super({
      code: 'TIDE_U100',
      message: `request(n) requires a positive integer, got ${String(demand)}`,
      context: { demand: String(demand) },
    });

    this.name = 'InvalidDemandError';
    this.demand = demand;
  }
}

/**
 * Delivered to a second subscriber of a single-consumer stream
 */
export class SubscriberConflictError extends StreamError {
  constructor() {
    super({ code: 'TIDE_U101' });
    this.name = 'SubscriberConflictError';
  }
}

/**
 * Buffer full, no demand, and the overflow strategy is 'fail'
 */
export class BufferOverflowError extends StreamError {
  /** Capacity that was exceeded */
  readonly bufferSize: number;

  constructor(bufferSize: number) {
    super({
      code: 'TIDE_O200',
      message: `Buffer of size ${bufferSize} has overflown`,
      context: { bufferSize },
    });

    this.name = 'BufferOverflowError';
    this.bufferSize = bufferSize;
  }
}

/**
 * Failure reported by the query engine
 */
export class ProducerError extends StreamError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'ProducerError';
  }
}

/**
 * Wrap whatever a query engine rejected or reported with into a ProducerError,
 * keeping StreamErrors as they are
 */
export function toProducerError(
  error: unknown,
  code: ErrorCode,
  context?: Record<string, unknown>
): StreamError {
  if (StreamError.isStreamError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new ProducerError(code, error.message, context, error);
  }
  return new ProducerError(code, String(error), context);
}

/**
 * The configured decode function threw for a produced record
 */
export class DecodeError extends StreamError {
  constructor(cause: Error, context?: Record<string, unknown>) {
    super({ code: 'TIDE_P302', message: `Record decoding failed: ${cause.message}`, context, cause });
    this.name = 'DecodeError';
  }
}

/**
 * Query text the engine cannot run
 */
export class QueryError extends StreamError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'TIDE_P303', message, context, cause });
    this.name = 'QueryError';
  }
}

/**
 * A producer held in the result gate waited longer than timeoutMs
 */
export class GateTimeoutError extends StreamError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super({
      code: 'TIDE_T400',
      message: `Producer waited more than ${timeoutMs}ms for consumer demand`,
      context: { timeoutMs },
    });

    this.name = 'GateTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The live subscription token did not arrive within timeoutMs
 */
export class TokenTimeoutError extends StreamError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super({
      code: 'TIDE_T401',
      message: `Subscription token did not arrive within ${timeoutMs}ms`,
      context: { timeoutMs },
    });

    this.name = 'TokenTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Helper function to ensure errors are StreamErrors
 */
export function ensureStreamError(
  error: unknown,
  defaultCode: ErrorCode = 'TIDE_X900'
): StreamError {
  if (StreamError.isStreamError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return StreamError.wrap(error, defaultCode);
  }

  return new StreamError({
    code: defaultCode,
    message: String(error),
  });
}
