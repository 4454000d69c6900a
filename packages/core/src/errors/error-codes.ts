/**
 * Tideway Error Codes
 *
 * Error codes are structured as TIDE_[CATEGORY][NUMBER]:
 * - U: Usage errors (U100-U199)
 * - O: Overflow errors (O200-O299)
 * - P: Producer errors (P300-P399)
 * - T: Timeout errors (T400-T499)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Usage errors (U100-U199)
  TIDE_U100: {
    code: 'TIDE_U100',
    message: 'Invalid demand',
    suggestion: 'request(n) takes a positive integer or Infinity.',
  },
  TIDE_U101: {
    code: 'TIDE_U101',
    message: 'Stream already has a subscriber',
    suggestion: 'Each stream serves exactly one consumer. Create another query for a second consumer.',
  },
  TIDE_U102: {
    code: 'TIDE_U102',
    message: 'Invalid flow-control configuration',
    suggestion: 'Check bufferSize, overflowStrategy and timeoutMs.',
  },

  // Overflow errors (O200-O299)
  TIDE_O200: {
    code: 'TIDE_O200',
    message: 'Buffer overflow',
    suggestion: 'Request more items, raise bufferSize, or pick a dropping overflow strategy.',
  },

  // Producer errors (P300-P399)
  TIDE_P300: {
    code: 'TIDE_P300',
    message: 'Query execution failed',
    suggestion: 'Check the query text and the state of the database connection.',
  },
  TIDE_P301: {
    code: 'TIDE_P301',
    message: 'Live subscription failed',
    suggestion: 'Ensure the live query is valid and the engine supports live subscriptions.',
  },
  TIDE_P302: {
    code: 'TIDE_P302',
    message: 'Record decoding failed',
    suggestion: 'The decode function threw for a produced record. Check the record shape.',
  },
  TIDE_P303: {
    code: 'TIDE_P303',
    message: 'Invalid query',
    suggestion: 'Live queries must be SELECT statements naming a table in their FROM clause.',
  },

  // Timeout errors (T400-T499)
  TIDE_T400: {
    code: 'TIDE_T400',
    message: 'Producer waited too long for demand',
    suggestion: 'The consumer did not request more items within timeoutMs. Request sooner or raise timeoutMs.',
  },
  TIDE_T401: {
    code: 'TIDE_T401',
    message: 'Subscription token did not arrive in time',
    suggestion: 'The engine did not confirm the live subscription within timeoutMs.',
  },

  // Internal errors (X900-X999)
  TIDE_X900: {
    code: 'TIDE_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'usage' | 'overflow' | 'producer' | 'timeout' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(5);
  switch (letter) {
    case 'U':
      return 'usage';
    case 'O':
      return 'overflow';
    case 'P':
      return 'producer';
    case 'T':
      return 'timeout';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
