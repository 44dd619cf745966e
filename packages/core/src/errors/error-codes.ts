/**
 * RippleKit Error Codes
 *
 * Error codes are structured as RIPPLE_[CATEGORY][NUMBER]:
 * - I: Index errors (I100-I199)
 * - K: Key errors (K200-K299)
 * - E: Empty-container errors (E300-E399)
 * - A: Argument errors (A400-A499)
 * - C: Concurrency errors (C500-C599)
 * - L: Lifecycle errors (L600-L699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Index errors (I100-I199)
  RIPPLE_I100: {
    code: 'RIPPLE_I100',
    message: 'Index was out of range',
    suggestion: 'Index must be non-negative and less than the size of the collection.',
  },

  // Key errors (K200-K299)
  RIPPLE_K200: {
    code: 'RIPPLE_K200',
    message: 'An item with the same key has already been added',
    suggestion: 'Use set() to add or replace, or check containsKey() before add().',
  },
  RIPPLE_K201: {
    code: 'RIPPLE_K201',
    message: 'The given key was not present in the dictionary',
    suggestion: 'Use tryGet() or check containsKey() before reading.',
  },

  // Empty-container errors (E300-E399)
  RIPPLE_E300: {
    code: 'RIPPLE_E300',
    message: 'Collection is empty',
    suggestion: 'Check count before calling dequeue(), pop() or peek().',
  },

  // Argument errors (A400-A499)
  RIPPLE_A400: {
    code: 'RIPPLE_A400',
    message: 'Value cannot be null or undefined',
    suggestion: 'Pass a value for the required argument.',
  },

  // Concurrency errors (C500-C599)
  RIPPLE_C500: {
    code: 'RIPPLE_C500',
    message: 'Container is already inside an exclusive operation',
    suggestion:
      'Callbacks invoked while a container holds its guard (equality functions, updaters) must not call back into the same container.',
  },

  // Lifecycle errors (L600-L699)
  RIPPLE_L600: {
    code: 'RIPPLE_L600',
    message: 'Cannot access a disposed object',
    suggestion: 'Create a new view instead of reusing one that has been disposed.',
  },

  // Internal errors (X900-X999)
  RIPPLE_X900: {
    code: 'RIPPLE_X900',
    message: 'Internal error',
    suggestion: 'This is likely a bug. Please report it with the error context.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'index'
  | 'key'
  | 'empty'
  | 'argument'
  | 'concurrency'
  | 'lifecycle'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(7);
  switch (letter) {
    case 'I':
      return 'index';
    case 'K':
      return 'key';
    case 'E':
      return 'empty';
    case 'A':
      return 'argument';
    case 'C':
      return 'concurrency';
    case 'L':
      return 'lifecycle';
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
