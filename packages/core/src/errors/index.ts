/**
 * RippleKit Error System
 *
 * Structured errors with stable codes (RIPPLE_I100, RIPPLE_E300, ...),
 * suggestions, categories and error chaining.
 *
 * @example
 * ```typescript
 * import { RippleError, EmptyCollectionError } from '@ripplekit/core';
 *
 * try {
 *   queue.dequeue();
 * } catch (error) {
 *   if (error instanceof EmptyCollectionError) {
 *     // nothing queued yet
 *   }
 * }
 * ```
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
  DuplicateKeyError,
  EmptyCollectionError,
  IndexOutOfRangeError,
  KeyNotFoundError,
  NullArgumentError,
  ObjectDisposedError,
  ReentrantAccessError,
  RippleError,
  ensureRippleError,
  type RippleErrorOptions,
  type SerializedRippleError,
} from './ripple-error.js';
