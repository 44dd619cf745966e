/**
 * RippleError - error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a RippleError
 */
export interface RippleErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom error message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a RippleError
 */
export interface SerializedRippleError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedRippleError | { name: string; message: string; stack?: string };
}

/**
 * Base error for every failure raised by RippleKit containers and views.
 *
 * All failures are raised synchronously, before backing storage is touched,
 * so a caught RippleError never implies a half-applied mutation.
 *
 * @example
 * ```typescript
 * try {
 *   list.move(0, 10);
 * } catch (error) {
 *   if (RippleError.isCode(error, 'RIPPLE_I100')) {
 *     console.log('Index out of range');
 *   } else if (RippleError.isCategory(error, 'empty')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class RippleError extends Error {
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

  constructor(options: RippleErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'RippleError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a RippleError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): RippleError {
    return new RippleError({ code, context });
  }

  /**
   * Wrap an existing error with a RippleError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): RippleError {
    return new RippleError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a RippleError
   */
  static isRippleError(error: unknown): error is RippleError {
    return error instanceof RippleError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return RippleError.isRippleError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return RippleError.isRippleError(error) && error.category === category;
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
  toJSON(): SerializedRippleError {
    const result: SerializedRippleError = {
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
      if (RippleError.isRippleError(this.cause)) {
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
 * Index-based access or mutation outside the valid range
 */
export class IndexOutOfRangeError extends RippleError {
  /** Name of the offending argument */
  readonly paramName: string;
  /** The index that was passed */
  readonly index: number;
  /** Count of the container when the check was made */
  readonly count: number;

  constructor(paramName: string, index: number, count: number) {
    super({
      code: 'RIPPLE_I100',
      message: `Index ${index} for "${paramName}" was out of range (count: ${count})`,
      context: { paramName, index, count },
    });

    this.name = 'IndexOutOfRangeError';
    this.paramName = paramName;
    this.index = index;
    this.count = count;
  }
}

/**
 * Key already present on a must-not-exist insertion
 */
export class DuplicateKeyError extends RippleError {
  readonly key: unknown;

  constructor(key: unknown) {
    super({
      code: 'RIPPLE_K200',
      message: `An item with the same key has already been added. Key: ${String(key)}`,
      context: { key },
    });

    this.name = 'DuplicateKeyError';
    this.key = key;
  }
}

/**
 * Key lookup on a missing key
 */
export class KeyNotFoundError extends RippleError {
  readonly key: unknown;

  constructor(key: unknown) {
    super({
      code: 'RIPPLE_K201',
      message: `The given key "${String(key)}" was not present in the dictionary`,
      context: { key },
    });

    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * Dequeue, pop or peek on an empty container
 */
export class EmptyCollectionError extends RippleError {
  /** The operation that was attempted */
  readonly operation: string;

  constructor(container: string, operation: string) {
    super({
      code: 'RIPPLE_E300',
      message: `${container} is empty`,
      context: { container, operation },
    });

    this.name = 'EmptyCollectionError';
    this.operation = operation;
  }
}

/**
 * Required predicate, selector or source argument missing
 */
export class NullArgumentError extends RippleError {
  readonly paramName: string;

  constructor(paramName: string) {
    super({
      code: 'RIPPLE_A400',
      message: `Value cannot be null or undefined (parameter "${paramName}")`,
      context: { paramName },
    });

    this.name = 'NullArgumentError';
    this.paramName = paramName;
  }
}

/**
 * A guarded container was entered again from inside one of its own operations
 */
export class ReentrantAccessError extends RippleError {
  /** Operation that tried to enter */
  readonly operation: string;
  /** Operation currently holding the guard */
  readonly holder: string;

  constructor(guard: string, operation: string, holder: string) {
    super({
      code: 'RIPPLE_C500',
      message: `"${operation}" cannot run on ${guard} while "${holder}" holds its guard`,
      context: { guard, operation, holder },
    });

    this.name = 'ReentrantAccessError';
    this.operation = operation;
    this.holder = holder;
  }
}

/**
 * Operation on an object that has already been disposed
 */
export class ObjectDisposedError extends RippleError {
  readonly objectName: string;

  constructor(objectName: string, operation: string) {
    super({
      code: 'RIPPLE_L600',
      message: `Cannot call ${operation}() on disposed ${objectName}`,
      context: { objectName, operation },
    });

    this.name = 'ObjectDisposedError';
    this.objectName = objectName;
  }
}

/**
 * Helper function to ensure errors are RippleErrors
 */
export function ensureRippleError(
  error: unknown,
  defaultCode: ErrorCode = 'RIPPLE_X900'
): RippleError {
  if (RippleError.isRippleError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return RippleError.wrap(error, defaultCode);
  }

  return new RippleError({
    code: defaultCode,
    message: String(error),
  });
}
