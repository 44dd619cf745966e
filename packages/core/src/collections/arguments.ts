import { IndexOutOfRangeError, NullArgumentError } from '../errors/ripple-error.js';

export function requireArgument<T>(value: T | null | undefined, paramName: string): T {
  if (value === null || value === undefined) {
    throw new NullArgumentError(paramName);
  }
  return value;
}

/** Materialize an iterable argument once, so it can be counted and replayed */
export function requireItems<T>(items: Iterable<T> | null | undefined, paramName = 'items'): T[] {
  return Array.from(requireArgument(items, paramName));
}

/** `index` must address an existing element: `[0, count)` */
export function checkIndex(paramName: string, index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new IndexOutOfRangeError(paramName, index, count);
  }
}

/** `index` must be a valid insertion point: `[0, count]` */
export function checkInsertIndex(paramName: string, index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index > count) {
    throw new IndexOutOfRangeError(paramName, index, count);
  }
}

/** `[index, index + length)` must lie within `[0, count]` */
export function checkRange(index: number, length: number, count: number): void {
  checkInsertIndex('index', index, count);
  if (!Number.isInteger(length) || length < 0 || index + length > count) {
    throw new IndexOutOfRangeError('count', length, count - index);
  }
}
