/**
 * Ordering and equality functions.
 *
 * @module types/compare
 */

/** Three-way comparison: negative, zero or positive */
export type Comparer<T> = (a: T, b: T) => number;

/** Object form of a comparer, for callers that keep comparison state */
export interface ComparerObject<T> {
  compare(a: T, b: T): number;
}

/** Anything {@link toComparer} accepts */
export type ComparerLike<T> = Comparer<T> | ComparerObject<T>;

export type EqualityComparer<T> = (a: T, b: T) => boolean;

/**
 * SameValueZero, the equality `Array.prototype.includes`, `Map` and `Set`
 * use: like `===` except that `NaN` equals `NaN`.
 */
export function defaultEquals<T>(a: T, b: T): boolean {
  return a === b || (a !== a && b !== b);
}

function rank(value: unknown): number {
  if (value === undefined) return 0;
  if (value === null) return 1;
  return 2;
}

/**
 * Default ordering used by views when no comparer is supplied.
 *
 * `undefined` sorts before `null`, which sorts before everything else.
 * Numbers and bigints compare numerically, strings by code unit, dates by
 * time and booleans with `false` first. Anything else is compared by its
 * `String()` form.
 */
export function defaultComparer(a: unknown, b: unknown): number {
  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== 2 || rankB !== 2) return rankA - rankB;

  if (
    (typeof a === 'number' || typeof a === 'bigint') &&
    (typeof b === 'number' || typeof b === 'bigint')
  ) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  const left = typeof a === 'string' ? a : String(a);
  const right = typeof b === 'string' ? b : String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Normalize a function or `{ compare }` object into a plain comparer */
export function toComparer<T>(comparer: ComparerLike<T>): Comparer<T> {
  if (typeof comparer === 'function') return comparer;
  return (a, b) => comparer.compare(a, b);
}
