import type { RandomSource } from '../collections/types.js';
import { requireArgument } from '../collections/arguments.js';

/**
 * Fisher-Yates shuffle of `array` in place.
 *
 * @param random - Source of floats in `[0, 1)`
 */
export function shuffleInPlace<T>(array: T[], random: RandomSource): void {
  for (let i = array.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const held = array[i];
    array[i] = array[j];
    array[j] = held;
  }
}

/**
 * Shuffle `array` in place and return it.
 *
 * @example
 * ```typescript
 * shuffle([1, 2, 3, 4]); // e.g. [3, 1, 4, 2]
 * ```
 */
export function shuffle<T>(array: T[], random: RandomSource = Math.random): T[] {
  shuffleInPlace(requireArgument(array, 'array'), random);
  return array;
}

/** Index of the last element of `items`, -1 when empty */
export function lastIndex(items: Iterable<unknown>): number {
  const source = requireArgument(items, 'items');
  if (Array.isArray(source)) return source.length - 1;

  let count = 0;
  for (const _ of source) {
    count++;
  }
  return count - 1;
}
