/**
 * Observable dynamic array with coarse range notifications.
 *
 * @module collections/observable-list
 */

import { CollectionChanges } from '../types/change.js';
import { IndexOutOfRangeError } from '../errors/ripple-error.js';
import { shuffleInPlace } from '../extensions/collection-utils.js';
import {
  checkIndex,
  checkInsertIndex,
  checkRange,
  requireArgument,
  requireItems,
} from './arguments.js';
import { ObservableArray } from './observable-array.js';
import type { ListOptions, RandomSource } from './types.js';

/**
 * A list that notifies observers when items are added, removed, replaced,
 * moved, or when the whole list is rewritten.
 *
 * Every multi-item operation (`addRange`, `insertRange`, `removeRange`,
 * `removeAll`, `reverse`, `overwrite`, `shuffle`, ...) applies all of its
 * changes and then raises a single `reset`. An operation that changes
 * nothing raises nothing.
 *
 * @typeParam T - The item type
 *
 * @example
 * ```typescript
 * const list = new ObservableList(['a', 'b']);
 *
 * list.collectionChanged$.subscribe((change) => console.log(change.type));
 * list.propertyChanged$.subscribe((property) => console.log(propertyName(property)));
 *
 * list.add('c');            // Count, Item[], add
 * list.addRange(['d', 'e']); // Count, Item[], reset
 * list.move(0, 4);           // Item[], move
 * ```
 */
export class ObservableList<T> extends ObservableArray<T> {
  constructor(items?: Iterable<T>, options: ListOptions<T> = {}) {
    super(items, options);
  }

  /** Index of the last element, -1 when empty */
  get lastIndex(): number {
    return this.items.length - 1;
  }

  /** Append all `items` and raise a single `reset` */
  addRange(items: Iterable<T>): void {
    const added = requireItems(items);
    if (added.length === 0) return;

    for (const item of added) {
      this.items.push(item);
    }
    this.notifyReset(true);
  }

  /**
   * Insert all `items` at `index` and raise a single `reset`.
   *
   * @throws IndexOutOfRangeError if `index` is outside `[0, count]`
   */
  insertRange(index: number, items: Iterable<T>): void {
    checkInsertIndex('index', index, this.items.length);
    const inserted = requireItems(items);
    if (inserted.length === 0) return;

    const tail = this.items.splice(index);
    for (const item of inserted) {
      this.items.push(item);
    }
    for (const item of tail) {
      this.items.push(item);
    }
    this.notifyReset(true);
  }

  /**
   * Remove `count` elements starting at `index` and raise a single `reset`.
   *
   * @throws IndexOutOfRangeError if the range is not within the list
   */
  removeRange(index: number, count: number): void {
    checkRange(index, count, this.items.length);
    if (count === 0) return;

    this.items.splice(index, count);
    this.notifyReset(true);
  }

  /**
   * Remove every element matching `predicate`.
   *
   * @returns Number of removed elements
   */
  removeAll(predicate: (item: T) => boolean): number {
    requireArgument(predicate, 'predicate');
    const kept = this.items.filter((item) => !predicate(item));
    const removed = this.items.length - kept.length;
    if (removed === 0) return 0;

    this.replaceContents(kept);
    this.notifyReset(true);
    return removed;
  }

  /** Remove the first element matching `predicate`, raising `remove` */
  removeFirst(predicate: (item: T) => boolean): boolean {
    requireArgument(predicate, 'predicate');
    const index = this.items.findIndex(predicate);
    if (index < 0) return false;
    this.removeAt(index);
    return true;
  }

  /** Remove the last element matching `predicate`, raising `remove` */
  removeLast(predicate: (item: T) => boolean): boolean {
    requireArgument(predicate, 'predicate');
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (predicate(this.items[i])) {
        this.removeAt(i);
        return true;
      }
    }
    return false;
  }

  /** Index of the last element equal to `item`, or -1 */
  lastIndexOf(item: T): number {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.equals(this.items[i], item)) return i;
    }
    return -1;
  }

  /**
   * Exchange the elements at `first` and `second`.
   *
   * @throws IndexOutOfRangeError if either index is outside `[0, count)`
   */
  swap(first: number, second: number): void {
    checkIndex('first', first, this.items.length);
    checkIndex('second', second, this.items.length);
    if (first === second) return;

    const item = this.items[first];
    this.items[first] = this.items[second];
    this.items[second] = item;
    this.notifyReset(false);
  }

  /**
   * Reverse the order of `count` elements starting at `index`
   * (the whole list by default).
   */
  reverse(index = 0, count = this.items.length - index): void {
    checkRange(index, count, this.items.length);
    if (count < 2) return;

    for (let low = index, high = index + count - 1; low < high; low++, high--) {
      const item = this.items[low];
      this.items[low] = this.items[high];
      this.items[high] = item;
    }
    this.notifyReset(false);
  }

  /** Clear the list and fill it with `items`, raising a single `reset` */
  overwrite(items: Iterable<T>): void {
    const next = requireItems(items);
    const previousCount = this.items.length;
    if (previousCount === 0 && next.length === 0) return;

    this.replaceContents(next);
    this.notifyReset(previousCount !== next.length);
  }

  /**
   * Shrink the list to at most `maxSize` elements, keeping the last ones.
   */
  trimStartDownTo(maxSize: number): void {
    this.checkMaxSize(maxSize);
    if (this.items.length <= maxSize) return;

    this.items.splice(0, this.items.length - maxSize);
    this.notifyReset(true);
  }

  /**
   * Shrink the list to at most `maxSize` elements, keeping the first ones.
   */
  trimEndDownTo(maxSize: number): void {
    this.checkMaxSize(maxSize);
    if (this.items.length <= maxSize) return;

    this.items.length = maxSize;
    this.notifyReset(true);
  }

  /**
   * Randomly reorder the list in place.
   *
   * @param random - Source of floats in `[0, 1)` (default: `Math.random`)
   * @returns This list
   */
  shuffle(random: RandomSource = Math.random): this {
    if (this.items.length < 2) return this;

    shuffleInPlace(this.items, random);
    this.notifyReset(false);
    return this;
  }

  /**
   * Copy `count` elements starting at `start` into a new, independent list
   * with the same options.
   */
  copy(start = 0, count = this.items.length - start): ObservableList<T> {
    checkRange(start, count, this.items.length);
    return new ObservableList(this.items.slice(start, start + count), { equals: this.equals });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private replaceContents(next: readonly T[]): void {
    this.items.length = 0;
    for (const item of next) {
      this.items.push(item);
    }
  }

  private checkMaxSize(maxSize: number): void {
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new IndexOutOfRangeError('maxSize', maxSize, this.items.length);
    }
  }

  private notifyReset(countChanged: boolean): void {
    this.notify(CollectionChanges.reset(), { countChanged, indexer: true });
  }
}
