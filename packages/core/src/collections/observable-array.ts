/**
 * Index-based container core shared by {@link ObservableList} and
 * {@link ObservableCollection}.
 *
 * @module collections/observable-array
 */

import { defaultEquals, type EqualityComparer } from '../types/compare.js';
import { CollectionChanges } from '../types/change.js';
import type { ReadOnlyList } from '../types/source.js';
import { checkIndex, checkInsertIndex, requireItems } from './arguments.js';
import { ObservableContainer } from './observable-container.js';
import type { ListOptions } from './types.js';

/**
 * A dynamic array that notifies observers of every mutation.
 *
 * Single-item operations raise precise events (`add`, `remove`, `replace`,
 * `move`); range operations are defined by subclasses according to their
 * batch policy.
 *
 * @typeParam T - The item type
 */
export abstract class ObservableArray<T> extends ObservableContainer<T> implements ReadOnlyList<T> {
  protected readonly items: T[];
  protected readonly equals: EqualityComparer<T>;

  constructor(items?: Iterable<T>, options: ListOptions<T> = {}) {
    super();
    this.items = items === undefined ? [] : requireItems(items);
    this.equals = options.equals ?? defaultEquals;
  }

  get count(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /**
   * Get the element at `index`.
   *
   * @throws IndexOutOfRangeError if `index` is outside `[0, count)`
   */
  get(index: number): T {
    checkIndex('index', index, this.items.length);
    return this.items[index];
  }

  /**
   * Replace the element at `index` and raise `replace`.
   *
   * @throws IndexOutOfRangeError if `index` is outside `[0, count)`
   */
  set(index: number, value: T): void {
    checkIndex('index', index, this.items.length);
    const oldItem = this.items[index];
    this.items[index] = value;
    this.notify(CollectionChanges.replace(oldItem, value, index), { indexer: true });
  }

  /** Append `item` and raise `add` at the new last index */
  add(item: T): void {
    this.items.push(item);
    this.notify(CollectionChanges.add(item, this.items.length - 1), {
      countChanged: true,
      indexer: true,
    });
  }

  /**
   * Insert `item` at `index` and raise `add` at that index.
   *
   * @throws IndexOutOfRangeError if `index` is outside `[0, count]`
   */
  insert(index: number, item: T): void {
    checkInsertIndex('index', index, this.items.length);
    this.items.splice(index, 0, item);
    this.notify(CollectionChanges.add(item, index), { countChanged: true, indexer: true });
  }

  /**
   * Remove the first element equal to `item`.
   *
   * @returns `false` (and raises nothing) when no element matched
   */
  remove(item: T): boolean {
    const index = this.indexOf(item);
    if (index < 0) return false;
    this.removeAt(index);
    return true;
  }

  /**
   * Remove the element at `index` and raise `remove`.
   *
   * @throws IndexOutOfRangeError if `index` is outside `[0, count)`
   */
  removeAt(index: number): void {
    checkIndex('index', index, this.items.length);
    const [removed] = this.items.splice(index, 1);
    this.notify(CollectionChanges.remove(removed, index), { countChanged: true, indexer: true });
  }

  /** Remove every element and raise `reset` */
  clear(): void {
    const hadItems = this.items.length > 0;
    this.items.length = 0;
    this.notify(CollectionChanges.reset(), { countChanged: hadItems, indexer: true });
  }

  /**
   * Move the element at `oldIndex` to `newIndex` and raise `move`.
   *
   * Both indices are checked against the current count. Moving an element
   * onto itself does nothing.
   *
   * @throws IndexOutOfRangeError if either index is outside `[0, count)`
   */
  move(oldIndex: number, newIndex: number): void {
    checkIndex('oldIndex', oldIndex, this.items.length);
    checkIndex('newIndex', newIndex, this.items.length);
    if (oldIndex === newIndex) return;

    const [item] = this.items.splice(oldIndex, 1);
    this.items.splice(newIndex, 0, item);
    this.notify(CollectionChanges.move(item, oldIndex, newIndex), { indexer: true });
  }

  contains(item: T): boolean {
    return this.indexOf(item) >= 0;
  }

  /** Index of the first element equal to `item` at or after `fromIndex`, or -1 */
  indexOf(item: T, fromIndex = 0): number {
    for (let i = Math.max(0, fromIndex); i < this.items.length; i++) {
      if (this.equals(this.items[i], item)) return i;
    }
    return -1;
  }

  /**
   * A live read-only wrapper: reads go through to this container, writes
   * are not possible through the wrapper.
   */
  asReadOnly(): ReadOnlyList<T> {
    const owner = this;
    return {
      get count() {
        return owner.count;
      },
      get: (index) => owner.get(index),
      indexOf: (item) => owner.indexOf(item),
      contains: (item) => owner.contains(item),
      toArray: () => owner.toArray(),
      [Symbol.iterator]: () => owner[Symbol.iterator](),
    };
  }
}
