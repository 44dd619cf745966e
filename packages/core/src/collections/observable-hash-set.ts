/**
 * Observable set.
 *
 * @module collections/observable-hash-set
 */

import { CollectionChanges } from '../types/change.js';
import { requireItems } from './arguments.js';
import { ObservableContainer } from './observable-container.js';

/**
 * A set that notifies observers when membership changes.
 *
 * `add` and `remove` are idempotent: an element that is already present
 * (or absent) yields `false` and no notification. Elements compare with
 * SameValueZero, like the native `Set`.
 *
 * The in-place algebra (`unionWith`, `intersectWith`, `exceptWith`,
 * `symmetricExceptWith`) raises a single `reset` when the contents changed,
 * preceded by `Count` when the size changed, and nothing otherwise.
 *
 * Set events carry no index.
 *
 * @typeParam T - The element type
 */
export class ObservableHashSet<T> extends ObservableContainer<T> {
  private readonly elements: Set<T>;

  constructor(items?: Iterable<T>) {
    super();
    this.elements = new Set(items === undefined ? [] : requireItems(items));
  }

  get count(): number {
    return this.elements.size;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.elements[Symbol.iterator]();
  }

  /**
   * Add `item`.
   *
   * @returns `true` and raises `add` if the element was new, `false` otherwise
   */
  add(item: T): boolean {
    if (this.elements.has(item)) return false;
    this.elements.add(item);
    this.notify(CollectionChanges.add(item), { countChanged: true });
    return true;
  }

  /**
   * Remove `item`.
   *
   * @returns `true` and raises `remove` if the element was present
   */
  remove(item: T): boolean {
    if (!this.elements.delete(item)) return false;
    this.notify(CollectionChanges.remove(item), { countChanged: true });
    return true;
  }

  clear(): void {
    const hadElements = this.elements.size > 0;
    this.elements.clear();
    this.notify(CollectionChanges.reset(), { countChanged: hadElements });
  }

  contains(item: T): boolean {
    return this.elements.has(item);
  }

  // ── Queries ──────────────────────────────────────────────────────────

  isSubsetOf(other: Iterable<T>): boolean {
    const set = new Set(requireItems(other, 'other'));
    return this.every((item) => set.has(item));
  }

  isProperSubsetOf(other: Iterable<T>): boolean {
    const set = new Set(requireItems(other, 'other'));
    return set.size > this.elements.size && this.every((item) => set.has(item));
  }

  isSupersetOf(other: Iterable<T>): boolean {
    return requireItems(other, 'other').every((item) => this.elements.has(item));
  }

  isProperSupersetOf(other: Iterable<T>): boolean {
    const set = new Set(requireItems(other, 'other'));
    return this.elements.size > set.size && this.isSupersetOf(set);
  }

  overlaps(other: Iterable<T>): boolean {
    return requireItems(other, 'other').some((item) => this.elements.has(item));
  }

  setEquals(other: Iterable<T>): boolean {
    const set = new Set(requireItems(other, 'other'));
    return set.size === this.elements.size && this.isSupersetOf(set);
  }

  // ── In-place algebra ─────────────────────────────────────────────────

  /** Add every element of `other` */
  unionWith(other: Iterable<T>): void {
    const before = this.elements.size;
    for (const item of requireItems(other, 'other')) {
      this.elements.add(item);
    }
    this.notifyBulk(before, this.elements.size !== before);
  }

  /** Keep only elements also contained in `other` */
  intersectWith(other: Iterable<T>): void {
    const set = new Set(requireItems(other, 'other'));
    const before = this.elements.size;
    for (const item of Array.from(this.elements)) {
      if (!set.has(item)) this.elements.delete(item);
    }
    this.notifyBulk(before, this.elements.size !== before);
  }

  /** Remove every element of `other` */
  exceptWith(other: Iterable<T>): void {
    const before = this.elements.size;
    for (const item of requireItems(other, 'other')) {
      this.elements.delete(item);
    }
    this.notifyBulk(before, this.elements.size !== before);
  }

  /** Keep elements present in exactly one of this set and `other` */
  symmetricExceptWith(other: Iterable<T>): void {
    const set = new Set(requireItems(other, 'other'));
    const before = this.elements.size;
    let changed = false;
    for (const item of set) {
      if (this.elements.has(item)) {
        this.elements.delete(item);
      } else {
        this.elements.add(item);
      }
      changed = true;
    }
    this.notifyBulk(before, changed);
  }

  // ── Private ──────────────────────────────────────────────────────────

  private every(predicate: (item: T) => boolean): boolean {
    for (const item of this.elements) {
      if (!predicate(item)) return false;
    }
    return true;
  }

  private notifyBulk(countBefore: number, changed: boolean): void {
    if (!changed) return;
    this.notify(CollectionChanges.reset(), {
      countChanged: this.elements.size !== countBefore,
    });
  }
}
