/**
 * Observable last-in, first-out stack.
 *
 * @module collections/observable-stack
 */

import { EmptyCollectionError } from '../errors/ripple-error.js';
import { CollectionChanges } from '../types/change.js';
import { requireItems } from './arguments.js';
import { applyBatch, type BatchPolicy, resolveBatchPolicy } from './batch-policy.js';
import { ObservableContainer } from './observable-container.js';
import type { SequenceOptions } from './types.js';

/**
 * A LIFO stack that notifies observers of every push and pop.
 *
 * Iteration runs top to bottom. `push` raises `add` at the new item's
 * depth from the bottom (`count - 1`), so pushes in a fine-grained range
 * carry increasing indices; `pop` raises `remove` at 0, the front of
 * iteration. Seeding from a sequence pushes its items in order, so the
 * last one ends up on top.
 *
 * @typeParam T - The item type
 */
export class ObservableStack<T> extends ObservableContainer<T> {
  /** Bottom first; the top is the last element */
  private readonly items: T[];
  private readonly policy: BatchPolicy;

  constructor(items?: Iterable<T>, options: SequenceOptions = {}) {
    super();
    this.items = items === undefined ? [] : requireItems(items);
    this.policy = resolveBatchPolicy(options);
  }

  get count(): number {
    return this.items.length;
  }

  /** Whether `pushRange` raises one event per item */
  get notifyOnEachInRange(): boolean {
    return this.policy === 'fine';
  }

  /** Iterates top to bottom */
  *[Symbol.iterator](): Iterator<T> {
    for (let i = this.items.length - 1; i >= 0; i--) {
      yield this.items[i];
    }
  }

  /** Put `item` on top */
  push(item: T): void {
    const index = this.items.push(item) - 1;
    this.notify(CollectionChanges.add(item, index), { countChanged: true });
  }

  /** Push all `items` in order, following the batch policy */
  pushRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => this.push(item),
      (batch) => {
        for (const item of batch) {
          this.items.push(item);
        }
        this.notify(CollectionChanges.reset(), { countChanged: true });
      }
    );
  }

  /**
   * Remove and return the top item.
   *
   * @throws EmptyCollectionError if the stack is empty
   */
  pop(): T {
    if (this.items.length === 0) throw new EmptyCollectionError('Stack', 'pop');
    const [item] = this.items.splice(this.items.length - 1, 1);
    this.notify(CollectionChanges.remove(item, 0), { countChanged: true });
    return item;
  }

  /**
   * Return the top item without removing it.
   *
   * @throws EmptyCollectionError if the stack is empty
   */
  peek(): T {
    if (this.items.length === 0) throw new EmptyCollectionError('Stack', 'peek');
    return this.items[this.items.length - 1];
  }

  clear(): void {
    const hadItems = this.items.length > 0;
    this.items.length = 0;
    this.notify(CollectionChanges.reset(), { countChanged: hadItems });
  }

  contains(item: T): boolean {
    return this.items.includes(item);
  }
}
