/**
 * Observable first-in, first-out queue.
 *
 * @module collections/observable-queue
 */

import { EmptyCollectionError } from '../errors/ripple-error.js';
import { CollectionChanges } from '../types/change.js';
import { requireItems } from './arguments.js';
import { applyBatch, type BatchPolicy, resolveBatchPolicy } from './batch-policy.js';
import { FifoBuffer } from './fifo-buffer.js';
import { ObservableContainer } from './observable-container.js';
import type { SequenceOptions } from './types.js';

/**
 * A FIFO queue that notifies observers of every enqueue and dequeue.
 *
 * Positions run from the front (index 0) to the back; `enqueue` raises
 * `add` at the new back index and `dequeue` raises `remove` at 0.
 *
 * @typeParam T - The item type
 */
export class ObservableQueue<T> extends ObservableContainer<T> {
  private readonly items: FifoBuffer<T>;
  private readonly policy: BatchPolicy;

  constructor(items?: Iterable<T>, options: SequenceOptions = {}) {
    super();
    this.items = new FifoBuffer(items === undefined ? [] : requireItems(items));
    this.policy = resolveBatchPolicy(options);
  }

  get count(): number {
    return this.items.length;
  }

  /** Whether `enqueueRange` raises one event per item */
  get notifyOnEachInRange(): boolean {
    return this.policy === 'fine';
  }

  /** Iterates front to back */
  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /** Add `item` at the back */
  enqueue(item: T): void {
    const index = this.items.push(item);
    this.notify(CollectionChanges.add(item, index), { countChanged: true });
  }

  /** Add all `items` at the back, following the batch policy */
  enqueueRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => this.enqueue(item),
      (batch) => {
        for (const item of batch) {
          this.items.push(item);
        }
        this.notify(CollectionChanges.reset(), { countChanged: true });
      }
    );
  }

  /**
   * Remove and return the front item.
   *
   * @throws EmptyCollectionError if the queue is empty
   */
  dequeue(): T {
    if (this.items.length === 0) throw new EmptyCollectionError('Queue', 'dequeue');
    const item = this.items.shift();
    this.notify(CollectionChanges.remove(item, 0), { countChanged: true });
    return item;
  }

  /**
   * Return the front item without removing it.
   *
   * @throws EmptyCollectionError if the queue is empty
   */
  peek(): T {
    if (this.items.length === 0) throw new EmptyCollectionError('Queue', 'peek');
    return this.items.peek();
  }

  clear(): void {
    const hadItems = this.items.length > 0;
    this.items.clear();
    this.notify(CollectionChanges.reset(), { countChanged: hadItems });
  }

  contains(item: T): boolean {
    return this.items.includes(item);
  }
}
