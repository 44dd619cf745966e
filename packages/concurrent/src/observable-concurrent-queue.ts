import {
  type BatchPolicy,
  CollectionChanges,
  EmptyCollectionError,
  FifoBuffer,
  applyBatch,
  requireItems,
  resolveBatchPolicy,
} from '@ripplekit/core';
import { ConcurrentContainer } from './concurrent-container.js';
import { type ConcurrentSequenceOptions, type TryResult, found, notFound } from './types.js';

/**
 * Guarded FIFO queue. Event indices match `ObservableQueue`: `add` at the
 * new back position, `remove` at 0.
 *
 * @typeParam T - The item type
 */
export class ObservableConcurrentQueue<T> extends ConcurrentContainer<T> {
  private readonly items: FifoBuffer<T>;
  private readonly policy: BatchPolicy;

  constructor(items?: Iterable<T>, options: ConcurrentSequenceOptions = {}) {
    super('ObservableConcurrentQueue', options);
    this.items = new FifoBuffer(items === undefined ? [] : requireItems(items));
    this.policy = resolveBatchPolicy(options);
  }

  get notifyOnEachInRange(): boolean {
    return this.policy === 'fine';
  }

  enqueue(item: T): void {
    const index = this.guard.run('enqueue', () => this.items.push(item));
    this.notify(CollectionChanges.add(item, index), { countChanged: true });
  }

  enqueueRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => this.enqueue(item),
      (batch) => {
        this.guard.run('enqueueRange', () => {
          for (const item of batch) {
            this.items.push(item);
          }
        });
        this.notify(CollectionChanges.reset(), { countChanged: true });
      }
    );
  }

  /**
   * @throws EmptyCollectionError if the queue is empty
   */
  dequeue(): T {
    const result = this.tryDequeue();
    if (!result.found) throw new EmptyCollectionError('Queue', 'dequeue');
    return result.value;
  }

  tryDequeue(): TryResult<T> {
    const result = this.guard.run('dequeue', (): TryResult<T> => {
      if (this.items.length === 0) return notFound();
      return found(this.items.shift());
    });
    if (result.found) {
      this.notify(CollectionChanges.remove(result.value, 0), { countChanged: true });
    }
    return result;
  }

  /**
   * @throws EmptyCollectionError if the queue is empty
   */
  peek(): T {
    const result = this.tryPeek();
    if (!result.found) throw new EmptyCollectionError('Queue', 'peek');
    return result.value;
  }

  tryPeek(): TryResult<T> {
    return this.guard.run('peek', (): TryResult<T> =>
      this.items.length === 0 ? notFound() : found(this.items.peek())
    );
  }

  clear(): void {
    const hadItems = this.guard.run('clear', () => {
      const nonEmpty = this.items.length > 0;
      this.items.clear();
      return nonEmpty;
    });
    this.notify(CollectionChanges.reset(), { countChanged: hadItems });
  }

  contains(item: T): boolean {
    return this.guard.run('contains', () => this.items.includes(item));
  }

  protected size(): number {
    return this.items.length;
  }

  protected copyContents(): T[] {
    return this.items.toArray();
  }
}
