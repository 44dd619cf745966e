import {
  type BatchPolicy,
  CollectionChanges,
  EmptyCollectionError,
  applyBatch,
  requireItems,
  resolveBatchPolicy,
} from '@ripplekit/core';
import { ConcurrentContainer } from './concurrent-container.js';
import { type ConcurrentSequenceOptions, type TryResult, found, notFound } from './types.js';

/**
 * Guarded LIFO stack. Event indices match `ObservableStack`: `push` raises
 * `add` at `count - 1`, `pop` raises `remove` at 0, and iteration runs top
 * to bottom.
 *
 * @typeParam T - The item type
 */
export class ObservableConcurrentStack<T> extends ConcurrentContainer<T> {
  /** Bottom first */
  private readonly items: T[];
  private readonly policy: BatchPolicy;

  constructor(items?: Iterable<T>, options: ConcurrentSequenceOptions = {}) {
    super('ObservableConcurrentStack', options);
    this.items = items === undefined ? [] : requireItems(items);
    this.policy = resolveBatchPolicy(options);
  }

  get notifyOnEachInRange(): boolean {
    return this.policy === 'fine';
  }

  push(item: T): void {
    const index = this.guard.run('push', () => this.items.push(item) - 1);
    this.notify(CollectionChanges.add(item, index), { countChanged: true });
  }

  pushRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => this.push(item),
      (batch) => {
        this.guard.run('pushRange', () => {
          for (const item of batch) {
            this.items.push(item);
          }
        });
        this.notify(CollectionChanges.reset(), { countChanged: true });
      }
    );
  }

  /**
   * @throws EmptyCollectionError if the stack is empty
   */
  pop(): T {
    const result = this.tryPop();
    if (!result.found) throw new EmptyCollectionError('Stack', 'pop');
    return result.value;
  }

  tryPop(): TryResult<T> {
    const result = this.guard.run('pop', (): TryResult<T> => {
      if (this.items.length === 0) return notFound();
      const [item] = this.items.splice(this.items.length - 1, 1);
      return found(item);
    });
    if (result.found) {
      this.notify(CollectionChanges.remove(result.value, 0), { countChanged: true });
    }
    return result;
  }

  /**
   * @throws EmptyCollectionError if the stack is empty
   */
  peek(): T {
    const result = this.tryPeek();
    if (!result.found) throw new EmptyCollectionError('Stack', 'peek');
    return result.value;
  }

  tryPeek(): TryResult<T> {
    return this.guard.run('peek', (): TryResult<T> =>
      this.items.length === 0 ? notFound() : found(this.items[this.items.length - 1])
    );
  }

  clear(): void {
    const hadItems = this.guard.run('clear', () => {
      const nonEmpty = this.items.length > 0;
      this.items.length = 0;
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

  /** Top first */
  protected copyContents(): T[] {
    return this.items.slice().reverse();
  }
}
