import {
  type BatchPolicy,
  CollectionChanges,
  type EqualityComparer,
  applyBatch,
  checkIndex,
  checkInsertIndex,
  defaultEquals,
  requireItems,
  resolveBatchPolicy,
} from '@ripplekit/core';
import { ConcurrentContainer } from './concurrent-container.js';
import type { ConcurrentCollectionOptions } from './types.js';

/**
 * Guarded counterpart of `ObservableCollection`.
 *
 * Each call validates and mutates the storage inside one guard section and
 * notifies afterwards. Range operations follow `notifyOnEachInRange`: the
 * fine policy takes the guard once per item, the coarse policy once for the
 * whole range.
 *
 * @typeParam T - The item type
 */
export class ObservableConcurrentList<T> extends ConcurrentContainer<T> {
  private readonly items: T[];
  private readonly equals: EqualityComparer<T>;
  private readonly policy: BatchPolicy;

  constructor(items?: Iterable<T>, options: ConcurrentCollectionOptions<T> = {}) {
    super('ObservableConcurrentList', options);
    this.items = items === undefined ? [] : requireItems(items);
    this.equals = options.equals ?? defaultEquals;
    this.policy = resolveBatchPolicy(options);
  }

  get notifyOnEachInRange(): boolean {
    return this.policy === 'fine';
  }

  get(index: number): T {
    return this.guard.run('get', () => {
      checkIndex('index', index, this.items.length);
      return this.items[index];
    });
  }

  set(index: number, item: T): void {
    const oldItem = this.guard.run('set', () => {
      checkIndex('index', index, this.items.length);
      const previous = this.items[index];
      this.items[index] = item;
      return previous;
    });
    this.notify(CollectionChanges.replace(oldItem, item, index), { indexer: true });
  }

  add(item: T): void {
    const index = this.guard.run('add', () => this.items.push(item) - 1);
    this.notify(CollectionChanges.add(item, index), { countChanged: true, indexer: true });
  }

  insert(index: number, item: T): void {
    this.guard.run('insert', () => {
      checkInsertIndex('index', index, this.items.length);
      this.items.splice(index, 0, item);
    });
    this.notify(CollectionChanges.add(item, index), { countChanged: true, indexer: true });
  }

  /** Remove the first element equal to `item`; the event carries the stored element */
  remove(item: T): boolean {
    const removed = this.guard.run('remove', () => {
      const index = this.find(item);
      if (index < 0) return undefined;
      const [stored] = this.items.splice(index, 1);
      return { index, stored };
    });
    if (removed === undefined) return false;

    this.notify(CollectionChanges.remove(removed.stored, removed.index), {
      countChanged: true,
      indexer: true,
    });
    return true;
  }

  removeAt(index: number): T {
    const removed = this.guard.run('removeAt', () => {
      checkIndex('index', index, this.items.length);
      const [item] = this.items.splice(index, 1);
      return item;
    });
    this.notify(CollectionChanges.remove(removed, index), { countChanged: true, indexer: true });
    return removed;
  }

  clear(): void {
    const hadItems = this.guard.run('clear', () => {
      const nonEmpty = this.items.length > 0;
      this.items.length = 0;
      return nonEmpty;
    });
    this.notify(CollectionChanges.reset(), { countChanged: hadItems, indexer: true });
  }

  /** Move the item at `oldIndex` to `newIndex`; equal indices do nothing */
  move(oldIndex: number, newIndex: number): void {
    const item = this.guard.run('move', () => {
      checkIndex('oldIndex', oldIndex, this.items.length);
      checkIndex('newIndex', newIndex, this.items.length);
      if (oldIndex === newIndex) return undefined;
      const [moved] = this.items.splice(oldIndex, 1);
      this.items.splice(newIndex, 0, moved);
      return { moved };
    });
    if (item === undefined) return;

    this.notify(CollectionChanges.move(item.moved, oldIndex, newIndex), { indexer: true });
  }

  contains(item: T): boolean {
    return this.indexOf(item) >= 0;
  }

  indexOf(item: T): number {
    return this.guard.run('indexOf', () => this.find(item));
  }

  addRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => this.add(item),
      (batch) => {
        this.guard.run('addRange', () => {
          for (const item of batch) {
            this.items.push(item);
          }
        });
        this.notify(CollectionChanges.reset(), { countChanged: true, indexer: true });
      }
    );
  }

  /** Remove the first occurrence of each of `items` */
  removeRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => {
        this.remove(item);
      },
      (batch) => {
        const anyRemoved = this.guard.run('removeRange', () => {
          let removed = false;
          for (const item of batch) {
            const index = this.find(item);
            if (index >= 0) {
              this.items.splice(index, 1);
              removed = true;
            }
          }
          return removed;
        });
        if (anyRemoved) {
          this.notify(CollectionChanges.reset(), { countChanged: true, indexer: true });
        }
      }
    );
  }

  protected size(): number {
    return this.items.length;
  }

  protected copyContents(): T[] {
    return this.items.slice();
  }

  private find(item: T): number {
    return this.items.findIndex((candidate) => this.equals(candidate, item));
  }
}
