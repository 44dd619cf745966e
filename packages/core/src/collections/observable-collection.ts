/**
 * Observable array whose range operations follow a per-instance batch policy.
 *
 * @module collections/observable-collection
 */

import { CollectionChanges } from '../types/change.js';
import { requireItems } from './arguments.js';
import { applyBatch, type BatchPolicy, resolveBatchPolicy } from './batch-policy.js';
import { ObservableArray } from './observable-array.js';
import type { CollectionOptions } from './types.js';

/**
 * An observable array supporting batch addition and removal.
 *
 * With `notifyOnEachInRange: true`, `addRange` and `removeRange` route every
 * item through `add` / `remove` and raise one event per item, which suits
 * observers that animate individual rows. Otherwise (the default) the range
 * is applied in one go and a single `reset` is raised.
 *
 * @typeParam T - The item type
 *
 * @example
 * ```typescript
 * const rows = new ObservableCollection<string>([], { notifyOnEachInRange: true });
 * rows.addRange(['a', 'b']); // add@0, add@1
 *
 * const bulk = new ObservableCollection<string>();
 * bulk.addRange(['a', 'b']); // reset
 * ```
 */
export class ObservableCollection<T> extends ObservableArray<T> {
  private readonly policy: BatchPolicy;

  constructor(items?: Iterable<T>, options: CollectionOptions<T> = {}) {
    super(items, options);
    this.policy = resolveBatchPolicy(options);
  }

  /** Whether range operations raise one event per item */
  get notifyOnEachInRange(): boolean {
    return this.policy === 'fine';
  }

  /** Append all `items` following the batch policy */
  addRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => this.add(item),
      (batch) => {
        for (const item of batch) {
          this.items.push(item);
        }
        this.notify(CollectionChanges.reset(), { countChanged: true, indexer: true });
      }
    );
  }

  /**
   * Remove the first occurrence of each of `items` following the batch
   * policy. Under the coarse policy `reset` is raised only if at least one
   * element was removed.
   */
  removeRange(items: Iterable<T>): void {
    applyBatch(
      this.policy,
      requireItems(items),
      (item) => {
        this.remove(item);
      },
      (batch) => {
        let anyRemoved = false;
        for (const item of batch) {
          const index = this.indexOf(item);
          if (index >= 0) {
            this.items.splice(index, 1);
            anyRemoved = true;
          }
        }
        if (anyRemoved) {
          this.notify(CollectionChanges.reset(), { countChanged: true, indexer: true });
        }
      }
    );
  }
}
