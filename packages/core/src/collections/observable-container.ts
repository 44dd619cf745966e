/**
 * Shared notification plumbing for every notifying container.
 *
 * @module collections/observable-container
 */

import { type Observable, Subject, type Subscription } from 'rxjs';
import { IndexOutOfRangeError } from '../errors/ripple-error.js';
import type { CollectionChange } from '../types/change.js';
import { CountProperty, IndexerProperty, type PropertyId } from '../types/property.js';
import type { ObservableSource } from '../types/source.js';

/**
 * Which property notifications accompany a collection change
 */
export interface NotifyFlags {
  /** The container's size changed */
  countChanged?: boolean;
  /** An indexed value changed (indexable containers only) */
  indexer?: boolean;
}

/**
 * Base class for containers that publish mutation descriptors and property
 * notifications.
 *
 * Subclasses mutate their backing storage first and then call
 * {@link notify}, which raises `Count` (when the size changed), then the
 * indexer, then the collection change. Observers of the change therefore
 * always read the updated `count`.
 *
 * Both channels are synchronous rxjs Subjects: observers run inline on the
 * mutating call, before it returns, and cannot veto the mutation.
 *
 * @typeParam T - The item type
 */
export abstract class ObservableContainer<T> implements ObservableSource<T> {
  private readonly collectionChanged$$ = new Subject<CollectionChange<T>>();
  private readonly propertyChanged$$ = new Subject<PropertyId>();
  private disposed = false;

  /** Mutation descriptors, one per logical change */
  readonly collectionChanged$: Observable<CollectionChange<T>> =
    this.collectionChanged$$.asObservable();

  /** `Count` and indexer notifications */
  readonly propertyChanged$: Observable<PropertyId> = this.propertyChanged$$.asObservable();

  /** Number of items currently held */
  abstract get count(): number;

  abstract [Symbol.iterator](): Iterator<T>;

  /** Whether {@link dispose} has been called */
  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Subscribe a handler to the collection-changed channel.
   *
   * @returns Subscription to unsubscribe the handler
   */
  onCollectionChanged(handler: (change: CollectionChange<T>) => void): Subscription {
    return this.collectionChanged$.subscribe(handler);
  }

  /**
   * Subscribe a handler to the property-changed channel.
   *
   * @returns Subscription to unsubscribe the handler
   */
  onPropertyChanged(handler: (property: PropertyId) => void): Subscription {
    return this.propertyChanged$.subscribe(handler);
  }

  /** Copy the current contents into a new array */
  toArray(): T[] {
    return Array.from(this);
  }

  /**
   * Copy the current contents into `target`, starting at `targetIndex`.
   */
  copyTo(target: T[], targetIndex = 0): void {
    if (!Number.isInteger(targetIndex) || targetIndex < 0 || targetIndex > target.length) {
      throw new IndexOutOfRangeError('targetIndex', targetIndex, target.length);
    }
    let position = targetIndex;
    for (const item of this.toArray()) {
      target[position++] = item;
    }
  }

  /**
   * Complete both channels. Subscribers receive `complete` and are released;
   * the contents stay readable and mutable, but nothing is notified anymore.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.propertyChanged$$.complete();
    this.collectionChanged$$.complete();
  }

  // ── Notification ─────────────────────────────────────────────────────

  protected notify(change: CollectionChange<T>, flags: NotifyFlags = {}): void {
    if (flags.countChanged) this.raisePropertyChanged(CountProperty);
    if (flags.indexer) this.raisePropertyChanged(IndexerProperty);
    this.collectionChanged$$.next(change);
  }

  protected raisePropertyChanged(property: PropertyId): void {
    this.propertyChanged$$.next(property);
  }
}
