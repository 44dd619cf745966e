import type { Observable } from 'rxjs';
import type { CollectionChange } from './change.js';
import type { PropertyId } from './property.js';

/**
 * Read side shared by every notifying container.
 *
 * Anything that can be iterated, reports its size and publishes both
 * notification channels can act as the source of a reactive view.
 *
 * @typeParam T - The item type
 */
export interface ObservableSource<T> extends Iterable<T> {
  /** Number of items currently held */
  readonly count: number;
  /** Mutation descriptors, delivered synchronously in mutation order */
  readonly collectionChanged$: Observable<CollectionChange<T>>;
  /** Property identifiers for `Count`, the indexer or named properties */
  readonly propertyChanged$: Observable<PropertyId>;
}

/**
 * Read-only indexed view over a container's contents.
 */
export interface ReadOnlyList<T> extends Iterable<T> {
  readonly count: number;
  get(index: number): T;
  indexOf(item: T): number;
  contains(item: T): boolean;
  toArray(): T[];
}
