/**
 * Mutation descriptors emitted on a container's collection-changed channel.
 *
 * @module types/change
 */

/**
 * Kind of mutation a {@link CollectionChange} describes
 */
export type CollectionChangeType = 'add' | 'remove' | 'replace' | 'move' | 'reset';

/**
 * One or more items were added. `startIndex` is the position of the first
 * item, absent for unordered containers such as sets.
 */
export interface AddChange<T> {
  readonly type: 'add';
  readonly items: readonly T[];
  readonly startIndex?: number;
}

/**
 * One or more items were removed. `index` is the position the first item
 * occupied before removal, absent for unordered containers.
 */
export interface RemoveChange<T> {
  readonly type: 'remove';
  readonly items: readonly T[];
  readonly index?: number;
}

/** An item was overwritten in place */
export interface ReplaceChange<T> {
  readonly type: 'replace';
  readonly oldItem: T;
  readonly newItem: T;
  readonly index: number;
}

/** An item was relocated */
export interface MoveChange<T> {
  readonly type: 'move';
  readonly item: T;
  readonly oldIndex: number;
  readonly newIndex: number;
}

/** Contents changed substantially; observers should re-read everything */
export interface ResetChange {
  readonly type: 'reset';
}

/**
 * Structured record of one logical change to a container.
 *
 * @typeParam T - The container's item type
 *
 * @example
 * ```typescript
 * list.collectionChanged$.subscribe((change) => {
 *   switch (change.type) {
 *     case 'add':
 *       renderRows(change.startIndex ?? 0, change.items);
 *       break;
 *     case 'reset':
 *       renderAll(list.toArray());
 *       break;
 *   }
 * });
 * ```
 */
export type CollectionChange<T> =
  | AddChange<T>
  | RemoveChange<T>
  | ReplaceChange<T>
  | MoveChange<T>
  | ResetChange;

const RESET: ResetChange = Object.freeze({ type: 'reset' });

/**
 * Builders for {@link CollectionChange} values.
 */
export const CollectionChanges = {
  add<T>(item: T, startIndex?: number): AddChange<T> {
    return startIndex === undefined
      ? { type: 'add', items: [item] }
      : { type: 'add', items: [item], startIndex };
  },

  remove<T>(item: T, index?: number): RemoveChange<T> {
    return index === undefined
      ? { type: 'remove', items: [item] }
      : { type: 'remove', items: [item], index };
  },

  replace<T>(oldItem: T, newItem: T, index: number): ReplaceChange<T> {
    return { type: 'replace', oldItem, newItem, index };
  },

  move<T>(item: T, oldIndex: number, newIndex: number): MoveChange<T> {
    return { type: 'move', item, oldIndex, newIndex };
  },

  reset(): ResetChange {
    return RESET;
  },
} as const;

/**
 * Key/value entry carried by dictionary change events and iteration.
 */
export interface KeyValuePair<K, V> {
  readonly key: K;
  readonly value: V;
}

/** Create a {@link KeyValuePair} */
export function pair<K, V>(key: K, value: V): KeyValuePair<K, V> {
  return { key, value };
}
