import type { CollectionOptions, DictionaryOptions, SequenceOptions } from '@ripplekit/core';
import type { GuardOptions } from './exclusive-guard.js';

/** Options for {@link ObservableConcurrentList} */
export interface ConcurrentCollectionOptions<T> extends CollectionOptions<T>, GuardOptions {}

/** Options for {@link ObservableConcurrentDictionary} */
export interface ConcurrentDictionaryOptions<V> extends DictionaryOptions<V>, GuardOptions {}

/** Options for {@link ObservableConcurrentQueue} and {@link ObservableConcurrentStack} */
export interface ConcurrentSequenceOptions extends SequenceOptions, GuardOptions {}

/**
 * Outcome of a `try*` read or removal.
 */
export type TryResult<T> = { found: true; value: T } | { found: false; value: undefined };

export function found<T>(value: T): TryResult<T> {
  return { found: true, value };
}

export function notFound<T>(): TryResult<T> {
  return { found: false, value: undefined };
}
