/**
 * Build notifying containers from plain sequences.
 *
 * Each helper materializes its input once. `null` or `undefined` input throws
 * {@link NullArgumentError}.
 *
 * @module extensions/conversions
 */

import { requireArgument } from '../collections/arguments.js';
import { ObservableCollection } from '../collections/observable-collection.js';
import { type DictionarySeed, ObservableDictionary } from '../collections/observable-dictionary.js';
import { ObservableHashSet } from '../collections/observable-hash-set.js';
import { ObservableList } from '../collections/observable-list.js';
import { ObservableQueue } from '../collections/observable-queue.js';
import { ObservableStack } from '../collections/observable-stack.js';
import type {
  CollectionOptions,
  DictionaryOptions,
  ListOptions,
  SequenceOptions,
} from '../collections/types.js';

export function toObservableList<T>(
  items: Iterable<T> | null | undefined,
  options?: ListOptions<T>
): ObservableList<T> {
  return new ObservableList(requireArgument(items, 'items'), options);
}

export function toObservableCollection<T>(
  items: Iterable<T> | null | undefined,
  options?: CollectionOptions<T>
): ObservableCollection<T> {
  return new ObservableCollection(requireArgument(items, 'items'), options);
}

/**
 * @throws DuplicateKeyError if `entries` repeats a key
 */
export function toObservableDictionary<K, V>(
  entries: DictionarySeed<K, V> | null | undefined,
  options?: DictionaryOptions<V>
): ObservableDictionary<K, V> {
  return new ObservableDictionary(requireArgument(entries, 'entries'), options);
}

export function toObservableHashSet<T>(items: Iterable<T> | null | undefined): ObservableHashSet<T> {
  return new ObservableHashSet(requireArgument(items, 'items'));
}

export function toObservableQueue<T>(
  items: Iterable<T> | null | undefined,
  options?: SequenceOptions
): ObservableQueue<T> {
  return new ObservableQueue(requireArgument(items, 'items'), options);
}

/** Pushes `items` in order; the last one ends up on top */
export function toObservableStack<T>(
  items: Iterable<T> | null | undefined,
  options?: SequenceOptions
): ObservableStack<T> {
  return new ObservableStack(requireArgument(items, 'items'), options);
}
