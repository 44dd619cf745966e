/**
 * Observable key/value map.
 *
 * @module collections/observable-dictionary
 */

import { DuplicateKeyError, KeyNotFoundError } from '../errors/ripple-error.js';
import { CollectionChanges, type KeyValuePair, pair } from '../types/change.js';
import { defaultEquals, type EqualityComparer } from '../types/compare.js';
import { requireArgument } from './arguments.js';
import { ObservableContainer } from './observable-container.js';
import type { DictionaryOptions } from './types.js';

/** Seed entries: `[key, value]` tuples (a `Map` works) or {@link KeyValuePair}s */
export type DictionarySeed<K, V> = Iterable<readonly [K, V] | KeyValuePair<K, V>>;

interface Entry<V> {
  value: V;
}

/** Normalize a seed entry into a key/value pair */
export function toPair<K, V>(entry: readonly [K, V] | KeyValuePair<K, V>): KeyValuePair<K, V> {
  if ('key' in entry) return entry;
  return pair(entry[0], entry[1]);
}

/**
 * A dictionary that notifies observers of insertions, replacements and
 * removals. Keys compare with SameValueZero and iterate in insertion order;
 * the indices carried by events are positions in that order.
 *
 * @typeParam K - The key type
 * @typeParam V - The value type
 *
 * @example
 * ```typescript
 * const prices = new ObservableDictionary<string, number>([['apple', 1]]);
 *
 * prices.set('pear', 2);  // add    { key: 'pear', value: 2 } at 1
 * prices.set('apple', 3); // replace { key: 'apple', value: 1 } -> 3 at 0
 * prices.add('apple', 4); // throws DuplicateKeyError
 * ```
 */
export class ObservableDictionary<K, V> extends ObservableContainer<KeyValuePair<K, V>> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly valueEquals: EqualityComparer<V>;

  constructor(seed?: DictionarySeed<K, V>, options: DictionaryOptions<V> = {}) {
    super();
    this.valueEquals = options.equals ?? defaultEquals;
    if (seed !== undefined) {
      for (const entry of requireArgument(seed, 'seed')) {
        const { key, value } = toPair(entry);
        if (this.entries.has(key)) throw new DuplicateKeyError(key);
        this.entries.set(key, { value });
      }
    }
  }

  get count(): number {
    return this.entries.size;
  }

  *[Symbol.iterator](): Iterator<KeyValuePair<K, V>> {
    for (const [key, entry] of this.entries) {
      yield pair(key, entry.value);
    }
  }

  /**
   * Get the value stored under `key`.
   *
   * @throws KeyNotFoundError if the key is absent
   */
  get(key: K): V {
    const entry = this.entries.get(key);
    if (!entry) throw new KeyNotFoundError(key);
    return entry.value;
  }

  /** Get the value stored under `key`, or `undefined` when absent */
  tryGet(key: K): V | undefined {
    return this.entries.get(key)?.value;
  }

  /**
   * Store `value` under `key`. A new key raises `add`; an existing key
   * raises `replace` carrying the previous value.
   */
  set(key: K, value: V): void {
    const entry = this.entries.get(key);

    if (!entry) {
      this.entries.set(key, { value });
      this.notify(CollectionChanges.add(pair(key, value), this.entries.size - 1), {
        countChanged: true,
        indexer: true,
      });
      return;
    }

    const oldValue = entry.value;
    entry.value = value;
    this.notify(
      CollectionChanges.replace(pair(key, oldValue), pair(key, value), this.indexOfKey(key)),
      { indexer: true }
    );
  }

  /**
   * Insert a new entry.
   *
   * @throws DuplicateKeyError if `key` is already present
   */
  add(key: K, value: V): void {
    if (this.entries.has(key)) throw new DuplicateKeyError(key);
    this.set(key, value);
  }

  /**
   * Remove the entry for `key`.
   *
   * @returns `false` (and raises nothing) when the key is absent
   */
  remove(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;

    const index = this.indexOfKey(key);
    this.entries.delete(key);
    this.notify(CollectionChanges.remove(pair(key, entry.value), index), {
      countChanged: true,
      indexer: true,
    });
    return true;
  }

  /** Remove every entry and raise `reset` */
  clear(): void {
    const hadEntries = this.entries.size > 0;
    this.entries.clear();
    this.notify(CollectionChanges.reset(), { countChanged: hadEntries, indexer: true });
  }

  containsKey(key: K): boolean {
    return this.entries.has(key);
  }

  /** Whether `key` is present and its value equals `value` */
  containsPair(key: K, value: V): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.valueEquals(entry.value, value);
  }

  /** Keys in insertion order */
  keys(): K[] {
    return Array.from(this.entries.keys());
  }

  /** Values in key insertion order */
  values(): V[] {
    return Array.from(this.entries.values(), (entry) => entry.value);
  }

  /** Copy the contents into a new `Map` */
  toMap(): Map<K, V> {
    return new Map(Array.from(this.entries, ([key, entry]): [K, V] => [key, entry.value]));
  }

  private indexOfKey(key: K): number {
    let index = 0;
    for (const candidate of this.entries.keys()) {
      if (defaultEquals(candidate, key)) return index;
      index++;
    }
    return -1;
  }
}
