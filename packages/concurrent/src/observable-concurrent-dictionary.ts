import {
  CollectionChanges,
  type DictionarySeed,
  DuplicateKeyError,
  type EqualityComparer,
  type KeyValuePair,
  KeyNotFoundError,
  defaultEquals,
  pair,
  requireArgument,
  toPair,
} from '@ripplekit/core';
import { ConcurrentContainer } from './concurrent-container.js';
import { type ConcurrentDictionaryOptions, type TryResult, found, notFound } from './types.js';

interface Entry<V> {
  value: V;
}

type WriteOutcome<V> =
  | { kind: 'added'; index: number }
  | { kind: 'replaced'; index: number; oldValue: V };

/**
 * Guarded counterpart of `ObservableDictionary`.
 *
 * `set` decides between add and replace in the same guard section that
 * writes the value, so the emitted change always matches what happened.
 *
 * @typeParam K - The key type
 * @typeParam V - The value type
 */
export class ObservableConcurrentDictionary<K, V> extends ConcurrentContainer<KeyValuePair<K, V>> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly valueEquals: EqualityComparer<V>;

  constructor(seed?: DictionarySeed<K, V>, options: ConcurrentDictionaryOptions<V> = {}) {
    super('ObservableConcurrentDictionary', options);
    this.valueEquals = options.equals ?? defaultEquals;
    if (seed !== undefined) {
      for (const entry of requireArgument(seed, 'seed')) {
        const { key, value } = toPair(entry);
        if (this.entries.has(key)) throw new DuplicateKeyError(key);
        this.entries.set(key, { value });
      }
    }
  }

  /**
   * @throws KeyNotFoundError if the key is absent
   */
  get(key: K): V {
    return this.guard.run('get', () => {
      const entry = this.entries.get(key);
      if (!entry) throw new KeyNotFoundError(key);
      return entry.value;
    });
  }

  tryGet(key: K): TryResult<V> {
    return this.guard.run('tryGet', (): TryResult<V> => {
      const entry = this.entries.get(key);
      return entry ? found(entry.value) : notFound();
    });
  }

  /** Insert or replace the value stored under `key` */
  set(key: K, value: V): void {
    const outcome = this.guard.run('set', () => this.write(key, value));
    this.notifyWrite(key, value, outcome);
  }

  /**
   * @throws DuplicateKeyError if `key` is already present
   */
  add(key: K, value: V): void {
    const outcome = this.guard.run('add', () => {
      if (this.entries.has(key)) throw new DuplicateKeyError(key);
      return this.write(key, value);
    });
    this.notifyWrite(key, value, outcome);
  }

  /**
   * Insert only when `key` is absent.
   *
   * @returns Whether the entry was added
   */
  tryAdd(key: K, value: V): boolean {
    const outcome = this.guard.run('tryAdd', () =>
      this.entries.has(key) ? undefined : this.write(key, value)
    );
    if (outcome === undefined) return false;

    this.notifyWrite(key, value, outcome);
    return true;
  }

  remove(key: K): boolean {
    return this.tryRemove(key).found;
  }

  /** Remove the entry for `key`, returning the removed value */
  tryRemove(key: K): TryResult<V> {
    const removed = this.guard.run('remove', () => {
      const entry = this.entries.get(key);
      if (!entry) return undefined;
      const index = this.indexOfKey(key);
      this.entries.delete(key);
      return { index, value: entry.value };
    });
    if (removed === undefined) return notFound();

    this.notify(CollectionChanges.remove(pair(key, removed.value), removed.index), {
      countChanged: true,
      indexer: true,
    });
    return found(removed.value);
  }

  clear(): void {
    const hadEntries = this.guard.run('clear', () => {
      const nonEmpty = this.entries.size > 0;
      this.entries.clear();
      return nonEmpty;
    });
    this.notify(CollectionChanges.reset(), { countChanged: hadEntries, indexer: true });
  }

  containsKey(key: K): boolean {
    return this.guard.run('containsKey', () => this.entries.has(key));
  }

  containsPair(key: K, value: V): boolean {
    return this.guard.run('containsPair', () => {
      const entry = this.entries.get(key);
      return entry !== undefined && this.valueEquals(entry.value, value);
    });
  }

  keys(): K[] {
    return this.guard.run('keys', () => Array.from(this.entries.keys()));
  }

  values(): V[] {
    return this.guard.run('values', () => Array.from(this.entries.values(), (entry) => entry.value));
  }

  protected size(): number {
    return this.entries.size;
  }

  protected copyContents(): KeyValuePair<K, V>[] {
    return Array.from(this.entries, ([key, entry]) => pair(key, entry.value));
  }

  // ── Private ──────────────────────────────────────────────────────────

  /** Runs inside the guard */
  private write(key: K, value: V): WriteOutcome<V> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.entries.set(key, { value });
      return { kind: 'added', index: this.entries.size - 1 };
    }

    const oldValue = entry.value;
    entry.value = value;
    return { kind: 'replaced', index: this.indexOfKey(key), oldValue };
  }

  private notifyWrite(key: K, value: V, outcome: WriteOutcome<V>): void {
    if (outcome.kind === 'added') {
      this.notify(CollectionChanges.add(pair(key, value), outcome.index), {
        countChanged: true,
        indexer: true,
      });
      return;
    }
    this.notify(
      CollectionChanges.replace(pair(key, outcome.oldValue), pair(key, value), outcome.index),
      { indexer: true }
    );
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
