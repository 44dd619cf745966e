import type { EqualityComparer } from '../types/compare.js';
import type { BatchOptions } from './batch-policy.js';

/**
 * Options for index-based containers whose range operations are always coarse
 */
export interface ListOptions<T> {
  /**
   * Equality used by value lookups (`indexOf`, `contains`, `remove`).
   * Defaults to SameValueZero.
   */
  equals?: EqualityComparer<T>;
}

/**
 * Options for containers whose range operations honor the batch policy
 */
export interface CollectionOptions<T> extends ListOptions<T>, BatchOptions {}

/**
 * Options for queues and stacks
 */
export type SequenceOptions = BatchOptions;

/**
 * Options for dictionaries
 */
export interface DictionaryOptions<V> {
  /** Equality used to compare values in `containsPair` (default: SameValueZero) */
  equals?: EqualityComparer<V>;
}

/** Random source returning a float in `[0, 1)` */
export type RandomSource = () => number;
