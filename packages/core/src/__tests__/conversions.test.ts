import { describe, expect, it } from 'vitest';
import { DuplicateKeyError, NullArgumentError } from '../errors/ripple-error.js';
import { lastIndex, shuffle } from '../extensions/collection-utils.js';
import {
  toObservableCollection,
  toObservableDictionary,
  toObservableHashSet,
  toObservableList,
  toObservableQueue,
  toObservableStack,
} from '../extensions/conversions.js';

describe('conversions', () => {
  it('should build each container from a sequence', () => {
    const source = new Set(['a', 'b']);

    expect(toObservableList(source).toArray()).toEqual(['a', 'b']);
    expect(toObservableCollection(source, { notifyOnEachInRange: true }).notifyOnEachInRange).toBe(true);
    expect(toObservableHashSet(['a', 'a']).count).toBe(1);
    expect(toObservableQueue(source).peek()).toBe('a');
  });

  it('should push stack items in order so the last is on top', () => {
    const stack = toObservableStack([1, 2, 3]);
    expect(stack.pop()).toBe(3);
  });

  it('should build a dictionary from pairs and reject duplicates', () => {
    const dict = toObservableDictionary(new Map([['k', 1]]));
    expect(dict.get('k')).toBe(1);

    expect(() =>
      toObservableDictionary([
        ['k', 1],
        ['k', 2],
      ])
    ).toThrow(DuplicateKeyError);
  });

  it('should reject null and undefined input', () => {
    expect(() => toObservableList(null)).toThrow(NullArgumentError);
    expect(() => toObservableStack(undefined)).toThrow(NullArgumentError);
    expect(() => toObservableDictionary(null)).toThrow('parameter "entries"');
  });

  it('should copy the input rather than wrap it', () => {
    const items = [1, 2];
    const list = toObservableList(items);

    items.push(3);

    expect(list.count).toBe(2);
  });
});

describe('collection utilities', () => {
  it('should return the last index of any iterable', () => {
    expect(lastIndex([1, 2, 3])).toBe(2);
    expect(lastIndex(new Set(['a']))).toBe(0);
    expect(lastIndex([])).toBe(-1);
  });

  it('should shuffle in place with a deterministic source', () => {
    const values = [1, 2, 3, 4];
    const result = shuffle(values, () => 0.999);

    // floor(0.999 * (i + 1)) === i, so every swap is with itself
    expect(result).toBe(values);
    expect(values).toEqual([1, 2, 3, 4]);
  });

  it('should keep every element when shuffling randomly', () => {
    const values = [5, 6, 7, 8, 9];
    shuffle(values);
    expect([...values].sort()).toEqual([5, 6, 7, 8, 9]);
  });
});
