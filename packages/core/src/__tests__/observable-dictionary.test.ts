import { record } from '@ripplekit/testing';
import { describe, expect, it } from 'vitest';
import { ObservableDictionary } from '../collections/observable-dictionary.js';
import { DuplicateKeyError, KeyNotFoundError } from '../errors/ripple-error.js';
import { pair } from '../types/change.js';

describe('ObservableDictionary', () => {
  it('should seed from tuples and key/value pairs', () => {
    const fromTuples = new ObservableDictionary([
      ['a', 1],
      ['b', 2],
    ]);
    const fromPairs = new ObservableDictionary([pair('a', 1)]);

    expect(fromTuples.toArray()).toEqual([
      { key: 'a', value: 1 },
      { key: 'b', value: 2 },
    ]);
    expect(fromPairs.get('a')).toBe(1);
  });

  it('should reject duplicate keys in the seed', () => {
    expect(
      () =>
        new ObservableDictionary([
          ['a', 1],
          ['a', 2],
        ])
    ).toThrow(DuplicateKeyError);
  });

  it('should label a new key as add at its insertion position', () => {
    const dict = new ObservableDictionary([['a', 1]]);
    const rec = record(dict);

    dict.set('b', 2);

    expect(rec.log).toEqual(['Count', 'Item[]', 'add']);
    expect(rec.changes[0]).toEqual({ type: 'add', items: [{ key: 'b', value: 2 }], startIndex: 1 });
  });

  it('should label an existing key as replace carrying the previous value', () => {
    const dict = new ObservableDictionary([
      ['a', 1],
      ['b', 2],
    ]);
    const rec = record(dict);

    dict.set('b', 20);

    expect(rec.log).toEqual(['Item[]', 'replace']);
    expect(rec.changes[0]).toEqual({
      type: 'replace',
      oldItem: { key: 'b', value: 2 },
      newItem: { key: 'b', value: 20 },
      index: 1,
    });
  });

  it('should throw DuplicateKeyError from add without mutating', () => {
    const dict = new ObservableDictionary([['a', 1]]);
    const rec = record(dict);

    expect(() => dict.add('a', 5)).toThrow(DuplicateKeyError);
    expect(dict.get('a')).toBe(1);
    expect(rec.log).toEqual([]);
  });

  it('should throw KeyNotFoundError for a missing key', () => {
    const dict = new ObservableDictionary<string, number>();
    expect(() => dict.get('nope')).toThrow(KeyNotFoundError);
    expect(dict.tryGet('nope')).toBeUndefined();
  });

  it('should remove an entry with its insertion index', () => {
    const dict = new ObservableDictionary([
      ['a', 1],
      ['b', 2],
      ['c', 3],
    ]);
    const rec = record(dict);

    expect(dict.remove('b')).toBe(true);
    expect(dict.remove('b')).toBe(false);

    expect(dict.keys()).toEqual(['a', 'c']);
    expect(rec.changes).toEqual([{ type: 'remove', items: [{ key: 'b', value: 2 }], index: 1 }]);
  });

  it('should clear with a reset', () => {
    const dict = new ObservableDictionary([['a', 1]]);
    const rec = record(dict);

    dict.clear();

    expect(dict.count).toBe(0);
    expect(rec.log).toEqual(['Count', 'Item[]', 'reset']);
  });

  it('should compare values with the configured equality', () => {
    const dict = new ObservableDictionary([['p', { id: 1 }]], {
      equals: (a, b) => a.id === b.id,
    });

    expect(dict.containsPair('p', { id: 1 })).toBe(true);
    expect(dict.containsPair('p', { id: 2 })).toBe(false);
    expect(dict.containsKey('q')).toBe(false);
  });

  it('should expose keys, values and a Map copy', () => {
    const dict = new ObservableDictionary([
      ['x', 10],
      ['y', 20],
    ]);

    expect(dict.values()).toEqual([10, 20]);
    expect(dict.toMap()).toEqual(
      new Map([
        ['x', 10],
        ['y', 20],
      ])
    );
  });
});
