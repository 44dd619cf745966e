import { DuplicateKeyError, KeyNotFoundError, pair } from '@ripplekit/core';
import { record } from '@ripplekit/testing';
import { describe, expect, it } from 'vitest';
import { ObservableConcurrentDictionary } from '../observable-concurrent-dictionary.js';

describe('ObservableConcurrentDictionary', () => {
  it('should label a write to a new key as an add', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([['a', 1]]);
    const rec = record(dict);

    dict.set('b', 2);

    expect(rec.log).toEqual(['Count', 'Item[]', 'add']);
    expect(rec.changes[0]).toEqual({ type: 'add', items: [pair('b', 2)], startIndex: 1 });
  });

  it('should label a write to an existing key as a replace', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([
      ['a', 1],
      ['b', 2],
    ]);
    const rec = record(dict);

    dict.set('b', 20);

    expect(dict.get('b')).toBe(20);
    expect(rec.log).toEqual(['Item[]', 'replace']);
    expect(rec.changes[0]).toEqual({
      type: 'replace',
      oldItem: pair('b', 2),
      newItem: pair('b', 20),
      index: 1,
    });
  });

  it('should reject add for a present key without notifying', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([['a', 1]]);
    const rec = record(dict);

    expect(() => dict.add('a', 2)).toThrow(DuplicateKeyError);
    expect(dict.get('a')).toBe(1);
    expect(rec.log).toEqual([]);
  });

  it('should add only absent keys with tryAdd', () => {
    const dict = new ObservableConcurrentDictionary<string, number>();
    const rec = record(dict);

    expect(dict.tryAdd('a', 1)).toBe(true);
    expect(dict.tryAdd('a', 2)).toBe(false);

    expect(dict.get('a')).toBe(1);
    expect(rec.changes).toHaveLength(1);
  });

  it('should return the removed value from tryRemove', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([
      ['a', 1],
      ['b', 2],
    ]);
    const rec = record(dict);

    expect(dict.tryRemove('b')).toEqual({ found: true, value: 2 });
    expect(dict.tryRemove('b')).toEqual({ found: false, value: undefined });
    expect(dict.remove('a')).toBe(true);

    expect(dict.count).toBe(0);
    expect(rec.changes).toEqual([
      { type: 'remove', items: [pair('b', 2)], index: 1 },
      { type: 'remove', items: [pair('a', 1)], index: 0 },
    ]);
  });

  it('should read with get and tryGet', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([['a', 1]]);

    expect(dict.tryGet('a')).toEqual({ found: true, value: 1 });
    expect(dict.tryGet('z').found).toBe(false);
    expect(() => dict.get('z')).toThrow(KeyNotFoundError);
  });

  it('should answer key and pair membership', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([['a', 1]]);

    expect(dict.containsKey('a')).toBe(true);
    expect(dict.containsPair('a', 1)).toBe(true);
    expect(dict.containsPair('a', 2)).toBe(false);
    expect(dict.keys()).toEqual(['a']);
    expect(dict.values()).toEqual([1]);
  });

  it('should reject duplicate keys in the seed', () => {
    expect(
      () =>
        new ObservableConcurrentDictionary<string, number>([
          ['a', 1],
          ['a', 2],
        ])
    ).toThrow(DuplicateKeyError);
  });

  it('should iterate a snapshot of the entries in insertion order', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([
      ['a', 1],
      ['b', 2],
    ]);
    const seen: string[] = [];

    for (const { key } of dict) {
      seen.push(key);
      dict.set('c', 3);
    }

    expect(seen).toEqual(['a', 'b']);
    expect(dict.count).toBe(3);
  });

  it('should raise a reset with Count when clearing', () => {
    const dict = new ObservableConcurrentDictionary<string, number>([['a', 1]]);
    const rec = record(dict);

    dict.clear();

    expect(rec.log).toEqual(['Count', 'Item[]', 'reset']);
  });
});
