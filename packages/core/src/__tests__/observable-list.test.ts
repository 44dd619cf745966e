import { record } from '@ripplekit/testing';
import { describe, expect, it } from 'vitest';
import { ObservableList } from '../collections/observable-list.js';
import { IndexOutOfRangeError, RippleError } from '../errors/ripple-error.js';

describe('ObservableList', () => {
  describe('single-item operations', () => {
    it('should raise Count, indexer and add in that order', () => {
      const list = new ObservableList(['a', 'b']);
      const rec = record(list);

      list.add('c');

      expect(rec.log).toEqual(['Count', 'Item[]', 'add']);
      expect(rec.changes[0]).toEqual({ type: 'add', items: ['c'], startIndex: 2 });
    });

    it('should see the updated count from inside the handler', () => {
      const list = new ObservableList<number>();
      const seen: number[] = [];
      list.onCollectionChanged(() => seen.push(list.count));

      list.add(1);
      list.add(2);

      expect(seen).toEqual([1, 2]);
    });

    it('should insert at the given index', () => {
      const list = new ObservableList(['a', 'c']);
      const rec = record(list);

      list.insert(1, 'b');

      expect(list.toArray()).toEqual(['a', 'b', 'c']);
      expect(rec.changes).toEqual([{ type: 'add', items: ['b'], startIndex: 1 }]);
    });

    it('should accept count as an insertion point', () => {
      const list = new ObservableList(['a']);
      list.insert(1, 'b');
      expect(list.toArray()).toEqual(['a', 'b']);
    });

    it('should raise replace with the indexer only when setting', () => {
      const list = new ObservableList(['a', 'b']);
      const rec = record(list);

      list.set(1, 'z');

      expect(rec.log).toEqual(['Item[]', 'replace']);
      expect(rec.changes[0]).toEqual({ type: 'replace', oldItem: 'b', newItem: 'z', index: 1 });
    });

    it('should remove the first equal element', () => {
      const list = new ObservableList(['a', 'b', 'a']);
      const rec = record(list);

      expect(list.remove('a')).toBe(true);

      expect(list.toArray()).toEqual(['b', 'a']);
      expect(rec.log).toEqual(['Count', 'Item[]', 'remove']);
      expect(rec.changes[0]).toEqual({ type: 'remove', items: ['a'], index: 0 });
    });

    it('should return false and stay silent when removing a missing element', () => {
      const list = new ObservableList(['a']);
      const rec = record(list);

      expect(list.remove('x')).toBe(false);
      expect(rec.log).toEqual([]);
    });

    it('should honour a custom equality for value lookups', () => {
      const list = new ObservableList(['Apple', 'Pear'], {
        equals: (a, b) => a.toLowerCase() === b.toLowerCase(),
      });

      expect(list.indexOf('pear')).toBe(1);
      expect(list.contains('APPLE')).toBe(true);
      expect(list.remove('apple')).toBe(true);
      expect(list.toArray()).toEqual(['Pear']);
    });

    it('should find NaN with the default equality', () => {
      const list = new ObservableList([1, Number.NaN]);
      expect(list.indexOf(Number.NaN)).toBe(1);
    });

    it('should raise a reset with Count when clearing a non-empty list', () => {
      const list = new ObservableList([1, 2]);
      const rec = record(list);

      list.clear();

      expect(rec.log).toEqual(['Count', 'Item[]', 'reset']);
    });

    it('should not raise Count when clearing an empty list', () => {
      const list = new ObservableList<number>();
      const rec = record(list);

      list.clear();

      expect(rec.log).toEqual(['Item[]', 'reset']);
    });
  });

  describe('move', () => {
    it('should move an item and raise a single move', () => {
      const list = new ObservableList(['a', 'b', 'c']);
      const rec = record(list);

      list.move(0, 2);

      expect(list.toArray()).toEqual(['b', 'c', 'a']);
      expect(rec.log).toEqual(['Item[]', 'move']);
      expect(rec.changes[0]).toEqual({ type: 'move', item: 'a', oldIndex: 0, newIndex: 2 });
    });

    it('should do nothing when both indices are equal', () => {
      const list = new ObservableList(['a', 'b']);
      const rec = record(list);

      list.move(1, 1);

      expect(list.toArray()).toEqual(['a', 'b']);
      expect(rec.log).toEqual([]);
    });

    it('should reject an index equal to count', () => {
      const list = new ObservableList(['a', 'b']);
      const rec = record(list);

      expect(() => list.move(0, 2)).toThrow(IndexOutOfRangeError);
      expect(list.toArray()).toEqual(['a', 'b']);
      expect(rec.log).toEqual([]);
    });
  });

  describe('index validation', () => {
    it('should throw RIPPLE_I100 for reads past the end', () => {
      const list = new ObservableList([1]);

      let caught: unknown;
      try {
        list.get(1);
      } catch (error) {
        caught = error;
      }
      expect(RippleError.isCode(caught, 'RIPPLE_I100')).toBe(true);
    });

    it('should reject negative and fractional indices', () => {
      const list = new ObservableList([1, 2]);
      expect(() => list.get(-1)).toThrow(IndexOutOfRangeError);
      expect(() => list.removeAt(0.5)).toThrow(IndexOutOfRangeError);
      expect(() => list.insert(3, 9)).toThrow(IndexOutOfRangeError);
      expect(list.toArray()).toEqual([1, 2]);
    });
  });

  describe('range operations', () => {
    it('should raise exactly one reset for addRange', () => {
      const list = new ObservableList([1]);
      const rec = record(list);

      list.addRange([2, 3, 4]);

      expect(list.toArray()).toEqual([1, 2, 3, 4]);
      expect(rec.log).toEqual(['Count', 'Item[]', 'reset']);
    });

    it('should raise nothing for an empty range', () => {
      const list = new ObservableList([1]);
      const rec = record(list);

      list.addRange([]);
      list.insertRange(0, []);

      expect(rec.log).toEqual([]);
    });

    it('should insert a range at the given index', () => {
      const list = new ObservableList(['a', 'd']);
      const rec = record(list);

      list.insertRange(1, ['b', 'c']);

      expect(list.toArray()).toEqual(['a', 'b', 'c', 'd']);
      expect(rec.changes).toEqual([{ type: 'reset' }]);
    });

    it('should remove a positional range', () => {
      const list = new ObservableList([0, 1, 2, 3, 4]);
      const rec = record(list);

      list.removeRange(1, 3);

      expect(list.toArray()).toEqual([0, 4]);
      expect(rec.log).toEqual(['Count', 'Item[]', 'reset']);
    });

    it('should reject a positional range that runs past the end', () => {
      const list = new ObservableList([0, 1, 2]);
      expect(() => list.removeRange(2, 2)).toThrow(IndexOutOfRangeError);
      expect(list.toArray()).toEqual([0, 1, 2]);
    });

    it('should remove all matching elements with one reset', () => {
      const list = new ObservableList([1, 2, 3, 4, 5, 6]);
      const rec = record(list);

      expect(list.removeAll((n) => n % 2 === 0)).toBe(3);

      expect(list.toArray()).toEqual([1, 3, 5]);
      expect(rec.changes).toEqual([{ type: 'reset' }]);
    });

    it('should stay silent when removeAll matches nothing', () => {
      const list = new ObservableList([1, 3]);
      const rec = record(list);

      expect(list.removeAll((n) => n > 10)).toBe(0);
      expect(rec.log).toEqual([]);
    });

    it('should remove the first and last matching elements', () => {
      const list = new ObservableList([1, 2, 3, 4]);
      const rec = record(list);

      expect(list.removeFirst((n) => n > 1)).toBe(true);
      expect(list.removeLast((n) => n > 1)).toBe(true);

      expect(list.toArray()).toEqual([1, 3]);
      expect(rec.changes).toEqual([
        { type: 'remove', items: [2], index: 1 },
        { type: 'remove', items: [4], index: 2 },
      ]);
    });
  });

  describe('reordering', () => {
    it('should swap two elements with a reset and no Count change', () => {
      const list = new ObservableList(['a', 'b', 'c']);
      const rec = record(list);

      list.swap(0, 2);

      expect(list.toArray()).toEqual(['c', 'b', 'a']);
      expect(rec.log).toEqual(['Item[]', 'reset']);
    });

    it('should reverse the whole list or a segment', () => {
      const list = new ObservableList([1, 2, 3, 4, 5]);

      list.reverse();
      expect(list.toArray()).toEqual([5, 4, 3, 2, 1]);

      list.reverse(1, 3);
      expect(list.toArray()).toEqual([5, 2, 3, 4, 1]);
    });

    it('should reverse a large list in place', () => {
      const size = 300_000;
      const list = new ObservableList(Array.from({ length: size }, (_, i) => i));
      const rec = record(list);

      list.reverse();

      expect(list.get(0)).toBe(size - 1);
      expect(list.get(size - 1)).toBe(0);
      expect(list.count).toBe(size);
      expect(rec.log).toEqual(['Item[]', 'reset']);
    });

    it('should not notify when reversing fewer than two elements', () => {
      const list = new ObservableList([1, 2]);
      const rec = record(list);

      list.reverse(1, 1);

      expect(rec.log).toEqual([]);
    });

    it('should shuffle with the supplied random source', () => {
      const list = new ObservableList([1, 2, 3]);
      const rec = record(list);

      // Math.floor(0 * (i + 1)) is always 0
      expect(list.shuffle(() => 0)).toBe(list);

      expect(list.toArray()).toEqual([2, 3, 1]);
      expect(rec.log).toEqual(['Item[]', 'reset']);
    });

    it('should report the last index', () => {
      expect(new ObservableList(['a', 'b']).lastIndex).toBe(1);
      expect(new ObservableList<string>().lastIndex).toBe(-1);
    });

    it('should find the last occurrence', () => {
      const list = new ObservableList(['x', 'y', 'x']);
      expect(list.lastIndexOf('x')).toBe(2);
      expect(list.lastIndexOf('z')).toBe(-1);
    });
  });

  describe('overwrite and trimming', () => {
    it('should overwrite the contents with one reset', () => {
      const list = new ObservableList([1, 2]);
      const rec = record(list);

      list.overwrite([7, 8]);

      expect(list.toArray()).toEqual([7, 8]);
      expect(rec.log).toEqual(['Item[]', 'reset']);
    });

    it('should raise Count when overwrite changes the size', () => {
      const list = new ObservableList([1, 2]);
      const rec = record(list);

      list.overwrite([9]);

      expect(rec.log).toEqual(['Count', 'Item[]', 'reset']);
    });

    it('should keep the newest elements when trimming the start', () => {
      const list = new ObservableList([1, 2, 3, 4]);
      list.trimStartDownTo(2);
      expect(list.toArray()).toEqual([3, 4]);
    });

    it('should keep the oldest elements when trimming the end', () => {
      const list = new ObservableList([1, 2, 3, 4]);
      list.trimEndDownTo(1);
      expect(list.toArray()).toEqual([1]);
    });

    it('should not notify when already within the limit', () => {
      const list = new ObservableList([1, 2]);
      const rec = record(list);

      list.trimEndDownTo(5);

      expect(rec.log).toEqual([]);
    });

    it('should reject a negative limit', () => {
      expect(() => new ObservableList([1]).trimStartDownTo(-1)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('copies', () => {
    it('should copy a segment into an independent list', () => {
      const list = new ObservableList([1, 2, 3, 4]);
      const copy = list.copy(1, 2);

      copy.add(9);

      expect(copy.toArray()).toEqual([2, 3, 9]);
      expect(list.toArray()).toEqual([1, 2, 3, 4]);
    });

    it('should copy into an array at an offset', () => {
      const target = ['_', '_', '_'];
      new ObservableList(['a', 'b']).copyTo(target, 1);
      expect(target).toEqual(['_', 'a', 'b']);
    });

    it('should expose a live read-only wrapper', () => {
      const list = new ObservableList(['a']);
      const readOnly = list.asReadOnly();

      list.add('b');

      expect(readOnly.count).toBe(2);
      expect(readOnly.get(1)).toBe('b');
      expect([...readOnly]).toEqual(['a', 'b']);
    });
  });

  describe('dispose', () => {
    it('should complete both channels once', () => {
      const list = new ObservableList([1]);
      let completed = 0;
      list.collectionChanged$.subscribe({ complete: () => completed++ });
      list.propertyChanged$.subscribe({ complete: () => completed++ });

      list.dispose();
      list.dispose();

      expect(completed).toBe(2);
      expect(list.isDisposed).toBe(true);
    });
  });
});
