/**
 * Tests for range operations (relocate, clear, sort, binary search)
 */

import { afterEach, describe, it, expect } from 'vitest';
import { resetConfig, setConfig } from '../config';
import { ListErrorCode, isListError } from '../errors';
import { naturalCompare } from './compare';
import { binarySearch, checkRange, clearRange, relocate, sortArray, sortRange, transfer } from './range';

const byNumber = (a: number, b: number): number => a - b;

function holes(values: unknown[]): number[] {
  const result: number[] = [];
  for (let i = 0; i < values.length; i++) {
    if (!(i in values)) result.push(i);
  }
  return result;
}

describe('range operations', () => {
  afterEach(() => {
    resetConfig();
  });

  describe('relocate', () => {
    it('should shift an overlapping range right without corrupting it', () => {
      const values = [1, 2, 3, 4, 5, 0, 0];
      relocate(values, 0, 2, 5);
      expect(values).toEqual([1, 2, 1, 2, 3, 4, 5]);
    });

    it('should shift an overlapping range left without corrupting it', () => {
      const values = [0, 0, 1, 2, 3, 4, 5];
      relocate(values, 2, 0, 5);
      expect(values).toEqual([1, 2, 3, 4, 5, 4, 5]);
    });

    it('should give the same result for plain slots', () => {
      const owned = [1, 2, 3, 4, 5, 0, 0];
      const plain = [1, 2, 3, 4, 5, 0, 0];
      relocate(owned, 0, 2, 5, 'owned');
      relocate(plain, 0, 2, 5, 'plain');
      expect(plain).toEqual(owned);
    });

    it('should carry empty slots along', () => {
      const values = new Array<string>(4);
      values[0] = 'a';
      relocate(values, 0, 1, 2);
      expect(values[1]).toBe('a');
      expect(holes(values)).toEqual([2, 3]);
    });

    it('should do nothing for an empty range', () => {
      const values = [1, 2, 3];
      relocate(values, 0, 2, 0);
      expect(values).toEqual([1, 2, 3]);
    });

    it('should reject ranges past the end of the buffer', () => {
      expect(() => relocate([1, 2, 3], 1, 2, 2)).toThrowError(/out of bounds/);
    });
  });

  describe('transfer', () => {
    it('should copy between two buffers', () => {
      const source = ['a', 'b', 'c'];
      const target = new Array<string>(5);
      transfer(source, 1, target, 2, 2);
      expect(target[2]).toBe('b');
      expect(target[3]).toBe('c');
      expect(holes(target)).toEqual([0, 1, 4]);
    });
  });

  describe('clearRange', () => {
    it('should empty owned slots', () => {
      const values = [1, 2, 3, 4];
      clearRange(values, 1, 2, 'owned');
      expect(values.length).toBe(4);
      expect(holes(values)).toEqual([1, 2]);
    });

    it('should leave plain slots untouched', () => {
      const values = [1, 2, 3, 4];
      clearRange(values, 1, 2, 'plain');
      expect(values).toEqual([1, 2, 3, 4]);
    });
  });

  describe('sortRange', () => {
    it('should handle empty and single element ranges', () => {
      const empty: number[] = [];
      sortRange(empty, byNumber, 0, 0);
      expect(empty).toEqual([]);

      const single = [42];
      sortRange(single, byNumber, 0, 1);
      expect(single).toEqual([42]);
    });

    it('should sort reversed input', () => {
      const values = [9, 8, 7, 6, 5, 4, 3, 2, 1, 0];
      sortRange(values, byNumber, 0, values.length);
      expect(values).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('should sort duplicates and all-equal input', () => {
      const dups = [3, 1, 3, 2, 1, 3, 2];
      sortRange(dups, byNumber, 0, dups.length);
      expect(dups).toEqual([1, 1, 2, 2, 3, 3, 3]);

      const same = [7, 7, 7, 7, 7];
      sortRange(same, byNumber, 0, same.length);
      expect(same).toEqual([7, 7, 7, 7, 7]);
    });

    it('should only touch the given sub-range', () => {
      const values = [9, 5, 4, 3, 0];
      sortRange(values, byNumber, 1, 3);
      expect(values).toEqual([9, 3, 4, 5, 0]);
    });

    it('should agree with Array.prototype.sort on larger input', () => {
      const values: number[] = [];
      let seed = 12345;
      for (let i = 0; i < 1000; i++) {
        seed = (seed * 48271) % 2147483647;
        values.push(seed % 100);
      }
      const expected = [...values].sort(byNumber);
      sortRange(values, byNumber, 0, values.length);
      expect(values).toEqual(expected);
    });

    it('should sort a whole array with the natural order by default', () => {
      const words = ['pear', 'apple', 'fig'];
      sortArray(words);
      expect(words).toEqual(['apple', 'fig', 'pear']);
    });
  });

  describe('binarySearch', () => {
    const sorted = [1, 3, 3, 5, 7];

    it('should find the leftmost equal element', () => {
      expect(binarySearch(sorted, 3, byNumber, 0, sorted.length)).toEqual({ found: true, index: 1 });
      expect(binarySearch(sorted, 7, byNumber, 0, sorted.length)).toEqual({ found: true, index: 4 });
    });

    it('should return the insertion point when missing', () => {
      expect(binarySearch(sorted, 4, byNumber, 0, sorted.length)).toEqual({ found: false, index: 3 });
      expect(binarySearch(sorted, 0, byNumber, 0, sorted.length)).toEqual({ found: false, index: 0 });
      expect(binarySearch(sorted, 8, byNumber, 0, sorted.length)).toEqual({ found: false, index: 5 });
    });

    it('should return the start index for an empty range', () => {
      expect(binarySearch(sorted, 3, byNumber, 2, 0)).toEqual({ found: false, index: 2 });
      expect(binarySearch<number>([], 3, byNumber, 0, 0)).toEqual({ found: false, index: 0 });
    });

    it('should search only within the sub-range', () => {
      expect(binarySearch(sorted, 1, byNumber, 1, 3)).toEqual({ found: false, index: 1 });
      expect(binarySearch(sorted, 5, byNumber, 1, 3)).toEqual({ found: true, index: 3 });
    });

    it('should work with the natural comparer on strings', () => {
      const words = ['ant', 'bee', 'cat'];
      expect(binarySearch(words, 'bee', naturalCompare, 0, 3)).toEqual({ found: true, index: 1 });
    });
  });

  describe('range checks', () => {
    it('should report the offending range', () => {
      try {
        checkRange(2, 3, 4);
        expect.unreachable();
      } catch (e) {
        expect(isListError(e, ListErrorCode.OUT_OF_RANGE)).toBe(true);
        if (isListError(e)) {
          expect(e.type).toEqual({ code: ListErrorCode.OUT_OF_RANGE, index: 2, count: 3, bound: 4 });
        }
      }
    });

    it('should reject negative and fractional arguments', () => {
      expect(() => checkRange(-1, 1, 4)).toThrowError(/out of bounds/);
      expect(() => checkRange(0, -1, 4)).toThrowError(/out of bounds/);
      expect(() => checkRange(0.5, 1, 4)).toThrowError(/out of bounds/);
    });

    it('should be skipped when range checks are disabled', () => {
      setConfig({ rangeChecks: false });
      expect(() => binarySearch([1, 2], 1, byNumber, 0, 5)).not.toThrow();
    });

    it('should follow an explicit flag over the process setting', () => {
      expect(() => relocate([1, 2, 3], 1, 2, 2, 'owned', false)).not.toThrow();
      expect(() => clearRange([1, 2], 1, 3, 'owned', false)).not.toThrow();

      setConfig({ rangeChecks: false });
      expect(() => transfer([1], 0, [0], 0, 2, true)).toThrowError('Range 0+2 out of bounds for length 1');
      expect(() => sortRange([2, 1], byNumber, 0, 3, true)).toThrowError('Range 0+3 out of bounds for length 2');
    });
  });
});
