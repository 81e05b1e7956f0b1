/**
 * Range operations over raw slot buffers
 * Shared by every list variant; none of them track count or capacity.
 * `checked` defaults to the process-wide range check setting.
 */

import { getConfig } from '../config';
import { outOfRange } from '../errors';
import { DEFAULT_SLOT_KIND } from './constants';
import { naturalCompare } from './compare';
import type { Comparer, SearchResult, SlotKind, Slots } from './types';

/**
 * Throws OUT_OF_RANGE unless `[index, index + count)` lies within `[0, bound)`.
 */
export function checkRange(index: number, count: number, bound: number): void {
  if (
    !Number.isInteger(index) ||
    !Number.isInteger(count) ||
    index < 0 ||
    count < 0 ||
    index + count > bound
  ) {
    throw outOfRange(index, count, bound);
  }
}

function copySlot<T>(source: Slots<T>, from: number, target: Slots<T>, to: number): void {
  if (from in source) {
    target[to] = source[from];
  } else {
    delete target[to];
  }
}

/**
 * Copies `count` slots from `fromIndex` to `toIndex` within one buffer.
 * Overlapping ranges come out as if copied one slot at a time in the safe
 * direction. Vacated source slots are left as they are; clear them with
 * {@link clearRange}.
 */
export function relocate<T>(
  buffer: Slots<T>,
  fromIndex: number,
  toIndex: number,
  count: number,
  kind: SlotKind = DEFAULT_SLOT_KIND,
  checked: boolean = getConfig().rangeChecks
): void {
  if (checked) {
    checkRange(fromIndex, count, buffer.length);
    checkRange(toIndex, count, buffer.length);
  }
  if (count === 0 || fromIndex === toIndex) return;

  if (kind === 'plain') {
    buffer.copyWithin(toIndex, fromIndex, fromIndex + count);
    return;
  }

  if (fromIndex < toIndex) {
    for (let i = count - 1; i >= 0; i--) {
      copySlot(buffer, fromIndex + i, buffer, toIndex + i);
    }
  } else {
    for (let i = 0; i < count; i++) {
      copySlot(buffer, fromIndex + i, buffer, toIndex + i);
    }
  }
}

/**
 * Copies `count` slots from one buffer into another. Empty source slots
 * stay empty in the target.
 */
export function transfer<T>(
  source: Slots<T>,
  sourceIndex: number,
  target: Slots<T>,
  targetIndex: number,
  count: number,
  checked: boolean = getConfig().rangeChecks
): void {
  if (checked) {
    checkRange(sourceIndex, count, source.length);
    checkRange(targetIndex, count, target.length);
  }
  for (let i = 0; i < count; i++) {
    copySlot(source, sourceIndex + i, target, targetIndex + i);
  }
}

/**
 * Empties `count` owned slots starting at `index`. Plain slots are left
 * untouched.
 */
export function clearRange<T>(
  buffer: Slots<T>,
  index: number,
  count: number,
  kind: SlotKind = DEFAULT_SLOT_KIND,
  checked: boolean = getConfig().rangeChecks
): void {
  if (checked) checkRange(index, count, buffer.length);
  if (kind === 'plain') return;
  for (let i = index; i < index + count; i++) {
    delete buffer[i];
  }
}

// =====================================================
// Sort
// =====================================================

// Hoare partitioning around the middle element. Recurses into the smaller
// partition and loops on the larger, so stack depth stays O(log n).
function quickSort<T>(values: Slots<T>, compare: Comparer<T>, left: number, right: number): void {
  while (left < right) {
    let i = left;
    let j = right;
    const pivot = values[left + ((right - left) >>> 1)];

    do {
      while (compare(values[i], pivot) < 0) i++;
      while (compare(values[j], pivot) > 0) j--;

      if (i <= j) {
        if (i !== j) {
          const temp = values[i];
          values[i] = values[j];
          values[j] = temp;
        }
        i++;
        j--;
      }
    } while (i <= j);

    if (j - left < right - i) {
      if (left < j) quickSort(values, compare, left, j);
      left = i;
    } else {
      if (i < right) quickSort(values, compare, i, right);
      right = j;
    }
  }
}

/**
 * Sorts `[index, index + count)` in place. Not stable.
 */
export function sortRange<T>(
  values: Slots<T>,
  compare: Comparer<T>,
  index: number,
  count: number,
  checked: boolean = getConfig().rangeChecks
): void {
  if (checked) checkRange(index, count, values.length);
  if (count > 1) quickSort(values, compare, index, index + count - 1);
}

export function sortArray<T>(values: T[], compare: Comparer<T> = naturalCompare): void {
  sortRange(values, compare, 0, values.length);
}

// =====================================================
// Search
// =====================================================

/**
 * Searches the sorted range `[index, index + count)` for `item`.
 *
 * When found, `index` is the leftmost element comparing equal. Otherwise it
 * is the position where `item` would have to be inserted to keep the range
 * sorted.
 */
export function binarySearch<T>(
  values: Slots<T>,
  item: T,
  compare: Comparer<T>,
  index: number,
  count: number,
  checked: boolean = getConfig().rangeChecks
): SearchResult {
  if (checked) checkRange(index, count, values.length);
  if (count === 0) return { found: false, index };

  let found = false;
  let low = index;
  let high = index + count - 1;
  while (low <= high) {
    const mid = low + ((high - low) >>> 1);
    const cmp = compare(values[mid], item);
    if (cmp < 0) {
      low = mid + 1;
    } else {
      high = mid - 1;
      if (cmp === 0) found = true;
    }
  }
  return { found, index: low };
}
