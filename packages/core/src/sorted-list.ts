/**
 * SortedList - growable sequence kept in ascending order
 *
 * Every insertion binary-searches its slot and shifts the tail, so
 * `compare(get(i), get(j)) <= 0` holds for all `i < j`. The comparer must not
 * change for the lifetime of the list.
 */

import { BaseList, type ListOptions } from './base-list';
import { duplicateItem, outOfRange } from './errors';
import { DuplicatePolicy, binarySearch } from './internal';

export interface SortedListOptions<T> extends ListOptions<T> {
  // Defaults to ignore
  duplicates?: DuplicatePolicy;
}

export class SortedList<T> extends BaseList<T> {
  duplicates: DuplicatePolicy;

  static from<T>(source: Iterable<T>, options?: SortedListOptions<T>): SortedList<T> {
    return new SortedList(source, options);
  }

  constructor(source?: Iterable<T>, options: SortedListOptions<T> = {}) {
    super(options);
    this.duplicates = options.duplicates ?? DuplicatePolicy.Ignore;
    if (source) this.addRange(source);
  }

  /**
   * Truncates the list. Growing would expose unordered empty slots, so a
   * count above the current one fails with OUT_OF_RANGE.
   */
  setCount(value: number): void {
    if (value > this.size) throw outOfRange(value, 0, this.size);
    super.setCount(value);
  }

  /**
   * Inserts `value` at its sorted position and returns that index.
   *
   * If an equal element is present: `ignore` leaves the list as is and
   * returns the index of that element, `accept` inserts after the run of
   * equal elements, `error` throws DUPLICATE_ITEM without changing the list.
   */
  add(value: T): number {
    const search = binarySearch(this.items, value, this.compare, 0, this.size, this.rangeChecks);
    let index = search.index;

    if (search.found) {
      switch (this.duplicates) {
        case DuplicatePolicy.Ignore:
          return index;
        case DuplicatePolicy.Error:
          throw duplicateItem(index);
        case DuplicatePolicy.Accept:
          while (index < this.size && this.compare(this.items[index], value) === 0) index++;
          break;
      }
    }

    this.placeAt(index, value);
    return index;
  }

  /**
   * Adds the values one at a time. Under the `error` policy, values added
   * before the duplicate stay in the list.
   */
  addRange(values: Iterable<T>): void {
    const incoming = Array.from(values);
    this.growCheck(this.size + incoming.length);
    for (const value of incoming) {
      this.add(value);
    }
  }
}
