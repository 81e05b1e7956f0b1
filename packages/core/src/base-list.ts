/**
 * BaseList - growable contiguous sequence
 *
 * Owns the slot buffer and the count, grows the buffer, searches and
 * deletes. Insertion is left to List and SortedList, which both go through
 * `placeAt`/`growCheck`.
 */

import { getConfig } from './config';
import { allocationFailure, outOfRange } from './errors';
import { ListEnumerator } from './enumerator';
import {
  MAX_CAPACITY,
  DEFAULT_SLOT_KIND,
  NOT_FOUND,
  naturalCompare,
  naturalEquals,
  checkRange,
  relocate,
  transfer,
  clearRange,
  binarySearch,
  Direction,
  type Slots,
  type SlotKind,
  type Comparer,
  type Equality,
  type SearchResult,
} from './internal';
import { getLogger, type Logger } from './logger';
import { NO_OWNERSHIP, type Ownership } from './ownership';

export interface ListOptions<T> {
  // Order for sort, binarySearch and sorted insertion, and equality
  // (compare === 0) for linear search. Defaults to natural order.
  compare?: Comparer<T>;
  kind?: SlotKind;
  ownership?: Ownership<T>;
  // Initial capacity
  capacity?: number;
  maxCapacity?: number;
  rangeChecks?: boolean;
  logger?: Logger;
}

export interface ReadonlyList<T> extends Iterable<T> {
  readonly count: number;
  readonly capacity: number;
  get(index: number): T;
  first(): T;
  last(): T;
  contains(value: T): boolean;
  indexOf(value: T, direction?: Direction): number;
  lastIndexOf(value: T): number;
  binarySearch(item: T, compare?: Comparer<T>): SearchResult;
  toArray(): T[];
  getEnumerator(): ListEnumerator<T>;
}

export abstract class BaseList<T> implements ReadonlyList<T> {
  protected items: Slots<T> = [];
  protected size = 0;

  protected readonly compare: Comparer<T>;
  protected readonly equals: Equality<T>;
  protected readonly kind: SlotKind;
  protected readonly ownership: Ownership<T>;
  protected readonly maxCapacity: number;
  protected readonly rangeChecks: boolean;
  protected readonly logger: Logger;

  constructor(options: ListOptions<T> = {}) {
    const { compare } = options;
    this.compare = compare ?? naturalCompare;
    this.equals = compare ? (a, b) => compare(a, b) === 0 : naturalEquals;
    this.kind = options.kind ?? DEFAULT_SLOT_KIND;
    this.ownership = options.ownership ?? NO_OWNERSHIP;
    this.maxCapacity = Math.min(options.maxCapacity ?? MAX_CAPACITY, MAX_CAPACITY);
    this.rangeChecks = options.rangeChecks ?? getConfig().rangeChecks;
    this.logger = options.logger ?? getLogger();

    if (options.capacity) this.setCapacity(options.capacity);
  }

  // =====================================================
  // Count & capacity
  // =====================================================

  get count(): number {
    return this.size;
  }

  get capacity(): number {
    return this.items.length;
  }

  /**
   * Truncates (through the removal hook) or extends the list. Slots exposed
   * by extending read as `undefined` until they are assigned.
   */
  setCount(value: number): void {
    if (this.rangeChecks && (!Number.isInteger(value) || value < 0)) {
      throw outOfRange(value, 0, this.maxCapacity);
    }
    if (value > this.capacity) this.setCapacity(value);
    if (value < this.size) this.deleteRange(value, this.size - value);
    this.size = value;
  }

  setCapacity(value: number): void {
    if (this.rangeChecks && (!Number.isInteger(value) || value < 0)) {
      throw outOfRange(value, 0, this.maxCapacity);
    }
    if (value > this.maxCapacity) {
      this.logger.warn('Capacity request exceeds limit', { requested: value, maxCapacity: this.maxCapacity });
      throw allocationFailure(value, this.maxCapacity);
    }
    if (value < this.size) this.setCount(value);
    if (value === this.capacity) return;

    const items: Slots<T> = new Array<T>(value);
    transfer(this.items, 0, items, 0, this.size, this.rangeChecks);
    this.logger.debug('Capacity changed', { from: this.capacity, to: value, count: this.size });
    this.items = items;
  }

  trimExcess(): void {
    this.setCapacity(this.size);
  }

  // Doubles until `minCount` fits; the first growth takes `minCount` as is
  private grow(minCount: number): void {
    if (minCount > this.maxCapacity) {
      this.logger.warn('Capacity request exceeds limit', { requested: minCount, maxCapacity: this.maxCapacity });
      throw allocationFailure(minCount, this.maxCapacity);
    }
    let capacity = this.capacity;
    if (capacity === 0) {
      capacity = minCount;
    } else {
      while (capacity < minCount) capacity *= 2;
      capacity = Math.min(capacity, this.maxCapacity);
    }
    this.setCapacity(capacity);
  }

  protected growCheck(minCount: number = this.size + 1): void {
    if (minCount > this.capacity) this.grow(minCount);
  }

  // =====================================================
  // Access
  // =====================================================

  protected checkIndex(index: number): void {
    if (this.rangeChecks) checkRange(index, 1, this.size);
  }

  get(index: number): T {
    this.checkIndex(index);
    return this.items[index];
  }

  first(): T {
    return this.get(0);
  }

  last(): T {
    return this.get(this.size - 1);
  }

  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.size; i++) {
      result.push(this.items[i]);
    }
    return result;
  }

  getEnumerator(): ListEnumerator<T> {
    return new ListEnumerator(this.items, this.size);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.getEnumerator();
  }

  // =====================================================
  // Search
  // =====================================================

  contains(value: T): boolean {
    return this.indexOf(value) >= 0;
  }

  indexOf(value: T, direction: Direction = Direction.FromBeginning): number {
    if (direction === Direction.FromEnd) return this.lastIndexOf(value);
    for (let i = 0; i < this.size; i++) {
      if (this.equals(this.items[i], value)) return i;
    }
    return NOT_FOUND;
  }

  lastIndexOf(value: T): number {
    for (let i = this.size - 1; i >= 0; i--) {
      if (this.equals(this.items[i], value)) return i;
    }
    return NOT_FOUND;
  }

  /**
   * Only meaningful while the list is sorted by `compare`.
   */
  binarySearch(item: T, compare: Comparer<T> = this.compare): SearchResult {
    return binarySearch(this.items, item, compare, 0, this.size, this.rangeChecks);
  }

  // =====================================================
  // Removal
  // =====================================================

  delete(index: number): void {
    this.checkIndex(index);

    this.release(this.items, index);
    clearRange(this.items, index, 1, this.kind, this.rangeChecks);

    this.size--;
    if (index !== this.size) {
      relocate(this.items, index + 1, index, this.size - index, this.kind, this.rangeChecks);
      clearRange(this.items, this.size, 1, this.kind, this.rangeChecks);
    }
  }

  deleteRange(index: number, count: number): void {
    if (this.rangeChecks) checkRange(index, count, this.size);
    if (count === 0) return;

    for (let i = index; i < index + count; i++) {
      this.release(this.items, i);
    }

    const tail = this.size - (index + count);
    if (tail > 0) {
      relocate(this.items, index + count, index, tail, this.kind, this.rangeChecks);
      clearRange(this.items, this.size - count, count, this.kind, this.rangeChecks);
    } else {
      clearRange(this.items, index, count, this.kind, this.rangeChecks);
    }
    this.size -= count;
  }

  /**
   * Deletes the first element equal to `value`. Returns its former index, or
   * -1 when there is none.
   */
  remove(value: T): number {
    return this.removeItem(value, Direction.FromBeginning);
  }

  removeItem(value: T, direction: Direction): number {
    const index = this.indexOf(value, direction);
    if (index >= 0) this.delete(index);
    return index;
  }

  /**
   * Drops the buffer, then runs the removal hook over the detached elements.
   * The list is already empty if a hook throws.
   */
  clear(): void {
    const items = this.items;
    const count = this.size;
    if (items.length > 0) {
      this.logger.debug('Capacity changed', { from: items.length, to: 0, count: 0 });
    }
    this.items = [];
    this.size = 0;

    for (let i = 0; i < count; i++) {
      this.release(items, i);
    }
  }

  dispose(): void {
    this.clear();
  }

  // =====================================================
  // Insertion helpers
  // =====================================================

  // Removal hook for one slot. Slots exposed by a growing setCount were
  // never added, so they are skipped.
  protected release(items: Slots<T>, index: number): void {
    if (index in items) this.ownership.removed(items[index]);
  }

  // Shifts the tail right by one and stores `value` at `index`. The added
  // hook runs before anything moves, so a throwing hook leaves the list as is.
  protected placeAt(index: number, value: T): void {
    this.growCheck();
    this.ownership.added(value);
    if (index !== this.size) {
      relocate(this.items, index, index + 1, this.size - index, this.kind, this.rangeChecks);
      clearRange(this.items, index, 1, this.kind, this.rangeChecks);
    }
    this.items[index] = value;
    this.size++;
  }
}
