import { BaseList, type ListOptions } from './base-list';
import { clearRange, relocate, sortRange, type Comparer } from './internal';

/**
 * List - ordered growable sequence
 *
 * Elements stay in insertion order until reordered explicitly with
 * `exchange`, `move`, `reverse` or `sort`.
 */
export class List<T> extends BaseList<T> {
  static from<T>(source: Iterable<T>, options?: ListOptions<T>): List<T> {
    return new List(source, options);
  }

  constructor(source?: Iterable<T>, options: ListOptions<T> = {}) {
    super(options);
    if (source) this.addRange(source);
  }

  /**
   * Appends `value` and returns its index.
   */
  add(value: T): number {
    this.growCheck();
    this.ownership.added(value);
    const index = this.size;
    this.items[index] = value;
    this.size++;
    return index;
  }

  addRange(values: Iterable<T>): void {
    this.insertRange(this.size, values);
  }

  insert(index: number, value: T): void {
    if (this.rangeChecks) this.checkInsertIndex(index);
    this.placeAt(index, value);
  }

  insertRange(index: number, values: Iterable<T>): void {
    if (this.rangeChecks) this.checkInsertIndex(index);

    // Materialized first: `values` may be this list
    const incoming = Array.from(values);
    const count = incoming.length;
    if (count === 0) return;

    this.growCheck(this.size + count);
    this.addAll(incoming);
    if (index !== this.size) {
      relocate(this.items, index, index + count, this.size - index, this.kind, this.rangeChecks);
      clearRange(this.items, index, count, this.kind, this.rangeChecks);
    }

    for (let i = 0; i < count; i++) {
      this.items[index + i] = incoming[i];
    }
    this.size += count;
  }

  /**
   * Replaces the element at `index`. The new value is announced to the
   * ownership policy before the old one is released.
   */
  set(index: number, value: T): void {
    this.checkIndex(index);
    this.ownership.added(value);
    // A slot exposed by a growing setCount holds nothing to release
    const occupied = index in this.items;
    const previous = this.items[index];
    this.items[index] = value;
    if (occupied) this.ownership.removed(previous);
  }

  exchange(index1: number, index2: number): void {
    this.checkIndex(index1);
    this.checkIndex(index2);
    const temp = this.items[index1];
    this.items[index1] = this.items[index2];
    this.items[index2] = temp;
  }

  /**
   * Moves the element at `curIndex` to `newIndex`, shifting the elements in
   * between by one.
   */
  move(curIndex: number, newIndex: number): void {
    if (curIndex === newIndex) return;
    this.checkIndex(curIndex);
    this.checkIndex(newIndex);

    const temp = this.items[curIndex];
    if (curIndex < newIndex) {
      relocate(this.items, curIndex + 1, curIndex, newIndex - curIndex, this.kind, this.rangeChecks);
    } else {
      relocate(this.items, newIndex, newIndex + 1, curIndex - newIndex, this.kind, this.rangeChecks);
    }
    this.items[newIndex] = temp;
  }

  reverse(): void {
    let b = 0;
    let e = this.size - 1;
    while (b < e) {
      const temp = this.items[b];
      this.items[b] = this.items[e];
      this.items[e] = temp;
      b++;
      e--;
    }
  }

  /**
   * Sorts in place. Not stable.
   */
  sort(compare: Comparer<T> = this.compare): void {
    sortRange(this.items, compare, 0, this.size, this.rangeChecks);
  }

  // Runs the added hook over `values`; if one throws, those already added
  // are handed back to the removed hook before the error propagates.
  private addAll(values: T[]): void {
    let i = 0;
    try {
      for (; i < values.length; i++) this.ownership.added(values[i]);
    } catch (error) {
      for (let j = 0; j < i; j++) this.ownership.removed(values[j]);
      throw error;
    }
  }

  // insert positions run up to and including count
  private checkInsertIndex(index: number): void {
    if (index === this.size) return;
    this.checkIndex(index);
  }
}
