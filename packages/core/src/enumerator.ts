import { outOfRange } from './errors';
import type { Slots } from './internal';

/**
 * Forward cursor over a snapshot of a list's buffer and count.
 *
 * Changing the list while enumerating is undefined: a reallocation leaves
 * the enumerator reading the old buffer. Single pass; ask the list for a
 * new enumerator to start over.
 */
export class ListEnumerator<T> implements IterableIterator<T> {
  private readonly items: Slots<T>;
  private readonly high: number;
  private index = -1;

  constructor(items: Slots<T>, count: number) {
    this.items = items;
    this.high = count - 1;
  }

  get current(): T {
    if (this.index < 0) throw outOfRange(this.index, 1, this.high + 1);
    return this.items[this.index];
  }

  moveNext(): boolean {
    if (this.index < this.high) {
      this.index++;
      return true;
    }
    return false;
  }

  next(): IteratorResult<T> {
    if (this.moveNext()) return { done: false, value: this.items[this.index] };
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
