/**
 * Reference-counted variants: the list holds one retain on every element
 * for as long as it stores it.
 */

import type { ListOptions } from './base-list';
import { List } from './list';
import { REF_COUNTING, type RefCounted } from './ownership';
import { SortedList, type SortedListOptions } from './sorted-list';

export type RcListOptions<T> = Omit<ListOptions<T>, 'ownership'>;
export type RcSortedListOptions<T> = Omit<SortedListOptions<T>, 'ownership'>;

export class RcList<T extends RefCounted> extends List<T> {
  constructor(source?: Iterable<T>, options: RcListOptions<T> = {}) {
    super(source, { ...options, ownership: REF_COUNTING });
  }
}

export class RcSortedList<T extends RefCounted> extends SortedList<T> {
  constructor(source?: Iterable<T>, options: RcSortedListOptions<T> = {}) {
    super(source, { ...options, ownership: REF_COUNTING });
  }
}
