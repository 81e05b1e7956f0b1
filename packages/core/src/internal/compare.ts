/**
 * Natural ordering for primitive element types
 */

import { notComparable } from '../errors';

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'Date';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function order(a: number | string | bigint, b: number | string | bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ascending order for numbers, strings (by UTF-16 code unit), bigints,
 * booleans (false first) and dates. NaN sorts before every other number.
 * Any other pairing throws NOT_COMPARABLE.
 */
export function naturalCompare<T>(a: T, b: T): number {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : -1;
    if (Number.isNaN(b)) return 1;
    return order(a, b);
  }
  if (typeof a === 'string' && typeof b === 'string') return order(a, b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return order(a, b);
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return naturalCompare(a.getTime(), b.getTime());
  throw notComparable(describe(a), describe(b));
}

/**
 * SameValueZero, except that dates compare by time value.
 */
export function naturalEquals<T>(a: T, b: T): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b || (a !== a && b !== b);
}
