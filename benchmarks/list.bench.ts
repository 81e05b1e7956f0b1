/**
 * Benchmark: List / SortedList vs native arrays
 */

import { bench, describe } from 'vitest';
import { List, SortedList } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const values = Array.from({ length: SIZE }, (_, i) => (i * 7919) % SIZE);

// ===== Append =====
describe('Append 1000 items', () => {
  bench('Native push', () => {
    const arr: number[] = [];
    for (const v of values) arr.push(v);
  });

  bench('List add (owned slots)', () => {
    const list = new List<number>();
    for (const v of values) list.add(v);
  });

  bench('List add (plain slots)', () => {
    const list = new List<number>(undefined, { kind: 'plain' });
    for (const v of values) list.add(v);
  });
});

// ===== Insert at front =====
describe('Insert 1000 items at index 0', () => {
  bench('Native unshift', () => {
    const arr: number[] = [];
    for (const v of values) arr.unshift(v);
  });

  bench('List insert (owned slots)', () => {
    const list = new List<number>();
    for (const v of values) list.insert(0, v);
  });

  bench('List insert (plain slots)', () => {
    const list = new List<number>(undefined, { kind: 'plain' });
    for (const v of values) list.insert(0, v);
  });
});

// ===== Sorted insertion =====
describe('Build sorted collection of 1000 items', () => {
  bench('Native push + sort', () => {
    const arr = values.slice();
    arr.sort((a, b) => a - b);
  });

  bench('List sort', () => {
    const list = new List(values);
    list.sort((a, b) => a - b);
  });

  bench('SortedList add', () => {
    new SortedList(values, { duplicates: 'accept' });
  });
});
