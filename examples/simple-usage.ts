/**
 * Simple usage - List, SortedList and RcList
 */

import { List, SortedList, RcList, RefCountedObject, isListError } from '../packages/core/src/index';

console.log('=== slotlist: contiguous lists ===\n');

// ===== Ordered list =====
console.log('1️⃣ List keeps insertion order');
const list = new List([10, 20, 30]);
list.insert(1, 15);
list.move(0, 3);
console.log('After insert(1, 15) + move(0, 3):', list.toArray());
console.log('count:', list.count, 'capacity:', list.capacity);

// ===== Sorted list =====
console.log('\n2️⃣ SortedList keeps ascending order');
const sorted = new SortedList<number>(undefined, { duplicates: 'error' });
sorted.addRange([5, 3, 1]);
console.log('Sorted:', sorted.toArray());
try {
  sorted.add(3);
} catch (e) {
  if (!isListError(e)) throw e;
  console.log('Rejected duplicate:', e.code);
}

// ===== Reference counted =====
console.log('\n3️⃣ RcList retains what it stores');

class Connection extends RefCountedObject {
  constructor(readonly id: string) {
    super();
  }

  protected dispose(): void {
    console.log(`  connection ${this.id} closed`);
  }
}

const pool = new RcList([new Connection('a'), new Connection('b')]);
console.log('refCount of first:', pool.first().refCount);
pool.delete(0);
pool.clear();
console.log('✅ Every connection released exactly once');
