/**
 * Internal modules barrel export
 */

// Constants
export { MAX_CAPACITY, DEFAULT_SLOT_KIND, NOT_FOUND, LOGGER_MODULE } from './constants';

// Ordering
export { naturalCompare, naturalEquals } from './compare';

// Range operations
export {
  checkRange,
  relocate,
  transfer,
  clearRange,
  sortRange,
  sortArray,
  binarySearch,
} from './range';

// Types
export { Direction, DuplicatePolicy } from './types';
export type { Slots, SlotKind, Comparer, Equality, SearchResult } from './types';
