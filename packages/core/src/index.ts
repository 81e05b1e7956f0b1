/**
 * slotlist – contiguous list containers
 *
 * - List           → ordered, insert anywhere, explicit sort
 * - SortedList     → ascending order kept on every add
 * - RcList         → List that retains/releases its elements
 * - RcSortedList   → SortedList that retains/releases its elements
 * - range helpers  → relocate / clear / sort / search raw slot buffers
 */

export { BaseList, type ListOptions, type ReadonlyList } from './base-list';
export { List } from './list';
export { SortedList, type SortedListOptions } from './sorted-list';
export { RcList, RcSortedList, type RcListOptions, type RcSortedListOptions } from './rc-list';
export { ListEnumerator } from './enumerator';

export {
  NO_OWNERSHIP,
  REF_COUNTING,
  RefCountedObject,
  type Ownership,
  type RefCounted,
} from './ownership';

export {
  ListError,
  ListErrorCode,
  isListError,
  type ListErrorType,
  type ListErrorMetadata,
} from './errors';

export {
  loadConfig,
  getConfig,
  setConfig,
  resetConfig,
  DEFAULT_CONFIG,
  type SlotlistConfig,
  type LogLevelSetting,
} from './config';

export {
  createLogger,
  getLogger,
  WinstonLogger,
  LogLevel,
  type Logger,
  type LoggerOptions,
  type Context,
} from './logger';

export {
  MAX_CAPACITY,
  NOT_FOUND,
  naturalCompare,
  naturalEquals,
  relocate,
  transfer,
  clearRange,
  sortRange,
  sortArray,
  binarySearch,
  Direction,
  DuplicatePolicy,
  type Slots,
  type SlotKind,
  type Comparer,
  type Equality,
  type SearchResult,
} from './internal';
