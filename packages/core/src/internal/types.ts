/**
 * Core type definitions
 */

// Backing storage. Unused slots of an owned buffer are holes.
export type Slots<T> = T[];

// How slots are vacated: owned slots are emptied so no stale reference
// survives, plain slots keep whatever was last written.
export type SlotKind = 'plain' | 'owned';

export type Comparer<T> = (a: T, b: T) => number;
export type Equality<T> = (a: T, b: T) => boolean;

export interface SearchResult {
  found: boolean;
  // Index of the leftmost equal element, or the insertion point
  index: number;
}

export const Direction = {
  FromBeginning: 'fromBeginning',
  FromEnd: 'fromEnd',
} as const;
export type Direction = (typeof Direction)[keyof typeof Direction];

export const DuplicatePolicy = {
  Ignore: 'ignore',
  Accept: 'accept',
  Error: 'error',
} as const;
export type DuplicatePolicy = (typeof DuplicatePolicy)[keyof typeof DuplicatePolicy];
