/**
 * Core constants for slotlist containers
 */

import type { SlotKind } from './types';

// Largest length a JavaScript array can take
export const MAX_CAPACITY = 2 ** 32 - 1;

export const DEFAULT_SLOT_KIND: SlotKind = 'owned';

// Returned by searches and removals that find nothing
export const NOT_FOUND = -1;

// Module name attached to log entries of the default logger
export const LOGGER_MODULE = 'slotlist';
