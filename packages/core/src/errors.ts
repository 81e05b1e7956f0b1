export enum ListErrorCode {
  OUT_OF_RANGE = 'LIST_ERROR_OUT_OF_RANGE',
  DUPLICATE_ITEM = 'LIST_ERROR_DUPLICATE_ITEM',
  ALLOCATION_FAILURE = 'LIST_ERROR_ALLOCATION_FAILURE',
  NOT_COMPARABLE = 'LIST_ERROR_NOT_COMPARABLE',
  RELEASED_TOO_OFTEN = 'LIST_ERROR_RELEASED_TOO_OFTEN',
}

export type ListErrorType =
  | { code: ListErrorCode.OUT_OF_RANGE; index: number; count: number; bound: number }
  | { code: ListErrorCode.DUPLICATE_ITEM; index: number }
  | { code: ListErrorCode.ALLOCATION_FAILURE; requested: number; maxCapacity: number }
  | { code: ListErrorCode.NOT_COMPARABLE; left: string; right: string }
  | { code: ListErrorCode.RELEASED_TOO_OFTEN };

export type ListErrorMetadata = Record<string, string | number | null>;

/**
 * Error thrown by every list and range operation, with the failure's
 * metadata attached as `type`.
 */
export class ListError extends Error {
  readonly type: ListErrorType;

  constructor(type: ListErrorType, message?: string) {
    super(message || type.code);
    this.name = 'ListError';
    this.type = type;
  }

  get code(): ListErrorCode {
    return this.type.code;
  }

  getMetadata(): ListErrorMetadata {
    return { ...this.type };
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): ListErrorMetadata {
    return {
      ...this.getMetadata(),
      stack: this.stack || '',
    };
  }
}

export function isListError(e: unknown, code?: ListErrorCode): e is ListError {
  return e instanceof ListError && (code === undefined || e.type.code === code);
}

// =====================================================
// Factories
// =====================================================

export function outOfRange(index: number, count: number, bound: number): ListError {
  const detail = count === 1 ? `Index ${index}` : `Range ${index}+${count}`;
  return new ListError(
    { code: ListErrorCode.OUT_OF_RANGE, index, count, bound },
    `${detail} out of bounds for length ${bound}`
  );
}

export function duplicateItem(index: number): ListError {
  return new ListError(
    { code: ListErrorCode.DUPLICATE_ITEM, index },
    `Duplicate item (equal element at index ${index})`
  );
}

export function allocationFailure(requested: number, maxCapacity: number): ListError {
  return new ListError(
    { code: ListErrorCode.ALLOCATION_FAILURE, requested, maxCapacity },
    `Cannot allocate ${requested} slots (max capacity ${maxCapacity})`
  );
}

export function notComparable(left: string, right: string): ListError {
  return new ListError(
    { code: ListErrorCode.NOT_COMPARABLE, left, right },
    `No natural order between ${left} and ${right}; pass a comparer`
  );
}
