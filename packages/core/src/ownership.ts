/**
 * Ownership policies
 *
 * A list calls `added` exactly once for every element that logically
 * enters it and `removed` exactly once for every element that leaves it
 * (delete, overwrite, truncation, clear).
 */

import { ListError, ListErrorCode } from './errors';

export interface Ownership<T> {
  added(item: T): void;
  removed(item: T): void;
}

export interface RefCounted {
  retain(): void;
  release(): void;
}

export const NO_OWNERSHIP: Ownership<unknown> = {
  added() {},
  removed() {},
};

export const REF_COUNTING: Ownership<RefCounted> = {
  added: item => item.retain(),
  removed: item => item.release(),
};

/**
 * Base for shared resources. Starts with no owners; `dispose` runs when the
 * last owner releases.
 */
export abstract class RefCountedObject implements RefCounted {
  private refs = 0;
  private isDisposed = false;

  get refCount(): number {
    return this.refs;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  retain(): void {
    this.refs++;
  }

  release(): void {
    if (this.refs === 0) {
      throw new ListError(
        { code: ListErrorCode.RELEASED_TOO_OFTEN },
        `${this.constructor.name} released more often than retained`
      );
    }
    this.refs--;
    if (this.refs === 0) {
      this.isDisposed = true;
      this.dispose();
    }
  }

  protected abstract dispose(): void;
}
