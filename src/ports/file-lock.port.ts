import type { ResultAsync } from 'neverthrow';

export type FileLockError = {
  readonly code: 'LOCK_IO_ERROR';
  readonly message: string;
  readonly lockPath: string;
};

/**
 * A held lock. Opaque outside the adapter; `released` flips once.
 */
export interface FileLockHandle {
  readonly kind: 'file_lock_handle';
  readonly lockPath: string;
  readonly released: boolean;
}

export type TryAcquireOutcome =
  | { readonly kind: 'acquired'; readonly handle: FileLockHandle }
  | { readonly kind: 'busy'; readonly lockPath: string };

/**
 * Port: filesystem mutual exclusion via a zero-byte marker file.
 *
 * Guarantees:
 * - Acquisition is one atomic exclusive create (no check-then-create window)
 * - `acquire` polls at a fixed interval and never returns before the marker is gone
 * - `release` is idempotent
 * - A handle dropped without `release` is unlinked by the sync fallback, which logs at error
 *
 * Limitations:
 * - A stale marker left by a dead process looks exactly like a live lock
 * - No timeout on `acquire`; callers wrap it
 */
export interface FileLockPort {
  tryAcquire(lockPath: string): ResultAsync<TryAcquireOutcome, FileLockError>;
  acquire(lockPath: string): ResultAsync<FileLockHandle, FileLockError>;
  release(handle: FileLockHandle): ResultAsync<void, FileLockError>;
  /**
   * The marker was carried to `newLockPath` by a directory rename.
   * Returns the live handle for the new path; the old handle is spent.
   */
  relocate(handle: FileLockHandle, newLockPath: string): FileLockHandle;
}
