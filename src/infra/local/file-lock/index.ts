import { setTimeout as sleep } from 'timers/promises';
import { err, errAsync, ok, okAsync, ResultAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { FileLockError, FileLockHandle, FileLockPort, TryAcquireOutcome } from '../../../ports/file-lock.port.js';
import type { FallbackToken, SyncFallbackRegistry } from '../../../runtime/sync-fallback-registry.js';
import type { Logger } from '../../../core/logging/index.js';

export const DEFAULT_LOCK_POLL_MS = 50;

class MarkerHandle implements FileLockHandle {
  readonly kind = 'file_lock_handle' as const;
  private _released = false;
  private _token: FallbackToken | null = null;

  constructor(readonly lockPath: string) {}

  get released(): boolean {
    return this._released;
  }

  get token(): FallbackToken | null {
    return this._token;
  }

  attachToken(token: FallbackToken): void {
    this._token = token;
  }

  markReleased(): FallbackToken | null {
    this._released = true;
    const token = this._token;
    this._token = null;
    return token;
  }
}

export interface LocalFileLockOptions {
  readonly pollMs?: number;
}

/**
 * Marker-file lock.
 *
 * Locked behavior:
 * - held iff the marker exists; acquisition is a single O_CREAT|O_EXCL open
 * - `tryAcquire` fails fast with `busy`, `acquire` polls every `pollMs`
 * - no stale detection, no auto-breaking
 */
export class LocalFileLock implements FileLockPort {
  private readonly pollMs: number;

  constructor(
    private readonly fs: FileSystemPort,
    private readonly fallbacks: SyncFallbackRegistry,
    private readonly logger: Logger,
    options: LocalFileLockOptions = {}
  ) {
    this.pollMs = options.pollMs ?? DEFAULT_LOCK_POLL_MS;
  }

  tryAcquire(lockPath: string): ResultAsync<TryAcquireOutcome, FileLockError> {
    return this.fs
      .openExclusive(lockPath, new Uint8Array(0))
      .andThen(({ fd }) => this.fs.closeFile(fd))
      .map((): TryAcquireOutcome => {
        this.logger.debug({ lockPath }, 'lock acquired');
        return { kind: 'acquired', handle: this.issue(lockPath) };
      })
      .orElse((e) =>
        e.code === 'FS_ALREADY_EXISTS'
          ? okAsync<TryAcquireOutcome, FileLockError>({ kind: 'busy', lockPath })
          : errAsync<TryAcquireOutcome, FileLockError>(toLockError(e, lockPath))
      );
  }

  acquire(lockPath: string): ResultAsync<FileLockHandle, FileLockError> {
    return new ResultAsync(this.pollUntilAcquired(lockPath));
  }

  release(handle: FileLockHandle): ResultAsync<void, FileLockError> {
    if (!(handle instanceof MarkerHandle)) {
      return errAsync(toLockError({ code: 'FS_IO_ERROR', message: 'handle was not issued by this lock' }, handle.lockPath));
    }
    if (handle.released) return okAsync(undefined);

    return this.fs
      .unlink(handle.lockPath)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(undefined) : errAsync(e)))
      .map(() => {
        this.spend(handle);
        this.logger.debug({ lockPath: handle.lockPath }, 'lock released');
      })
      .mapErr((e) => toLockError(e, handle.lockPath));
  }

  relocate(handle: FileLockHandle, newLockPath: string): FileLockHandle {
    if (handle instanceof MarkerHandle && !handle.released) {
      this.spend(handle);
    }
    this.logger.debug({ from: handle.lockPath, to: newLockPath }, 'lock moved with its directory');
    return this.issue(newLockPath);
  }

  private issue(lockPath: string): MarkerHandle {
    const handle = new MarkerHandle(lockPath);
    const fs = this.fs;
    // Sees only the path, never the handle it guards.
    const token = this.fallbacks.arm(handle, {
      label: `file lock ${lockPath}`,
      run: () => fs.unlinkSync(lockPath).orElse((e) => (e.code === 'FS_NOT_FOUND' ? ok(undefined) : err(e))),
    });
    handle.attachToken(token);
    return handle;
  }

  private spend(handle: MarkerHandle): void {
    const token = handle.markReleased();
    if (token !== null) this.fallbacks.disarm(token);
  }

  private async pollUntilAcquired(lockPath: string): Promise<Result<FileLockHandle, FileLockError>> {
    for (;;) {
      const outcome = await this.tryAcquire(lockPath);
      if (outcome.isErr()) return err(outcome.error);
      if (outcome.value.kind === 'acquired') return ok(outcome.value.handle);
      await sleep(this.pollMs);
    }
  }
}

function toLockError(e: FsError, lockPath: string): FileLockError {
  return { code: 'LOCK_IO_ERROR', message: e.message, lockPath };
}
