import * as fs from 'fs/promises';
import * as fsCb from 'fs';
import { constants as fsConstants } from 'fs';
import { err, ok, ResultAsync as RA } from 'neverthrow';
import type { Result, ResultAsync } from 'neverthrow';
import type { FileSystemPort, FsEntry, FsEntryKind, FsError } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

// fs.write may write fewer bytes than asked; keep going until the buffer is out.
async function writeAll(fd: number, buffer: Buffer): Promise<void> {
  let offset = 0;
  while (offset < buffer.length) {
    offset += await new Promise<number>((resolve, reject) => {
      fsCb.write(fd, buffer, offset, buffer.length - offset, null, (e, written) => {
        if (e) reject(e);
        else resolve(written);
      });
    });
  }
}

function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'ENOTEMPTY') return { code: 'FS_NOT_EMPTY', message: `Directory not empty: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

function kindOf(stats: { isFile(): boolean; isDirectory(): boolean; isSymbolicLink(): boolean }): FsEntryKind {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

export class NodeFileSystem implements FileSystemPort {
  mkdir(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map((dirents) =>
      dirents.map((d): FsEntry => ({ name: d.name, kind: kindOf(d) }))
    );
  }

  removeTree(targetPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(targetPath, { recursive: true, force: true }), (e) => mapFsError(e, targetPath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  lstatKind(filePath: string): ResultAsync<FsEntryKind, FsError> {
    return RA.fromPromise(fs.lstat(filePath), (e) => mapFsError(e, filePath)).map(kindOf);
  }

  statKind(filePath: string): ResultAsync<FsEntryKind, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map(kindOf);
  }

  openExclusive(filePath: string, bytes: Uint8Array): ResultAsync<{ readonly fd: number }, FsError> {
    return RA.fromPromise(
      (async () => {
        // Low-level open: O_EXCL makes existence check and create a single step.
        const fd = await new Promise<number>((resolve, reject) => {
          fsCb.open(filePath, fsConstants.O_CREAT | fsConstants.O_EXCL | fsConstants.O_WRONLY, 0o600, (e, opened) => {
            if (e) reject(e);
            else resolve(opened);
          });
        });

        try {
          await writeAll(fd, Buffer.from(bytes));
        } catch (e) {
          // close and remove; the write error is the one reported
          await new Promise<void>((resolve) => fsCb.close(fd, () => resolve()));
          await fs.rm(filePath, { force: true });
          throw e;
        }

        return { fd };
      })(),
      (e) => mapFsError(e, filePath)
    );
  }

  fsyncFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.fsync(fd, (e) => (e ? reject(e) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  closeFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.close(fd, (e) => (e ? reject(e) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), (e) => mapFsError(e, filePath));
  }

  writeFileAtomic(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    const tmpPath = `${filePath}.tmp`;
    return RA.fromPromise(
      (async () => {
        const handle = await fs.open(tmpPath, 'w', 0o600);
        try {
          await handle.writeFile(Buffer.from(bytes));
          await handle.sync();
        } finally {
          await handle.close();
        }
        await fs.rename(tmpPath, filePath);
      })(),
      (e) => mapFsError(e, filePath)
    );
  }

  unlinkSync(filePath: string): Result<void, FsError> {
    try {
      fsCb.unlinkSync(filePath);
      return ok(undefined);
    } catch (e) {
      return err(mapFsError(e, filePath));
    }
  }

  writeFileSync(filePath: string, bytes: Uint8Array): Result<void, FsError> {
    const tmpPath = `${filePath}.tmp`;
    try {
      fsCb.writeFileSync(tmpPath, Buffer.from(bytes), { mode: 0o600 });
      fsCb.renameSync(tmpPath, filePath);
      return ok(undefined);
    } catch (e) {
      return err(mapFsError(e, filePath));
    }
  }
}
