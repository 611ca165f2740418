import type { Result, ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_NOT_EMPTY'; readonly message: string };

export type FsEntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface FsEntry {
  readonly name: string;
  readonly kind: FsEntryKind;
}

/**
 * Port: Directory creation, listing and removal.
 * Used by: pier constructors, harbor, archive staging.
 */
export interface DirectoryOpsPort {
  /** Creates exactly one directory; fails FS_ALREADY_EXISTS if it is there. */
  mkdir(dirPath: string): ResultAsync<void, FsError>;
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError>;
  /** Recursive removal; a missing path is not an error. */
  removeTree(targetPath: string): ResultAsync<void, FsError>;
}

/**
 * Port: File reads and metadata.
 */
export interface FileReadPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  /** Kind of the entry itself (symlinks are not followed). FS_NOT_FOUND when absent. */
  lstatKind(filePath: string): ResultAsync<FsEntryKind, FsError>;
  /** Same, following symlinks. */
  statKind(filePath: string): ResultAsync<FsEntryKind, FsError>;
}

/**
 * Port: File descriptor operations for lock markers.
 */
export interface FileDescriptorPort {
  /**
   * Create a file exclusively (O_CREAT|O_EXCL). FS_ALREADY_EXISTS if present.
   * The check and the create are one syscall.
   */
  openExclusive(filePath: string, bytes: Uint8Array): ResultAsync<{ readonly fd: number }, FsError>;
  fsyncFile(fd: number): ResultAsync<void, FsError>;
  closeFile(fd: number): ResultAsync<void, FsError>;
}

/**
 * Port: File manipulation.
 */
export interface FileManipulationPort {
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
  /** Write to `<path>.tmp` then rename over `path`. */
  writeFileAtomic(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
}

/**
 * Port: Blocking variants for the sync fallback path.
 * Nothing but fallback closures may call these.
 */
export interface SyncFileOpsPort {
  unlinkSync(filePath: string): Result<void, FsError>;
  writeFileSync(filePath: string, bytes: Uint8Array): Result<void, FsError>;
}

export interface FileSystemPort
  extends DirectoryOpsPort,
    FileReadPort,
    FileDescriptorPort,
    FileManipulationPort,
    SyncFileOpsPort {}
