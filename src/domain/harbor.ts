import * as path from 'path';
import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { DirectoryOpsPort, FileReadPort, FsError } from '../ports/fs.port.js';
import type { PierId, ShipName } from './ids.js';

export type HarborError = { readonly code: 'HARBOR_INVALID'; readonly message: string; readonly path: string };

export type PierZone = 'staging' | 'live';

/** Addresses one pier directory: staging piers by id, live piers by name. */
export type PierRef =
  | { readonly zone: 'staging'; readonly id: PierId }
  | { readonly zone: 'live'; readonly name: ShipName };

export const STAGING_DIR_NAME = 'dry_dock';
export const LIVE_DIR_NAME = 'port';

type HarborFs = Pick<FileReadPort, 'statKind'> & Pick<DirectoryOpsPort, 'readdir'>;

/**
 * A validated harbor root. Holds no locks; it only knows where piers live.
 */
export class Harbor {
  private constructor(
    readonly root: string,
    readonly stagingPath: string,
    readonly livePath: string,
    private readonly fs: HarborFs
  ) {}

  /**
   * Fails when the root or either zone directory is missing or not a directory.
   */
  static open(root: string, fs: HarborFs): ResultAsync<Harbor, HarborError> {
    const resolved = path.resolve(root);
    const stagingPath = path.join(resolved, STAGING_DIR_NAME);
    const livePath = path.join(resolved, LIVE_DIR_NAME);

    const requireDirectory = (dirPath: string, what: string): ResultAsync<void, HarborError> =>
      fs
        .statKind(dirPath)
        .mapErr((e: FsError): HarborError => ({
          code: 'HARBOR_INVALID',
          message: `Harbor ${what} is missing or unreadable: ${e.message}`,
          path: dirPath,
        }))
        .andThen((kind) =>
          kind === 'directory'
            ? okAsync(undefined)
            : errAsync<void, HarborError>({
                code: 'HARBOR_INVALID',
                message: `Harbor ${what} is not a directory: ${dirPath}`,
                path: dirPath,
              })
        );

    return requireDirectory(resolved, 'root')
      .andThen(() => requireDirectory(stagingPath, 'staging zone'))
      .andThen(() => requireDirectory(livePath, 'live zone'))
      .map(() => new Harbor(resolved, stagingPath, livePath, fs));
  }

  pierDir(ref: PierRef): string {
    return ref.zone === 'staging' ? path.join(this.stagingPath, ref.id) : path.join(this.livePath, ref.name);
  }

  /**
   * Names of the directories in the live zone, sorted. Plain files and symlinks are skipped.
   */
  listLivePiers(): ResultAsync<readonly string[], HarborError> {
    return this.fs
      .readdir(this.livePath)
      .map((entries) =>
        entries
          .filter((e) => e.kind === 'directory')
          .map((e) => e.name)
          .sort()
      )
      .mapErr((e): HarborError => ({ code: 'HARBOR_INVALID', message: e.message, path: this.livePath }));
  }

  /** Staging directory names (pier ids), sorted. */
  listStagedPiers(): ResultAsync<readonly string[], HarborError> {
    return this.fs
      .readdir(this.stagingPath)
      .map((entries) =>
        entries
          .filter((e) => e.kind === 'directory')
          .map((e) => e.name)
          .sort()
      )
      .mapErr((e): HarborError => ({ code: 'HARBOR_INVALID', message: e.message, path: this.stagingPath }));
  }
}
