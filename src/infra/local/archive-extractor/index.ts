import * as path from 'path';
import { Worker } from 'worker_threads';
import { createRequire } from 'module';
import { z } from 'zod';
import { errAsync, okAsync, ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type {
  ArchiveExtractError,
  ArchiveExtractorPort,
  ExtractOptions,
} from '../../../ports/archive-extractor.port.js';
import type { FileReadPort } from '../../../ports/fs.port.js';
import type { Logger } from '../../../core/logging/index.js';
import { checkArchiveEntries } from '../../../domain/archive-policy.js';
import type { PlannedEntry } from '../../../domain/archive-policy.js';
import { ARCHIVE_WORKER_SOURCE } from './worker-source.js';

const WarningSchema = z.object({ code: z.string(), message: z.string(), entryPath: z.string().nullable() });

type Warning = z.infer<typeof WarningSchema>;

const WorkerReplySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('listed'),
    entries: z.array(z.object({ path: z.string(), type: z.string(), linkpath: z.string().nullable() })),
    warnings: z.array(WarningSchema),
  }),
  z.object({ kind: z.literal('extracted'), count: z.number().int().nonnegative(), warnings: z.array(WarningSchema) }),
  z.object({ kind: z.literal('failed'), message: z.string(), tarCode: z.string().nullable() }),
]);

type WorkerReply = z.infer<typeof WorkerReplySchema>;

type DiskKind = 'absent' | 'directory' | 'symlink' | 'other';

type WorkerJob =
  | { readonly kind: 'list'; readonly archivePath: string }
  | {
      readonly kind: 'extract';
      readonly archivePath: string;
      readonly destination: string;
      readonly preserveTimestamps: boolean;
    };

// Warnings that mean the bytes are not a readable archive, as opposed to one bad member.
const DECODE_FAILURE_CODES = new Set(['TAR_BAD_ARCHIVE', 'TAR_ABORT', 'TAR_ENTRY_INVALID', 'Z_DATA_ERROR', 'Z_BUF_ERROR']);

/**
 * tar-backed extractor.
 *
 * Two passes, each in its own worker thread: list, then (if the whole listing passes the
 * safety policy and nothing it names already exists on disk) extract. A rejected archive
 * therefore writes nothing.
 */
export class TarArchiveExtractor implements ArchiveExtractorPort {
  private readonly tarModulePath: string;

  constructor(
    private readonly fs: Pick<FileReadPort, 'lstatKind'>,
    private readonly logger: Logger
  ) {
    this.tarModulePath = createRequire(import.meta.url).resolve('tar');
  }

  extract(archivePath: string, destination: string, options: ExtractOptions): ResultAsync<number, ArchiveExtractError> {
    return this.runJob({ kind: 'list', archivePath })
      .andThen((reply) => {
        if (reply.kind === 'failed') return errAsync(classifyFailure(archivePath, reply.tarCode, reply.message));
        if (reply.kind !== 'listed') return errAsync(ioError(`unexpected worker reply: ${reply.kind}`));
        if (reply.warnings.length > 0) {
          const first = reply.warnings[0];
          return errAsync(invalid(archivePath, `${first.code}: ${first.message}`));
        }

        const verdict = checkArchiveEntries(reply.entries);
        if (verdict.kind === 'rejected') {
          return errAsync<readonly PlannedEntry[], ArchiveExtractError>({
            code: 'ARCHIVE_ENTRY_REJECTED',
            message: `Rejected archive entry "${verdict.entryPath}": ${verdict.detail}`,
            entryPath: verdict.entryPath,
            reason: verdict.reason,
          });
        }
        return okAsync(verdict.entries);
      })
      .andThen((planned) => this.checkAgainstDisk(destination, planned))
      .andThen(() =>
        this.runJob({ kind: 'extract', archivePath, destination, preserveTimestamps: options.preserveTimestamps })
      )
      .andThen((reply) => {
        if (reply.kind === 'failed') return errAsync(classifyFailure(archivePath, reply.tarCode, reply.message));
        if (reply.kind !== 'extracted') return errAsync(ioError(`unexpected worker reply: ${reply.kind}`));
        if (reply.warnings.length > 0) {
          return errAsync(classifyWarning(archivePath, reply.warnings[0]));
        }
        this.logger.debug({ archivePath, destination, entries: reply.count }, 'archive extracted');
        return okAsync(reply.count);
      });
  }

  /**
   * Nothing may be replaced and nothing may be written through a symlink already on disk.
   * Existing directories are fine for directory entries.
   */
  private checkAgainstDisk(destination: string, planned: readonly PlannedEntry[]): ResultAsync<void, ArchiveExtractError> {
    const kinds = new Map<string, ResultAsync<DiskKind, ArchiveExtractError>>();

    const kindAt = (relativePath: string): ResultAsync<DiskKind, ArchiveExtractError> => {
      const cached = kinds.get(relativePath);
      if (cached !== undefined) return cached;
      const probe: ResultAsync<DiskKind, ArchiveExtractError> = this.fs
        .lstatKind(path.join(destination, relativePath))
        .map((kind): DiskKind => (kind === 'directory' || kind === 'symlink' ? kind : 'other'))
        .orElse((e) =>
          e.code === 'FS_NOT_FOUND'
            ? okAsync<DiskKind, ArchiveExtractError>('absent')
            : errAsync<DiskKind, ArchiveExtractError>(ioError(e.message))
        );
      kinds.set(relativePath, probe);
      return probe;
    };

    const checkOne = (entry: PlannedEntry): ResultAsync<void, ArchiveExtractError> => {
      const parts = entry.relativePath.split('/');
      const ancestors = parts.slice(0, -1).map((_, i) => parts.slice(0, i + 1).join('/'));

      const checkAncestors = ancestors.reduce<ResultAsync<boolean, ArchiveExtractError>>(
        (acc, ancestor) =>
          acc.andThen((stillPresent) =>
            !stillPresent
              ? okAsync(false)
              : kindAt(ancestor).andThen((kind) =>
                  kind === 'symlink'
                    ? errAsync<boolean, ArchiveExtractError>(
                        rejected(entry.relativePath, 'through_symlink', `${ancestor} is a symlink on disk`)
                      )
                    : okAsync(kind !== 'absent')
                )
          ),
        okAsync(true)
      );

      return checkAncestors.andThen(() =>
        kindAt(entry.relativePath).andThen((kind) => {
          if (kind === 'absent' || (kind === 'directory' && entry.isDirectory)) return okAsync(undefined);
          return errAsync(rejected(entry.relativePath, 'would_overwrite', 'path already exists in the destination'));
        })
      );
    };

    return planned.reduce<ResultAsync<void, ArchiveExtractError>>(
      (acc, entry) => acc.andThen(() => checkOne(entry)),
      okAsync(undefined)
    );
  }

  private runJob(job: WorkerJob): ResultAsync<WorkerReply, ArchiveExtractError> {
    return RA.fromPromise(
      new Promise<unknown>((resolve, reject) => {
        const worker = new Worker(ARCHIVE_WORKER_SOURCE, {
          eval: true,
          workerData: { tarModulePath: this.tarModulePath, job },
        });
        let replied = false;
        worker.once('message', (message: unknown) => {
          replied = true;
          resolve(message);
        });
        worker.once('error', reject);
        worker.once('exit', (code) => {
          if (!replied) reject(new Error(`archive worker exited with code ${code} before replying`));
        });
      }),
      (e) => ioError(`archive worker failed: ${e instanceof Error ? e.message : String(e)}`)
    ).andThen((raw) => {
      const parsed = WorkerReplySchema.safeParse(raw);
      return parsed.success
        ? okAsync(parsed.data)
        : errAsync(ioError(`archive worker sent a malformed reply: ${parsed.error.message}`));
    });
  }
}

// Per-entry refusals from the decoder (e.g. TAR_SYMLINK_ERROR) arrive as TAR_ENTRY_ERROR.
export function classifyWarning(archivePath: string, warning: Warning): ArchiveExtractError {
  const detail = `${warning.code}: ${warning.message}`;
  if (warning.code !== 'TAR_ENTRY_ERROR') return classifyFailure(archivePath, warning.code, detail);
  return {
    code: 'ARCHIVE_ENTRY_REJECTED',
    message: `Rejected archive entry "${warning.entryPath ?? archivePath}": ${detail}`,
    entryPath: warning.entryPath ?? archivePath,
    reason: warning.message.includes('TAR_SYMLINK_ERROR') ? 'through_symlink' : 'refused_on_extract',
  };
}

// A thrown error with no code came out of the decoder itself.
function classifyFailure(archivePath: string, code: string | null, message: string): ArchiveExtractError {
  return code === null || DECODE_FAILURE_CODES.has(code) ? invalid(archivePath, message) : ioError(message);
}

function invalid(archivePath: string, detail: string): ArchiveExtractError {
  return { code: 'ARCHIVE_INVALID', message: `Archive could not be decoded: ${detail}`, archivePath };
}

function ioError(message: string): ArchiveExtractError {
  return { code: 'ARCHIVE_IO_ERROR', message };
}

function rejected(
  entryPath: string,
  reason: 'through_symlink' | 'would_overwrite',
  detail: string
): ArchiveExtractError {
  return { code: 'ARCHIVE_ENTRY_REJECTED', message: `Rejected archive entry "${entryPath}": ${detail}`, entryPath, reason };
}
