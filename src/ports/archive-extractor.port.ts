import type { ResultAsync } from 'neverthrow';

export type ArchiveRejectionReason =
  | 'empty_path'
  | 'absolute_path'
  | 'parent_traversal'
  | 'link_escapes_destination'
  | 'through_symlink'
  | 'would_overwrite'
  | 'unsupported_entry_type'
  | 'refused_on_extract';

export type ArchiveExtractError =
  | { readonly code: 'ARCHIVE_INVALID'; readonly message: string; readonly archivePath: string }
  | {
      readonly code: 'ARCHIVE_ENTRY_REJECTED';
      readonly message: string;
      readonly entryPath: string;
      readonly reason: ArchiveRejectionReason;
    }
  | { readonly code: 'ARCHIVE_IO_ERROR'; readonly message: string };

export interface ExtractOptions {
  /** Restore entry mtimes instead of stamping extraction time. */
  readonly preserveTimestamps: boolean;
}

/**
 * Port: unpack an untrusted archive under a fixed safety policy.
 *
 * Policy (always on):
 * - no absolute paths, no `..` segments
 * - no link whose target leaves the destination
 * - nothing written through a symlink, archived or pre-existing
 * - nothing overwritten
 * - no device or FIFO entries
 *
 * Decoding runs off the main thread. After any error the destination is untrusted
 * and the caller discards it whole.
 */
export interface ArchiveExtractorPort {
  /** Resolves to the number of entries written. */
  extract(archivePath: string, destination: string, options: ExtractOptions): ResultAsync<number, ArchiveExtractError>;
}
