import type { ArchiveExtractorPort } from '../ports/archive-extractor.port.js';
import type { FileLockPort } from '../ports/file-lock.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { LensClientPort } from '../ports/lens-client.port.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import type { ShipRuntimePort } from '../ports/ship-runtime.port.js';
import type { SyncFallbackRegistry } from '../runtime/sync-fallback-registry.js';
import type { Logger } from '../core/logging/index.js';
import type { Harbor } from './harbor.js';
import type { PierId } from './ids.js';

export interface PierIdSource {
  mintPierId(): PierId;
}

/**
 * Everything pier operations need, built once by the composition root and passed in.
 * There is no global harbor.
 */
export interface PierContext {
  readonly harbor: Harbor;
  readonly fs: FileSystemPort;
  readonly fileLock: FileLockPort;
  readonly extractor: ArchiveExtractorPort;
  readonly runtime: ShipRuntimePort;
  readonly lens: LensClientPort;
  readonly sha256: Sha256Port;
  readonly ids: PierIdSource;
  readonly fallbacks: SyncFallbackRegistry;
  readonly logger: Logger;
}
