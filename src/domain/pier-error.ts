import type { ArchiveExtractError } from '../ports/archive-extractor.port.js';
import type { FileLockError } from '../ports/file-lock.port.js';
import type { FsError } from '../ports/fs.port.js';
import type { ControlChannelError } from '../ports/lens-client.port.js';
import type { ShipRuntimeError } from '../ports/ship-runtime.port.js';
import type { HarborError, PierZone } from './harbor.js';
import type { PortIssuerError } from './port-issuer.js';
import type { PortsDescriptorError } from './ports-descriptor.js';

export type PierOperation =
  | 'launch'
  | 'release_from_dry_dock'
  | 'finalize'
  | 'dojo'
  | 'shutdown';

export type PierOwnError =
  | { readonly code: 'PIER_NOT_FOUND'; readonly message: string; readonly zone: PierZone; readonly key: string }
  | { readonly code: 'PIER_ALREADY_LOCKED'; readonly message: string; readonly lockPath: string }
  | { readonly code: 'PIER_CONFIG_CORRUPT'; readonly message: string; readonly configPath: string }
  | { readonly code: 'PIER_NAME_TAKEN'; readonly message: string; readonly name: string }
  | { readonly code: 'INVALID_SHIP_NAME'; readonly message: string; readonly input: string }
  | { readonly code: 'ILLEGAL_STATE_TRANSITION'; readonly message: string; readonly operation: PierOperation }
  | { readonly code: 'ARCHIVE_NO_SHIP_FOUND'; readonly message: string; readonly reason: 'none' | 'ambiguous' }
  | { readonly code: 'CHECKSUM_MISMATCH'; readonly message: string; readonly expected: string; readonly actual: string }
  | { readonly code: 'PIER_IO_ERROR'; readonly message: string };

/**
 * Everything a pier or ship operation can fail with.
 * Port errors pass through unchanged so callers can switch on one `code`.
 */
export type PierError =
  | PierOwnError
  | ArchiveExtractError
  | FileLockError
  | PortIssuerError
  | ShipRuntimeError
  | PortsDescriptorError
  | ControlChannelError
  | HarborError;

export type PierErrorCode = PierError['code'];

export const PierErr = {
  notFound: (zone: PierZone, key: string): PierError => ({
    code: 'PIER_NOT_FOUND',
    message: `No pier "${key}" in the ${zone} zone`,
    zone,
    key,
  }),

  alreadyLocked: (lockPath: string): PierError => ({
    code: 'PIER_ALREADY_LOCKED',
    message: `Pier is in use by another handle: ${lockPath}`,
    lockPath,
  }),

  configCorrupt: (configPath: string, reason: string): PierError => ({
    code: 'PIER_CONFIG_CORRUPT',
    message: `Pier config is unusable (${reason}): ${configPath}`,
    configPath,
  }),

  nameTaken: (name: string): PierError => ({
    code: 'PIER_NAME_TAKEN',
    message: `A live pier named ~${name} already exists`,
    name,
  }),

  invalidShipName: (input: string): PierError => ({
    code: 'INVALID_SHIP_NAME',
    message: `Not a ship name: "${input}"`,
    input,
  }),

  illegalTransition: (operation: PierOperation, why: string): PierError => ({
    code: 'ILLEGAL_STATE_TRANSITION',
    message: `Cannot ${operation.replace(/_/g, ' ')}: ${why}`,
    operation,
  }),

  noShipFound: (reason: 'none' | 'ambiguous'): PierError => ({
    code: 'ARCHIVE_NO_SHIP_FOUND',
    message:
      reason === 'none'
        ? 'Archive contains no ship data directory (no .urb found)'
        : 'Archive contains more than one ship data directory',
    reason,
  }),

  checksumMismatch: (expected: string, actual: string): PierError => ({
    code: 'CHECKSUM_MISMATCH',
    message: `Upload checksum mismatch: expected ${expected}, got ${actual}`,
    expected,
    actual,
  }),

  io: (e: FsError, what: string): PierError => ({
    code: 'PIER_IO_ERROR',
    message: `${what}: ${e.message}`,
  }),
} as const;

export function formatPierError(error: PierError): string {
  return `${error.code}: ${error.message}`;
}
