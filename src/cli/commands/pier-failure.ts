import type { CliResult } from '../types/cli-result.js';
import { failure } from '../types/cli-result.js';
import type { PierError } from '../../domain/pier-error.js';
import { formatPierError } from '../../domain/pier-error.js';

function suggestionsFor(error: PierError): readonly string[] | undefined {
  switch (error.code) {
    case 'PIER_ALREADY_LOCKED':
      return ['Another harbormaster process holds this pier; stop it first', `Lock file: ${error.lockPath}`];
    case 'HARBOR_INVALID':
      return ['Check HARBORMASTER_HARBOR_PATH; the harbor needs dry_dock/ and port/ directories'];
    case 'PORTS_EXHAUSTED':
      return ['Widen HARBORMASTER_HTTP_PORT_RANGE or HARBORMASTER_AMES_PORT_RANGE'];
    case 'SHIP_LAUNCH_FAILED':
      return ['Check HARBORMASTER_RUNTIME_BIN / HARBORMASTER_RUNTIME_DIR and HARBORMASTER_LOG_LEVEL=debug for ship output'];
    case 'CHECKSUM_MISMATCH':
      return ['The file changed or was truncated in transit; upload it again'];
    default:
      return undefined;
  }
}

/**
 * Pier errors are general errors (exit 1), shown as `CODE: message`.
 */
export function pierFailure(doing: string, error: PierError): CliResult {
  return failure(`Failed to ${doing}`, {
    details: [formatPierError(error)],
    suggestions: suggestionsFor(error),
  });
}
