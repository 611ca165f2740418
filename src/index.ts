// DI Container exports
export {
  initializeContainer,
  buildPierContext,
  createPortIssuers,
  container,
  resetContainer,
} from './di/container.js';
export { DI } from './di/tokens.js';

// Domain
export { Harbor, STAGING_DIR_NAME, LIVE_DIR_NAME } from './domain/harbor.js';
export type { HarborError, PierRef, PierZone } from './domain/harbor.js';
export { PierState } from './domain/pier-state.js';
export type { StageOptions } from './domain/pier-state.js';
export { Ship } from './domain/ship.js';
export type { ShipPorts } from './domain/ship.js';
export type { PierContext, PierIdSource } from './domain/pier-context.js';
export { PierErr, formatPierError } from './domain/pier-error.js';
export type { PierError, PierErrorCode, PierOperation } from './domain/pier-error.js';
export { PortIssuer } from './domain/port-issuer.js';
export type { PortIssuerError } from './domain/port-issuer.js';
export { parsePortRange, formatPortRange } from './domain/port-range.js';
export type { PortRange } from './domain/port-range.js';
export { parsePierId, parseShipName, formatShipName, parseSha256Digest } from './domain/ids.js';
export type { PierId, ShipName, Sha256Digest } from './domain/ids.js';
export { RUNTIME_VERSIONS, DEFAULT_RUNTIME_VERSION, parseRuntimeVersion } from './domain/runtime-version.js';
export type { RuntimeVersion } from './domain/runtime-version.js';
export type { PendingBootMode } from './domain/pending-boot-mode.js';

// Use cases
export { createCommissionPier } from './application/use-cases/commission-pier.js';
export type { CommissionPierDeps } from './application/use-cases/commission-pier.js';

// Ports
export type { FileLockPort, FileLockHandle, FileLockError } from './ports/file-lock.port.js';
export type { ArchiveExtractorPort, ArchiveExtractError } from './ports/archive-extractor.port.js';
export type { ShipRuntimePort, ShipProcess, ShipStartRequest, StartMode } from './ports/ship-runtime.port.js';
export type { LensClientPort, ControlChannelError } from './ports/lens-client.port.js';

// Config
export { loadConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
