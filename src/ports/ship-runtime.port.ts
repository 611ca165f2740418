import type { ResultAsync } from 'neverthrow';
import type { RuntimeVersion } from '../domain/runtime-version.js';
import type { ShipName } from '../domain/ids.js';

export type StartMode =
  | { readonly kind: 'resume' }
  | { readonly kind: 'boot_comet' }
  | { readonly kind: 'boot_from_keyfile'; readonly keyfilePath: string; readonly name: ShipName };

export interface ShipStartRequest {
  readonly runtimeVersion: RuntimeVersion;
  /** The pier's data directory (`<meta>/pier`). */
  readonly pierPath: string;
  readonly servicePort: number;
  readonly peerPort: number;
  readonly mode: StartMode;
}

export type ShipRuntimeError =
  | { readonly code: 'SHIP_LAUNCH_FAILED'; readonly message: string }
  | { readonly code: 'SHIP_STOP_FAILED'; readonly message: string };

export interface ShipExit {
  readonly exitCode: number | null;
  readonly signal: string | null;
}

/**
 * A running ship process.
 */
export interface ShipProcess {
  readonly pid: number | undefined;
  /** Graceful termination; resolves once the process has exited. Idempotent. */
  stop(): ResultAsync<ShipExit, ShipRuntimeError>;
}

/**
 * Port: start the external ship binary.
 *
 * `start` resolves once the process has written its ports descriptor
 * (`<pierPath>/.http.ports`), so the caller can read it straight away.
 */
export interface ShipRuntimePort {
  start(request: ShipStartRequest): ResultAsync<ShipProcess, ShipRuntimeError>;
}
