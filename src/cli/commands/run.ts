/**
 * Run Command
 *
 * Launches a live pier and keeps it up until a shutdown is requested (SIGINT/SIGTERM),
 * then stops the ship and finalizes the pier.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import { formatShipName, parseShipName } from '../../domain/ids.js';
import type { PierContext } from '../../domain/pier-context.js';
import { PierState } from '../../domain/pier-state.js';
import type { PortIssuer } from '../../domain/port-issuer.js';
import type { Ship } from '../../domain/ship.js';
import type { ShutdownSignal } from '../../runtime/ports/shutdown-events.js';
import { pierFailure } from './pier-failure.js';

export interface RunCommandDeps {
  readonly ctx: PierContext;
  readonly serviceIssuer: PortIssuer;
  readonly peerIssuer: PortIssuer;
  /** Resolves when the process is asked to stop. */
  readonly waitForShutdown: () => Promise<ShutdownSignal>;
  /** Called once the ship is up. */
  readonly onLaunched?: (ship: Ship) => void;
}

export async function executeRunCommand(rawName: string, deps: RunCommandDeps): Promise<CliResult> {
  const name = parseShipName(rawName);
  if (name === null) return misuse(`Not a ship name: "${rawName}"`);

  const loaded = await PierState.tryLoad(deps.ctx, { zone: 'live', name });
  if (loaded.isErr()) return pierFailure(`load ${formatShipName(name)}`, loaded.error);
  const pier = loaded.value;

  const launched = await pier.launch(deps.serviceIssuer, deps.peerIssuer);
  if (launched.isErr()) {
    const finalized = await pier.finalize();
    if (finalized.isErr()) {
      deps.ctx.logger.warn({ name, reason: finalized.error.message }, 'could not finalize pier after a failed launch');
    }
    return pierFailure(`launch ${formatShipName(name)}`, launched.error);
  }
  const ship = launched.value;
  deps.onLaunched?.(ship);

  const signal = await deps.waitForShutdown();
  deps.ctx.logger.info({ name, signal }, 'shutdown requested');

  const stopped = await ship.shutdown();
  if (stopped.isErr()) return pierFailure(`stop ${formatShipName(name)}`, stopped.error);

  const finalized = await stopped.value.finalize();
  if (finalized.isErr()) {
    return failure(`${formatShipName(name)} stopped but could not be finalized`, { details: [finalized.error.message] });
  }

  return success({ message: `${formatShipName(name)} stopped (${signal})` });
}
