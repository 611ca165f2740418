import { err, ok, ResultAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { formatShipName, parseShipName } from '../../domain/ids.js';
import { PierErr } from '../../domain/pier-error.js';
import type { PierError } from '../../domain/pier-error.js';
import type { PierState } from '../../domain/pier-state.js';
import type { PortIssuer } from '../../domain/port-issuer.js';

export interface CommissionPierDeps {
  readonly serviceIssuer: PortIssuer;
  readonly peerIssuer: PortIssuer;
  readonly logger: Logger;
}

/** Dojo expression that prints the ship's own name. */
export const OUR_EXPRESSION = 'our';

/**
 * Factory for the commission use-case: boot a staged pier once, ask the ship who it is,
 * stop it and move it into the live zone under that name.
 *
 * On success the returned PierState is live and still locked; the caller finalizes it.
 * On failure the pier is stopped and finalized where it stands (still in staging) and
 * the handle passed in is spent.
 */
export function createCommissionPier(deps: CommissionPierDeps) {
  return (pier: PierState): ResultAsync<PierState, PierError> => new ResultAsync(commission(pier, deps));
}

async function commission(pier: PierState, deps: CommissionPierDeps): Promise<Result<PierState, PierError>> {
  const launched = await pier.launch(deps.serviceIssuer, deps.peerIssuer);
  if (launched.isErr()) return abandon(pier, launched.error, deps.logger);
  const ship = launched.value;

  const reply = await ship.dojo(OUR_EXPRESSION);

  const stopped = await ship.shutdown();
  if (stopped.isErr()) {
    deps.logger.error({ pierId: ship.id, pid: ship.pid, reason: stopped.error.message }, 'ship did not stop during commissioning');
    return err(stopped.error);
  }
  const stoppedPier = stopped.value;

  if (reply.isErr()) return abandon(stoppedPier, reply.error, deps.logger);
  const name = parseShipName(reply.value);
  if (name === null) return abandon(stoppedPier, PierErr.invalidShipName(reply.value), deps.logger);

  const released = await stoppedPier.releaseFromDryDock(name);
  if (released.isErr()) return abandon(stoppedPier, released.error, deps.logger);

  deps.logger.info({ pierId: stoppedPier.id, name: formatShipName(name) }, 'pier commissioned');
  return ok(stoppedPier);
}

async function abandon(pier: PierState, error: PierError, logger: Logger): Promise<Result<PierState, PierError>> {
  const finalized = await pier.finalize();
  if (finalized.isErr()) {
    logger.warn({ pierId: pier.id, reason: finalized.error.message }, 'could not finalize pier after a failed commission');
  }
  return err(error);
}
