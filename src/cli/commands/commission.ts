/**
 * Commission Command
 *
 * Boots a staged pier once, asks the ship for its name, stops it and moves it into port
 * under that name.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import { createCommissionPier } from '../../application/use-cases/commission-pier.js';
import { parsePierId } from '../../domain/ids.js';
import type { PierContext } from '../../domain/pier-context.js';
import { PierState } from '../../domain/pier-state.js';
import type { PortIssuer } from '../../domain/port-issuer.js';
import { pierFailure } from './pier-failure.js';

export interface CommissionCommandDeps {
  readonly ctx: PierContext;
  readonly serviceIssuer: PortIssuer;
  readonly peerIssuer: PortIssuer;
}

export async function executeCommissionCommand(rawId: string, deps: CommissionCommandDeps): Promise<CliResult> {
  const id = parsePierId(rawId);
  if (id === null) {
    return misuse(`Not a pier id: "${rawId}"`, ['Pier ids are printed by "harbormaster provision" and "harbormaster list --staged"']);
  }

  const loaded = await PierState.tryLoad(deps.ctx, { zone: 'staging', id });
  if (loaded.isErr()) return pierFailure('load staged pier', loaded.error);

  const commission = createCommissionPier({
    serviceIssuer: deps.serviceIssuer,
    peerIssuer: deps.peerIssuer,
    logger: deps.ctx.logger,
  });

  const commissioned = await commission(loaded.value);
  if (commissioned.isErr()) return pierFailure('commission pier', commissioned.error);

  const pier = commissioned.value;
  const finalized = await pier.finalize();
  if (finalized.isErr()) {
    return failure('Pier was commissioned but could not be finalized', { details: [finalized.error.message] });
  }

  return success({
    message: `Commissioned ~${pier.name ?? '(unnamed)'}`,
    details: [`id: ${pier.id}`, `path: ${pier.metaPath}`],
  });
}
