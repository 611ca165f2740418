/**
 * Provision Command
 *
 * Stages a new pier in the dry dock from a keyfile, an exported pier archive, or as a
 * comet, and finalizes it. Prints the pier id the other commands take.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import { parseSha256Digest, parseShipName } from '../../domain/ids.js';
import type { PierContext } from '../../domain/pier-context.js';
import { PierState } from '../../domain/pier-state.js';
import type { StageOptions } from '../../domain/pier-state.js';
import { describePendingBootMode } from '../../domain/pending-boot-mode.js';
import { parseRuntimeVersion } from '../../domain/runtime-version.js';
import { pierFailure } from './pier-failure.js';

export type ProvisionRequest =
  | { readonly kind: 'keyfile'; readonly file: string; readonly name: string }
  | { readonly kind: 'archive'; readonly file: string }
  | { readonly kind: 'comet' };

export interface ProvisionCommandOptions {
  readonly sha256?: string;
  readonly runtimeVersion?: string;
}

export interface ProvisionCommandDeps {
  readonly ctx: PierContext;
  readonly readUpload: (filePath: string) => ResultAsync<Uint8Array, { readonly message: string }>;
}

export async function executeProvisionCommand(
  request: ProvisionRequest,
  deps: ProvisionCommandDeps,
  options: ProvisionCommandOptions = {}
): Promise<CliResult> {
  const stageOptions = toStageOptions(options);
  if (stageOptions.kind === 'invalid') return stageOptions.result;

  if (request.kind === 'keyfile' && parseShipName(request.name) === null) {
    return misuse(`Not a ship name: "${request.name}"`, ['Ship names look like "~sampel-palnet" or "sampel-palnet"']);
  }

  const staged = await stage(request, deps, stageOptions.options);
  if (staged.kind === 'failed') return staged.result;

  const pier = staged.pier;
  const details = [
    `id: ${pier.id}`,
    `boot: ${describePendingBootMode(pier.pendingBootMode)}`,
    `runtime: ${pier.runtimeVersion}`,
  ];

  const finalized = await pier.finalize();
  if (finalized.isErr()) {
    return failure('Pier was staged but could not be finalized', { details: [...details, finalized.error.message] });
  }

  return success({
    message: 'Pier staged in dry dock',
    details,
    suggestions: [`Run "harbormaster commission ${pier.id}" to boot it and move it into port`],
  });
}

type StageOutcome =
  | { readonly kind: 'staged'; readonly pier: PierState }
  | { readonly kind: 'failed'; readonly result: CliResult };

async function stage(request: ProvisionRequest, deps: ProvisionCommandDeps, options: StageOptions): Promise<StageOutcome> {
  if (request.kind === 'comet') {
    const pier = await PierState.asComet(deps.ctx, options);
    return pier.isOk()
      ? { kind: 'staged', pier: pier.value }
      : { kind: 'failed', result: pierFailure('stage pier', pier.error) };
  }

  const bytes = await deps.readUpload(request.file);
  if (bytes.isErr()) {
    return { kind: 'failed', result: failure(`Could not read ${request.file}`, { details: [bytes.error.message] }) };
  }

  const pier =
    request.kind === 'keyfile'
      ? await PierState.fromKeyfile(deps.ctx, bytes.value, request.name, options)
      : await PierState.fromArchive(deps.ctx, bytes.value, options);

  return pier.isOk()
    ? { kind: 'staged', pier: pier.value }
    : { kind: 'failed', result: pierFailure('stage pier', pier.error) };
}

function toStageOptions(
  options: ProvisionCommandOptions
): { readonly kind: 'valid'; readonly options: StageOptions } | { readonly kind: 'invalid'; readonly result: CliResult } {
  let runtimeVersion: StageOptions['runtimeVersion'];
  if (options.runtimeVersion !== undefined) {
    const parsed = parseRuntimeVersion(options.runtimeVersion);
    if (parsed === null) {
      return { kind: 'invalid', result: misuse(`Unknown runtime version: ${options.runtimeVersion}`, ['Use v1.0 through v1.9']) };
    }
    runtimeVersion = parsed;
  }

  let expectedSha256: StageOptions['expectedSha256'];
  if (options.sha256 !== undefined) {
    const parsed = parseSha256Digest(options.sha256);
    if (parsed === null) {
      return { kind: 'invalid', result: misuse(`Not a SHA-256 digest: ${options.sha256}`) };
    }
    expectedSha256 = parsed;
  }

  return { kind: 'valid', options: { runtimeVersion, expectedSha256 } };
}
