/**
 * List Command
 *
 * Lists live piers by name, and staged piers by id with --staged.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { HarborError } from '../../domain/harbor.js';
import { pierFailure } from './pier-failure.js';

export interface ListCommandDeps {
  readonly listLivePiers: () => ResultAsync<readonly string[], HarborError>;
  readonly listStagedPiers: () => ResultAsync<readonly string[], HarborError>;
}

export interface ListCommandOptions {
  readonly staged?: boolean;
}

export async function executeListCommand(deps: ListCommandDeps, options: ListCommandOptions = {}): Promise<CliResult> {
  const live = await deps.listLivePiers();
  if (live.isErr()) return pierFailure('list piers', live.error);

  const details = live.value.map((name) => `~${name}`);

  if (options.staged) {
    const staged = await deps.listStagedPiers();
    if (staged.isErr()) return pierFailure('list piers', staged.error);
    if (staged.value.length > 0) {
      details.push('', 'In dry dock:', ...staged.value.map((id) => `  ${id}`));
    }
  }

  if (details.length === 0) {
    return success({
      message: 'No live piers',
      suggestions: ['Stage one with "harbormaster provision", then "harbormaster commission <id>"'],
    });
  }

  return success({ message: `Live piers: ${live.value.length}`, details });
}
