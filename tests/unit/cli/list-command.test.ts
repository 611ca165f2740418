import { describe, it, expect } from 'vitest';
import { errAsync, okAsync } from 'neverthrow';
import { executeListCommand } from '../../../src/cli/commands/list.js';
import type { ListCommandDeps } from '../../../src/cli/commands/list.js';
import type { HarborError } from '../../../src/domain/harbor.js';

function deps(live: readonly string[], staged: readonly string[] = []): ListCommandDeps {
  return {
    listLivePiers: () => okAsync(live),
    listStagedPiers: () => okAsync(staged),
  };
}

describe('executeListCommand', () => {
  it('suggests provisioning when the harbor is empty', async () => {
    const result = await executeListCommand(deps([]));

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'No live piers',
        suggestions: ['Stage one with "harbormaster provision", then "harbormaster commission <id>"'],
      },
    });
  });

  it('lists live piers with their sigil', async () => {
    const result = await executeListCommand(deps(['nec', 'zod'], ['ignored']));

    expect(result).toEqual({ kind: 'success', output: { message: 'Live piers: 2', details: ['~nec', '~zod'] } });
  });

  it('adds staged ids with --staged', async () => {
    const id = '00010203-0405-4607-8809-0a0b0c0d0e0f';

    const result = await executeListCommand(deps(['zod'], [id]), { staged: true });

    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Live piers: 1', details: ['~zod', '', 'In dry dock:', `  ${id}`] },
    });
  });

  it('fails when the live zone cannot be read', async () => {
    const error: HarborError = { code: 'HARBOR_INVALID', message: 'permission denied', path: '/harbor/port' };

    const result = await executeListCommand({
      listLivePiers: () => errAsync(error),
      listStagedPiers: () => okAsync([]),
    });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Failed to list piers',
        details: ['HARBOR_INVALID: permission denied'],
        suggestions: ['Check HARBORMASTER_HARBOR_PATH; the harbor needs dry_dock/ and port/ directories'],
      },
    });
  });
});
