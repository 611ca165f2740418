import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { executeCommissionCommand } from '../../../src/cli/commands/commission.js';
import { PierState } from '../../../src/domain/pier-state.js';
import { createTestHarbor, exists, FIRST_PIER_ID, SECOND_PIER_ID } from '../../helpers/test-harbor.js';
import type { TestHarbor } from '../../helpers/test-harbor.js';
import { expectOk } from '../../helpers/result-helpers.js';

describe('executeCommissionCommand', () => {
  let h: TestHarbor;

  beforeEach(async () => {
    h = await createTestHarbor();
  });

  afterEach(async () => {
    await h.cleanup();
  });

  function deps() {
    const issuers = h.issuers();
    return { ctx: h.ctx, serviceIssuer: issuers.service, peerIssuer: issuers.peer };
  }

  async function stageComet(): Promise<void> {
    const pier = expectOk(await PierState.asComet(h.ctx), 'stage');
    expectOk(await pier.finalize(), 'finalize staged');
  }

  it('commissions a staged pier and prints where it landed', async () => {
    await stageComet();

    const result = await executeCommissionCommand(FIRST_PIER_ID, deps());

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Commissioned ~zod',
        details: [`id: ${FIRST_PIER_ID}`, `path: ${path.join(h.root, 'port', 'zod')}`],
      },
    });
    expect(await exists(path.join(h.root, 'port', 'zod', 'lockfile'))).toBe(false);
    expect(h.fallbacks.pendingCount()).toBe(0);
  });

  it('accepts an id in upper case', async () => {
    await stageComet();

    const result = await executeCommissionCommand(FIRST_PIER_ID.toUpperCase(), deps());

    expect(result.kind).toBe('success');
  });

  it('rejects something that is not a pier id', async () => {
    const result = await executeCommissionCommand('zod', deps());

    expect(result.kind).toBe('failure');
    if (result.kind === 'failure') {
      expect(result.exitCode).toEqual({ kind: 'misuse' });
      expect(result.output.message).toBe('Not a pier id: "zod"');
    }
  });

  it('fails for an id with no staged pier', async () => {
    const result = await executeCommissionCommand(SECOND_PIER_ID, deps());

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Failed to load staged pier',
        details: [`PIER_NOT_FOUND: No pier "${SECOND_PIER_ID}" in the staging zone`],
      },
    });
  });

  it('fails and leaves the pier staged when the ship does not answer', async () => {
    await stageComet();
    h.fakeLens.failWith({ code: 'CONTROL_CHANNEL_UNREACHABLE', message: 'connection refused', lensPort: 12321 });

    const result = await executeCommissionCommand(FIRST_PIER_ID, deps());

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Failed to commission pier',
        details: ['CONTROL_CHANNEL_UNREACHABLE: connection refused'],
      },
    });
    expect(await exists(path.join(h.root, 'dry_dock', FIRST_PIER_ID, 'pier'))).toBe(true);
    expect(h.fallbacks.pendingCount()).toBe(0);
  });
});
