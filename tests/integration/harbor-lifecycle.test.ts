import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { okAsync } from 'neverthrow';
import {
  executeCommissionCommand,
  executeListCommand,
  executeProvisionCommand,
  executeRunCommand,
} from '../../src/cli/commands/index.js';
import { FetchLensClient } from '../../src/infra/local/lens-client/index.js';
import { startLensStub } from '../fakes/index.js';
import type { LensStub } from '../fakes/index.js';
import { createMemoryLog } from '../helpers/memory-logger.js';
import { createTestHarbor, FIRST_PIER_ID } from '../helpers/test-harbor.js';
import type { TestHarbor } from '../helpers/test-harbor.js';

/**
 * provision -> commission -> list -> run, with the real filesystem, lock, extractor and
 * control-channel client. Only the ship process is faked.
 */
describe('harbor lifecycle', () => {
  let stub: LensStub;
  let h: TestHarbor;

  beforeEach(async () => {
    stub = await startLensStub(() => ({ status: 200, body: JSON.stringify('~sampel-palnet\n') }));
    h = await createTestHarbor({ lens: new FetchLensClient(createMemoryLog().logger, { timeoutMs: 5_000 }) });
    h.runtime.lensPort = stub.port;
  });

  afterEach(async () => {
    await stub.close();
    await h.cleanup();
  });

  function issuers() {
    const { service, peer } = h.issuers();
    return { serviceIssuer: service, peerIssuer: peer };
  }

  const list = (staged: boolean) =>
    executeListCommand(
      { listLivePiers: () => h.ctx.harbor.listLivePiers(), listStagedPiers: () => h.ctx.harbor.listStagedPiers() },
      { staged }
    );

  it('takes a keyfile from upload to a running ship', async () => {
    const keyfile = new TextEncoder().encode('0w1.test-keyfile');

    const provisioned = await executeProvisionCommand(
      { kind: 'keyfile', file: '/uploads/sampel-palnet.key', name: 'sampel-palnet' },
      { ctx: h.ctx, readUpload: () => okAsync(keyfile) }
    );
    expect(provisioned.kind).toBe('success');

    expect(await list(true)).toEqual({
      kind: 'success',
      output: { message: 'Live piers: 0', details: ['', 'In dry dock:', `  ${FIRST_PIER_ID}`] },
    });

    const commissioned = await executeCommissionCommand(FIRST_PIER_ID, { ctx: h.ctx, ...issuers() });
    expect(commissioned).toEqual({
      kind: 'success',
      output: {
        message: 'Commissioned ~sampel-palnet',
        details: [`id: ${FIRST_PIER_ID}`, `path: ${path.join(h.root, 'port', 'sampel-palnet')}`],
      },
    });
    expect(stub.requests.map((r) => r.body)).toEqual(['{"source":{"dojo":"our"},"sink":{"stdout":null}}']);
    expect(h.runtime.starts[0]?.mode).toEqual({
      kind: 'boot_from_keyfile',
      keyfilePath: path.join(h.root, 'dry_dock', FIRST_PIER_ID, 'keyfile'),
      name: 'sampel-palnet',
    });

    expect(await list(true)).toEqual({ kind: 'success', output: { message: 'Live piers: 1', details: ['~sampel-palnet'] } });
    expect((await fs.readdir(path.join(h.root, 'port', 'sampel-palnet'))).sort()).toEqual(['config.json', 'pier']);

    const ran = await executeRunCommand('~sampel-palnet', {
      ctx: h.ctx,
      ...issuers(),
      waitForShutdown: () => Promise.resolve('SIGTERM'),
    });
    expect(ran).toEqual({ kind: 'success', output: { message: '~sampel-palnet stopped (SIGTERM)' } });
    expect(h.runtime.lastStart?.mode).toEqual({ kind: 'resume' });

    expect(h.fallbacks.pendingCount()).toBe(0);
    expect(h.log.messagesAt(50)).toEqual([]);
  });
});
