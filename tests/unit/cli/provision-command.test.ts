import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import { errAsync, okAsync } from 'neverthrow';
import { executeProvisionCommand } from '../../../src/cli/commands/provision.js';
import type { ProvisionCommandDeps } from '../../../src/cli/commands/provision.js';
import { buildTar, pierArchiveEntries } from '../../helpers/tar-builder.js';
import { createTestHarbor, exists, FIRST_PIER_ID } from '../../helpers/test-harbor.js';
import type { TestHarbor } from '../../helpers/test-harbor.js';

const KEYFILE = new TextEncoder().encode('0w1.test-keyfile');

describe('executeProvisionCommand', () => {
  let h: TestHarbor;
  let reads: string[];

  beforeEach(async () => {
    h = await createTestHarbor();
    reads = [];
  });

  afterEach(async () => {
    await h.cleanup();
  });

  function depsServing(bytes: Uint8Array): ProvisionCommandDeps {
    return {
      ctx: h.ctx,
      readUpload: (filePath) => {
        reads.push(filePath);
        return okAsync(bytes);
      },
    };
  }

  it('stages a comet and prints its id', async () => {
    const result = await executeProvisionCommand({ kind: 'comet' }, depsServing(new Uint8Array(0)));

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Pier staged in dry dock',
        details: [`id: ${FIRST_PIER_ID}`, 'boot: comet', 'runtime: v1.9'],
        suggestions: [`Run "harbormaster commission ${FIRST_PIER_ID}" to boot it and move it into port`],
      },
    });
    expect(reads).toEqual([]);
    expect(await exists(path.join(h.root, 'dry_dock', FIRST_PIER_ID, 'lockfile'))).toBe(false);
    expect(h.fallbacks.pendingCount()).toBe(0);
  });

  it('stages a keyfile under the requested runtime', async () => {
    const result = await executeProvisionCommand(
      { kind: 'keyfile', file: '/uploads/key', name: '~sampel-palnet' },
      depsServing(KEYFILE),
      { runtimeVersion: '1.4' }
    );

    expect(result.kind).toBe('success');
    if (result.kind === 'success') {
      expect(result.output?.details).toEqual([`id: ${FIRST_PIER_ID}`, 'boot: keyfile (~sampel-palnet)', 'runtime: v1.4']);
    }
    expect(reads).toEqual(['/uploads/key']);
    expect(await exists(path.join(h.root, 'dry_dock', FIRST_PIER_ID, 'keyfile'))).toBe(true);
  });

  it('stages an exported pier archive', async () => {
    const result = await executeProvisionCommand(
      { kind: 'archive', file: '/uploads/zod.tar' },
      depsServing(buildTar(pierArchiveEntries('zod')))
    );

    expect(result.kind).toBe('success');
    if (result.kind === 'success') {
      expect(result.output?.details).toEqual([`id: ${FIRST_PIER_ID}`, 'boot: extracted from archive', 'runtime: v1.9']);
    }
  });

  it('rejects a bad ship name before reading the upload', async () => {
    const result = await executeProvisionCommand(
      { kind: 'keyfile', file: '/uploads/key', name: 'Zod' },
      depsServing(KEYFILE)
    );

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: {
        message: 'Not a ship name: "Zod"',
        suggestions: ['Ship names look like "~sampel-palnet" or "sampel-palnet"'],
      },
    });
    expect(reads).toEqual([]);
  });

  it('rejects an unknown runtime version', async () => {
    const result = await executeProvisionCommand({ kind: 'comet' }, depsServing(KEYFILE), { runtimeVersion: 'v2.0' });

    expect(result.kind).toBe('failure');
    if (result.kind === 'failure') {
      expect(result.exitCode).toEqual({ kind: 'misuse' });
      expect(result.output.message).toBe('Unknown runtime version: v2.0');
    }
  });

  it('rejects a malformed digest', async () => {
    const result = await executeProvisionCommand({ kind: 'comet' }, depsServing(KEYFILE), { sha256: 'abc' });

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: { message: 'Not a SHA-256 digest: abc' },
    });
  });

  it('reports an upload that does not match its digest', async () => {
    const expected = `sha256:${'00'.repeat(32)}`;

    const result = await executeProvisionCommand(
      { kind: 'keyfile', file: '/uploads/key', name: 'zod' },
      depsServing(KEYFILE),
      { sha256: '00'.repeat(32) }
    );

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: 'Failed to stage pier',
        details: [`CHECKSUM_MISMATCH: Upload checksum mismatch: expected ${expected}, got ${h.ctx.sha256.sha256(KEYFILE)}`],
        suggestions: ['The file changed or was truncated in transit; upload it again'],
      },
    });
  });

  it('reports an unreadable upload', async () => {
    const result = await executeProvisionCommand(
      { kind: 'archive', file: '/uploads/missing.tar' },
      { ctx: h.ctx, readUpload: () => errAsync({ message: 'no such file' }) }
    );

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: { message: 'Could not read /uploads/missing.tar', details: ['no such file'] },
    });
  });
});
