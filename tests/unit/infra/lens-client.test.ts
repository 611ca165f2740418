import { describe, it, expect, afterEach } from 'vitest';
import { FetchLensClient } from '../../../src/infra/local/lens-client/index.js';
import { startLensStub } from '../../fakes/index.js';
import type { LensStub, LensStubReply } from '../../fakes/index.js';
import { createMemoryLog } from '../../helpers/memory-logger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('FetchLensClient', () => {
  const client = new FetchLensClient(createMemoryLog().logger, { timeoutMs: 5_000 });
  let stub: LensStub | null = null;

  async function serve(reply: LensStubReply): Promise<LensStub> {
    stub = await startLensStub(() => reply);
    return stub;
  }

  afterEach(async () => {
    await stub?.close();
    stub = null;
  });

  it('posts the dojo envelope and returns the printed string', async () => {
    const lens = await serve({ status: 200, body: JSON.stringify('~zod\n') });

    const reply = expectOk(await client.dojo(lens.port, 'our'), 'dojo');

    expect(reply).toBe('~zod\n');
    expect(lens.requests).toEqual([
      {
        method: 'POST',
        contentType: 'application/json',
        body: '{"source":{"dojo":"our"},"sink":{"stdout":null}}',
      },
    ]);
  });

  it('rejects a JSON reply that is not a string', async () => {
    const lens = await serve({ status: 200, body: '{"ok":true}' });

    const error = expectErr(await client.dojo(lens.port, 'our'), 'object reply');

    expect(error).toEqual({
      code: 'CONTROL_PROTOCOL_VIOLATION',
      message: 'dojo reply rejected: reply is not a JSON string',
      lensPort: lens.port,
    });
  });

  it('rejects a reply that is not JSON', async () => {
    const lens = await serve({ status: 200, body: '~zod' });
    expect(expectErr(await client.dojo(lens.port, 'our'), 'bare text').code).toBe('CONTROL_PROTOCOL_VIOLATION');
  });

  it('rejects an HTTP error status', async () => {
    const lens = await serve({ status: 500, body: '"boom"' });
    expect(expectErr(await client.dojo(lens.port, 'our'), 'http 500').message).toBe('dojo reply rejected: HTTP 500');
  });

  it('reports a closed port as unreachable', async () => {
    const lens = await serve({ status: 200, body: '""' });
    const port = lens.port;
    await lens.close();
    stub = null;

    const error = expectErr(await client.dojo(port, 'our'), 'closed');
    expect(error.code).toBe('CONTROL_CHANNEL_UNREACHABLE');
    expect(error.lensPort).toBe(port);
  });
});
