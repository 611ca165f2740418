import { describe, it, expect } from 'vitest';
import { PortIssuer } from '../../../src/domain/port-issuer.js';
import { FakePortProbe } from '../../fakes/index.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('PortIssuer', () => {
  it('hands out ports in ascending order, each once', async () => {
    const issuer = new PortIssuer({ start: 9000, end: 9003 }, new FakePortProbe());

    expect(expectOk(await issuer.getPort(), 'first')).toBe(9000);
    expect(expectOk(await issuer.getPort(), 'second')).toBe(9001);
    expect(expectOk(await issuer.getPort(), 'third')).toBe(9002);
    expect(issuer.remaining()).toBe(0);
  });

  it('skips ports that cannot be bound and never returns to them', async () => {
    const probe = new FakePortProbe([9000, 9002]);
    const issuer = new PortIssuer({ start: 9000, end: 9004 }, probe);

    expect(expectOk(await issuer.getPort(), 'first')).toBe(9001);
    expect(expectOk(await issuer.getPort(), 'second')).toBe(9003);
    expect(probe.probed).toEqual([9000, 9001, 9002, 9003]);
  });

  it('reports exhaustion with the range', async () => {
    const issuer = new PortIssuer({ start: 9000, end: 9001 }, new FakePortProbe());
    expectOk(await issuer.getPort(), 'only port');

    const error = expectErr(await issuer.getPort(), 'exhausted');
    expect(error).toEqual({
      code: 'PORTS_EXHAUSTED',
      message: 'No ports available in 9000..9001',
      range: { start: 9000, end: 9001 },
    });
  });

  it('is exhausted immediately on an empty range', async () => {
    const issuer = new PortIssuer({ start: 9000, end: 9000 }, new FakePortProbe());
    expect(expectErr(await issuer.getPort(), 'empty').code).toBe('PORTS_EXHAUSTED');
  });

  it('gives overlapping requests distinct ports', async () => {
    const issuer = new PortIssuer({ start: 9000, end: 9010 }, new FakePortProbe());
    const results = await Promise.all([issuer.getPort(), issuer.getPort(), issuer.getPort()]);
    const ports = results.map((r) => expectOk(r, 'concurrent'));
    expect(new Set(ports).size).toBe(3);
  });

  it('keeps separate cursors per issuer', async () => {
    const probe = new FakePortProbe();
    const a = new PortIssuer({ start: 9000, end: 9010 }, probe);
    const b = new PortIssuer({ start: 9000, end: 9010 }, probe);
    expect(expectOk(await a.getPort(), 'a')).toBe(9000);
    expect(expectOk(await b.getPort(), 'b')).toBe(9000);
  });
});
