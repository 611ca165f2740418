import { describe, it, expect } from 'vitest';
import { parsePierConfig, serializePierConfig } from '../../../src/domain/pier-config.js';
import { asPierId, asShipName } from '../../../src/domain/ids.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const ID = '00010203-0405-4607-8809-0a0b0c0d0e0f';

describe('pier config file', () => {
  it('serializes with the @p key and a trailing newline', () => {
    const text = serializePierConfig({ runtimeVersion: 'v1.9', id: asPierId(ID), name: asShipName('zod') });
    expect(text).toBe(`{"runtimeVersion":"v1.9","id":"${ID}","@p":"zod"}\n`);
  });

  it('writes null for an unnamed pier', () => {
    const text = serializePierConfig({ runtimeVersion: 'v1.0', id: asPierId(ID), name: null });
    expect(text).toBe(`{"runtimeVersion":"v1.0","id":"${ID}","@p":null}\n`);
  });

  it('reads what it writes', () => {
    const config = { runtimeVersion: 'v1.4' as const, id: asPierId(ID), name: asShipName('sampel-palnet') };
    expect(expectOk(parsePierConfig(serializePierConfig(config)), 'parsing')).toEqual(config);
  });

  it('accepts a numeric runtime version, a sigil, and a missing @p', () => {
    expect(expectOk(parsePierConfig(`{"runtimeVersion":1.2,"id":"${ID}","@p":"~zod"}`), 'numeric')).toEqual({
      runtimeVersion: 'v1.2',
      id: ID,
      name: 'zod',
    });
    expect(expectOk(parsePierConfig(`{"runtimeVersion":"v1.9","id":"${ID}"}`), 'missing @p').name).toBeNull();
  });

  it('names the failing field', () => {
    const error = expectErr(parsePierConfig(`{"runtimeVersion":"v1.9","id":"not-a-uuid","@p":null}`), 'bad id');
    expect(error.reason).toBe('id: id is not a UUID: not-a-uuid');
  });

  it('rejects text that is not JSON', () => {
    const error = expectErr(parsePierConfig('{'), 'truncated');
    expect(error.reason.startsWith('not JSON: ')).toBe(true);
  });
});
