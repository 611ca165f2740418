import { describe, it, expect } from 'vitest';
import { parseRuntimeVersion, RuntimeVersionSchema } from '../../../src/domain/runtime-version.js';

describe('parseRuntimeVersion', () => {
  it('reads prefixed strings, bare strings and numbers', () => {
    expect(parseRuntimeVersion('v1.9')).toBe('v1.9');
    expect(parseRuntimeVersion('1.3')).toBe('v1.3');
    expect(parseRuntimeVersion(1.5)).toBe('v1.5');
  });

  it('keeps v1.0 distinct from v1', () => {
    expect(parseRuntimeVersion('v1.0')).toBe('v1.0');
    expect(parseRuntimeVersion(1.0)).toBe('v1.0');
    expect(parseRuntimeVersion('v1')).toBeNull();
  });

  it('rejects unknown versions and other types', () => {
    expect(parseRuntimeVersion('v2.0')).toBeNull();
    expect(parseRuntimeVersion('1.10')).toBeNull();
    expect(parseRuntimeVersion(null)).toBeNull();
  });
});

describe('RuntimeVersionSchema', () => {
  it('reports the offending value', () => {
    const parsed = RuntimeVersionSchema.safeParse('v9.9');
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.errors[0]?.message).toBe('invalid runtime version: v9.9 (expected "vMAJOR.MINOR" or MAJOR.MINOR)');
  });
});
