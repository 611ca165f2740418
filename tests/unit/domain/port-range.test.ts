import { describe, it, expect } from 'vitest';
import { formatPortRange, parsePortRange, rangeContains, rangesOverlap } from '../../../src/domain/port-range.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('port ranges', () => {
  it('parses start..end', () => {
    expect(expectOk(parsePortRange('9000..9010'), 'range')).toEqual({ start: 9000, end: 9010 });
    expect(expectOk(parsePortRange(' 1..65536 '), 'widest')).toEqual({ start: 1, end: 65536 });
  });

  it('allows an empty range', () => {
    expect(expectOk(parsePortRange('9000..9000'), 'empty')).toEqual({ start: 9000, end: 9000 });
  });

  it('rejects malformed and out-of-bounds ranges', () => {
    expect(expectErr(parsePortRange('9000-9010'), 'dash').message).toBe('expected "start..end", got "9000-9010"');
    expect(expectErr(parsePortRange('0..10'), 'zero').message).toBe('port range out of bounds: 0..10');
    expect(expectErr(parsePortRange('10..5'), 'reversed').code).toBe('PORT_RANGE_INVALID');
    expect(expectErr(parsePortRange('1..65537'), 'too high').code).toBe('PORT_RANGE_INVALID');
  });

  it('treats ranges as half-open', () => {
    const range = { start: 9000, end: 9002 };
    expect(rangeContains(range, 9000)).toBe(true);
    expect(rangeContains(range, 9001)).toBe(true);
    expect(rangeContains(range, 9002)).toBe(false);
    expect(rangesOverlap(range, { start: 9002, end: 9004 })).toBe(false);
    expect(rangesOverlap(range, { start: 9001, end: 9004 })).toBe(true);
    expect(formatPortRange(range)).toBe('9000..9002');
  });
});
