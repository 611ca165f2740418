import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

/** Half-open: `start` is issued, `end` is not. */
export interface PortRange {
  readonly start: number;
  readonly end: number;
}

export type PortRangeParseError = { readonly code: 'PORT_RANGE_INVALID'; readonly message: string };

const RANGE_PATTERN = /^\s*(\d+)\.\.(\d+)\s*$/;

/**
 * Parses `"start..end"`.
 */
export function parsePortRange(text: string): Result<PortRange, PortRangeParseError> {
  const match = RANGE_PATTERN.exec(text);
  if (!match) {
    return err({ code: 'PORT_RANGE_INVALID', message: `expected "start..end", got "${text}"` });
  }

  const start = Number(match[1]);
  const end = Number(match[2]);
  if (start < 1 || end > 65536 || start > end) {
    return err({ code: 'PORT_RANGE_INVALID', message: `port range out of bounds: ${start}..${end}` });
  }

  return ok({ start, end });
}

export function formatPortRange(range: PortRange): string {
  return `${range.start}..${range.end}`;
}

export function rangesOverlap(a: PortRange, b: PortRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export function rangeContains(range: PortRange, port: number): boolean {
  return port >= range.start && port < range.end;
}
