import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { PortProbePort } from '../ports/port-probe.port.js';
import type { PortRange } from './port-range.js';
import { formatPortRange } from './port-range.js';

export type PortIssuerError = {
  readonly code: 'PORTS_EXHAUSTED';
  readonly message: string;
  readonly range: PortRange;
};

/**
 * Hands out ports from a range, each at most once.
 *
 * The cursor only moves forward. Every candidate is claimed before it is probed, so two
 * overlapping `getPort` calls on one issuer never see the same candidate.
 *
 * Probing binds and closes a loopback listener; another process can still take the port
 * before the ship binds it. That race is not guarded against.
 */
export class PortIssuer {
  private cursor: number;

  constructor(
    readonly range: PortRange,
    private readonly probe: PortProbePort
  ) {
    this.cursor = range.start;
  }

  getPort(): ResultAsync<number, PortIssuerError> {
    if (this.cursor >= this.range.end) {
      return errAsync({
        code: 'PORTS_EXHAUSTED',
        message: `No ports available in ${formatPortRange(this.range)}`,
        range: this.range,
      });
    }

    const candidate = this.cursor;
    this.cursor += 1;

    return this.probe.isBindable(candidate).andThen((bindable) => (bindable ? okAsync(candidate) : this.getPort()));
  }

  /** Candidates not yet claimed. */
  remaining(): number {
    return Math.max(0, this.range.end - this.cursor);
  }
}
