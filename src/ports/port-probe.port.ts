import type { ResultAsync } from 'neverthrow';

/**
 * Port: can a TCP listener bind this port on loopback right now?
 * Never fails; any bind error means "no".
 */
export interface PortProbePort {
  isBindable(port: number): ResultAsync<boolean, never>;
}
