import type { ResultAsync } from 'neverthrow';

export type ControlChannelError =
  | { readonly code: 'CONTROL_PROTOCOL_VIOLATION'; readonly message: string; readonly lensPort: number }
  | { readonly code: 'CONTROL_CHANNEL_UNREACHABLE'; readonly message: string; readonly lensPort: number };

/**
 * Port: the ship's loopback control channel.
 *
 * Wire: POST http://127.0.0.1:<lensPort>
 *   {"source":{"dojo":"<expr>"},"sink":{"stdout":null}}
 * The reply body must be a single JSON string.
 */
export interface LensClientPort {
  dojo(lensPort: number, expression: string): ResultAsync<string, ControlChannelError>;
}
