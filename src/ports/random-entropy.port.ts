/**
 * Port: cryptographically secure random bytes.
 * Pier ids are minted from it; tests swap in a deterministic sequence.
 */
export interface RandomEntropyPort {
  /** Exactly `count` bytes. */
  generateBytes(count: number): Uint8Array;
}
