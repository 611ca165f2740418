import type { Sha256Digest } from '../domain/ids.js';

/**
 * Port: SHA-256 over raw upload bytes (keyfiles, pier archives).
 * Deterministic; same bytes give the same `sha256:<hex>` digest.
 */
export interface Sha256Port {
  sha256(bytes: Uint8Array): Sha256Digest;
}
