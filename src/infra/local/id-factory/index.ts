import type { RandomEntropyPort } from '../../../ports/random-entropy.port.js';
import type { PierId } from '../../../domain/ids.js';
import { asPierId } from '../../../domain/ids.js';

const UUID_BYTES = 16 as const;

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Mints pier ids as RFC 4122 version 4 UUIDs from injected entropy.
 */
export class PierIdFactory {
  constructor(private readonly entropy: RandomEntropyPort) {}

  mintPierId(): PierId {
    const bytes = this.entropy.generateBytes(UUID_BYTES);
    bytes[6] = (bytes[6] & 0x0f) | 0x40; // version 4
    bytes[8] = (bytes[8] & 0x3f) | 0x80; // variant 10xx
    const hex = toHex(bytes);
    return asPierId(
      `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
    );
  }
}
