import type { RandomEntropyPort } from '../../src/ports/random-entropy.port.js';

/**
 * Deterministic entropy: a running byte counter starting at zero.
 *
 * Through PierIdFactory the first two ids are
 *   00010203-0405-4607-8809-0a0b0c0d0e0f
 *   10111213-1415-4617-9819-1a1b1c1d1e1f
 */
export class FakeRandomEntropy implements RandomEntropyPort {
  private sequence = 0;

  generateBytes(count: number): Uint8Array {
    const bytes = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      bytes[i] = (this.sequence + i) % 256;
    }
    this.sequence += count;
    return bytes;
  }

  reset(): void {
    this.sequence = 0;
  }
}
