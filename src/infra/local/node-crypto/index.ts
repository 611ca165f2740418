import { createHash, randomFillSync } from 'crypto';
import type { Sha256Port } from '../../../ports/sha256.port.js';
import type { RandomEntropyPort } from '../../../ports/random-entropy.port.js';
import type { Sha256Digest } from '../../../domain/ids.js';
import { asSha256Digest } from '../../../domain/ids.js';

/** Upload checksums, in the `sha256:<hex>` form the CLI accepts. */
export class NodeSha256 implements Sha256Port {
  sha256(bytes: Uint8Array): Sha256Digest {
    return asSha256Digest(`sha256:${createHash('sha256').update(bytes).digest('hex')}`);
  }
}

export class NodeRandomEntropy implements RandomEntropyPort {
  generateBytes(count: number): Uint8Array {
    return randomFillSync(new Uint8Array(count));
  }
}
