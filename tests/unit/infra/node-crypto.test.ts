import { describe, it, expect } from 'vitest';
import { NodeRandomEntropy, NodeSha256 } from '../../../src/infra/local/node-crypto/index.js';

describe('NodeSha256', () => {
  it('digests bytes with the sha256 prefix', () => {
    expect(new NodeSha256().sha256(new Uint8Array(0))).toBe(
      'sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });
});

describe('NodeRandomEntropy', () => {
  it('returns exactly the requested number of bytes', () => {
    const entropy = new NodeRandomEntropy();
    expect(entropy.generateBytes(16)).toHaveLength(16);
    expect(entropy.generateBytes(0)).toHaveLength(0);
  });
});
