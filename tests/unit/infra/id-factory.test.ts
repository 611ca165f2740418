import { describe, it, expect } from 'vitest';
import { PierIdFactory } from '../../../src/infra/local/id-factory/index.js';
import { NodeRandomEntropy } from '../../../src/infra/local/node-crypto/index.js';
import { parsePierId } from '../../../src/domain/ids.js';
import { FakeRandomEntropy } from '../../fakes/index.js';

describe('PierIdFactory', () => {
  it('sets the version and variant bits', () => {
    const ids = new PierIdFactory(new FakeRandomEntropy());
    expect(ids.mintPierId()).toBe('00010203-0405-4607-8809-0a0b0c0d0e0f');
    expect(ids.mintPierId()).toBe('10111213-1415-4617-9819-1a1b1c1d1e1f');
  });

  it('mints ids the parser accepts', () => {
    const ids = new PierIdFactory(new NodeRandomEntropy());
    const minted = new Set<string>();
    for (let i = 0; i < 20; i++) {
      const id = ids.mintPierId();
      expect(parsePierId(id)).toBe(id);
      expect(id[14]).toBe('4');
      minted.add(id);
    }
    expect(minted.size).toBe(20);
  });
});
