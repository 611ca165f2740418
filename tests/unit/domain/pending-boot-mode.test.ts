import { describe, it, expect } from 'vitest';
import { describePendingBootMode } from '../../../src/domain/pending-boot-mode.js';
import { asShipName } from '../../../src/domain/ids.js';
import { formatPierError, PierErr } from '../../../src/domain/pier-error.js';

describe('describePendingBootMode', () => {
  it('describes every mode', () => {
    expect(describePendingBootMode(null)).toBe('booted');
    expect(describePendingBootMode({ kind: 'keyfile', name: asShipName('sampel-palnet') })).toBe('keyfile (~sampel-palnet)');
    expect(describePendingBootMode({ kind: 'extracted' })).toBe('extracted from archive');
    expect(describePendingBootMode({ kind: 'comet' })).toBe('comet');
  });
});

describe('formatPierError', () => {
  it('prefixes the code', () => {
    expect(formatPierError(PierErr.nameTaken('zod'))).toBe('PIER_NAME_TAKEN: A live pier named ~zod already exists');
    expect(formatPierError(PierErr.illegalTransition('release_from_dry_dock', 'the ship is running'))).toBe(
      'ILLEGAL_STATE_TRANSITION: Cannot release from dry dock: the ship is running'
    );
  });
});
