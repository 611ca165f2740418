import type { Brand } from '../runtime/brand.js';

/** Lowercase hyphenated UUID v4; names a staging directory. */
export type PierId = Brand<string, 'PierId'>;

/**
 * A ship's @p without the `~` sigil (`zod`, `sampel-palnet`).
 * Lowercase letters and single or double hyphens only, so it is always a safe directory name.
 */
export type ShipName = Brand<string, 'ShipName'>;

/** `sha256:<hex>` */
export type Sha256Digest = Brand<string, 'Sha256Digest'>;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

// One syllable-pair group is six letters; galaxies are a single syllable.
const SHIP_NAME_PATTERN = /^(?:[a-z]{3}|[a-z]{6}(?:--?[a-z]{6})*)$/;

export function asPierId(value: string): PierId {
  return value as PierId;
}

export function asShipName(value: string): ShipName {
  return value as ShipName;
}

export function asSha256Digest(value: string): Sha256Digest {
  return value as Sha256Digest;
}

export function parsePierId(input: string): PierId | null {
  const lowered = input.trim().toLowerCase();
  return UUID_PATTERN.test(lowered) ? asPierId(lowered) : null;
}

/**
 * Accepts `zod`, `~zod`, and surrounding whitespace (dojo replies end in a newline).
 */
export function parseShipName(input: string): ShipName | null {
  const trimmed = input.trim();
  const bare = trimmed.startsWith('~') ? trimmed.slice(1) : trimmed;
  return SHIP_NAME_PATTERN.test(bare) ? asShipName(bare) : null;
}

export function formatShipName(name: ShipName): string {
  return `~${name}`;
}

/**
 * Accepts a bare hex digest or a `sha256:` prefixed one, any case.
 */
export function parseSha256Digest(input: string): Sha256Digest | null {
  const lowered = input.trim().toLowerCase();
  const hex = lowered.startsWith('sha256:') ? lowered.slice('sha256:'.length) : lowered;
  return /^[0-9a-f]{64}$/.test(hex) ? asSha256Digest(`sha256:${hex}`) : null;
}
