import type { ShipName } from './ids.js';

/**
 * How an uninitialized pier gets its identity on first launch.
 * Cleared once the pier has booted.
 */
export type PendingBootMode =
  | { readonly kind: 'keyfile'; readonly name: ShipName }
  | { readonly kind: 'extracted' }
  | { readonly kind: 'comet' };

export function describePendingBootMode(mode: PendingBootMode | null): string {
  if (mode === null) return 'booted';
  switch (mode.kind) {
    case 'keyfile':
      return `keyfile (~${mode.name})`;
    case 'extracted':
      return 'extracted from archive';
    case 'comet':
      return 'comet';
  }
}
