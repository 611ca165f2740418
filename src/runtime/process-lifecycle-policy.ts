/**
 * Whether the composition root owns process signals.
 * A union instead of a boolean so call sites read as intent.
 */
export type ProcessLifecyclePolicy =
  | { readonly kind: 'install_signal_handlers' }
  | { readonly kind: 'no_signal_handlers' };
