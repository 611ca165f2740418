/**
 * Runtime mode of the current process.
 * Injected through DI; services never sniff env vars for it.
 */
export type RuntimeMode =
  | { readonly kind: 'production' }
  | { readonly kind: 'test' }
  | { readonly kind: 'cli' };
