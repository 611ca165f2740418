/**
 * Port for terminating the current process.
 * Only composition roots (the CLI) call it.
 */
export type ProcessExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ProcessExitCode): never;
}
