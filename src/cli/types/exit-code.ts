import type { ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes, following Unix conventions:
 * 0 success, 1 general error, 2 misuse (bad arguments).
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'general_error' }
  | { readonly kind: 'misuse' };

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
    case 'misuse':
      return { kind: 'failure' };
  }
}

/**
 * Numeric value for raw process.exit(). Only where the container could not be built.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
