/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these; the composition root prints them and picks the exit code.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  /** One line each, printed as a bulleted block under the message. */
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options?: {
    readonly exitCode?: ExitCode;
    readonly details?: readonly string[];
    readonly suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Bad arguments: a name that isn't a ship name, an id that isn't a UUID, etc.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
