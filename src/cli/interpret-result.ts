/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExitCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Prints the result; terminates only on failure so cleanup handlers still run on success.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;
    case 'failure':
      terminator.terminate(toProcessExitCode(result.exitCode));
  }
}

/**
 * For failures before the container exists (invalid configuration).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;
    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
