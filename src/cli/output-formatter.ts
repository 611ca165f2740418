/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`)];

  if (output.details && output.details.length > 0) {
    lines.push('');
    for (const detail of output.details) lines.push(chalk.white(`  • ${detail}`));
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('', chalk.yellow('⚠️  Warnings:'));
    for (const warning of output.warnings) lines.push(chalk.yellow(`  • ${warning}`));
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('', chalk.gray('💡 Suggestions:'));
    for (const suggestion of output.suggestions) lines.push(chalk.gray(`  • ${suggestion}`));
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';
    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Successes go to stdout, failures to stderr (where the logs also go).
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;
  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}
