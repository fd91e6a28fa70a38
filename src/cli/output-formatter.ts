/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`✖ ${output.message}`) : chalk.green(output.message));

  if (output.details && output.details.length > 0) {
    output.details.forEach(detail => {
      lines.push(chalk.white(`  ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    output.warnings.forEach(warning => {
      lines.push(chalk.yellow(`⚠ ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    output.suggestions.forEach(suggestion => {
      lines.push(chalk.gray(`→ ${suggestion}`));
    });
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
 * Print a CliResult: failures to stderr, everything else to stdout.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted) {
    if (result.kind === 'failure') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/**
 * Aligned `key: value` rows for detail lists.
 */
export function formatKeyValues(rows: ReadonlyArray<readonly [string, string]>): string[] {
  const width = Math.max(0, ...rows.map(([key]) => key.length));
  return rows.map(([key, value]) => `${`${key}:`.padEnd(width + 1)} ${value}`);
}
