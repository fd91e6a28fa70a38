/**
 * CLI Result Types
 *
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';
import { exitCodeForError } from './exit-code.js';
import type { CacheError } from '../../core/errors/cache-error.js';
import { actionableHint } from '../../core/errors/formatter.js';

/**
 * Structured output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function successMessage(message: string): CliResult {
  return { kind: 'success', output: { message } };
}

/**
 * Bad arguments: exit 2 with optional usage hints.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}

/**
 * Failure carrying a CacheError; the exit code follows its tag and the
 * actionable hint becomes the suggestion.
 */
export function cacheFailure(error: CacheError): CliResult {
  return {
    kind: 'failure',
    exitCode: exitCodeForError(error),
    output: {
      message: error.message,
      details: [`error: ${error._tag}`],
      suggestions: [actionableHint(error)],
    },
  };
}
