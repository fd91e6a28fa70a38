/**
 * CLI Types - Public API
 */

export type { ExitCode } from './exit-code.js';
export { toProcessExit, toNumericExitCode, exitCodeForError } from './exit-code.js';

export type { CliOutput, CliResult } from './cli-result.js';
export { success, successMessage, misuse, cacheFailure } from './cli-result.js';
