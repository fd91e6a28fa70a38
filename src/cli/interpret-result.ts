/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult becomes process termination.
 */

import type { CliResult } from './types/cli-result.js';
import { toProcessExit } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so pending log writes flush.
      return;

    case 'failure':
      terminator.terminate(toProcessExit(result.exitCode));
  }
}
