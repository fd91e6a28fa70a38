import type { ProcessExit, ProcessTerminator } from '../../src/runtime/ports/process-terminator.js';

/**
 * Records the requested exit and throws instead of ending the test run.
 */
export class RecordingProcessTerminator implements ProcessTerminator {
  readonly exits: ProcessExit[] = [];

  terminate(exit: ProcessExit): never {
    this.exits.push(exit);
    throw new Error(`[ProcessTerminator] terminate(${exit.kind === 'failure' ? exit.code : 0})`);
  }
}
