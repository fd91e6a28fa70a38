import type { ProcessExit, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(exit: ProcessExit): never {
    switch (exit.kind) {
      case 'success':
        process.exit(0);
      case 'failure':
        process.exit(exit.code);
      default:
        return assertNever(exit);
    }
  }
}
