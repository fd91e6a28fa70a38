/**
 * Port for terminating the current process.
 * Only the CLI entrypoint resolves it; library code never exits.
 */
export type ProcessExit =
  | { kind: 'success' }
  | { kind: 'failure'; code: number };

export interface ProcessTerminator {
  terminate(exit: ProcessExit): never;
}
