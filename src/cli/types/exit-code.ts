import type { ProcessExit } from '../../runtime/ports/process-terminator.js';
import type { CacheError } from '../../core/errors/cache-error.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands.
 * 0-2 follow Unix conventions; 3-5 let scripts branch on the failure class.
 */
export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - corrupt data, local IO
  | { kind: 'misuse' }         // 2 - bad arguments or configuration
  | { kind: 'not_found' }      // 3 - unknown project, version, record
  | { kind: 'incompatible' }   // 4 - release outside the supported range
  | { kind: 'unavailable' };   // 5 - object store unreachable

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    case 'not_found':
      return 3;
    case 'incompatible':
      return 4;
    case 'unavailable':
      return 5;
    default:
      return assertNever(exitCode);
  }
}

export function toProcessExit(exitCode: ExitCode): ProcessExit {
  return exitCode.kind === 'success' ? { kind: 'success' } : { kind: 'failure', code: toNumericExitCode(exitCode) };
}

export function exitCodeForError(error: CacheError): ExitCode {
  switch (error._tag) {
    case 'NotFound':
    case 'RecordNotFound':
    case 'ArtifactMissing':
      return { kind: 'not_found' };
    case 'VersionIncompatible':
    case 'IndirectionUnsupported':
      return { kind: 'incompatible' };
    case 'DownloadFailed':
      return { kind: 'unavailable' };
    case 'ConfigInvalid':
      return { kind: 'misuse' };
    case 'AmbiguousRecord':
    case 'ManifestInvalid':
    case 'DecodeFailed':
    case 'CorruptCache':
    case 'ArtifactLoadFailed':
    case 'CacheIo':
      return { kind: 'general_error' };
    default:
      return assertNever(error);
  }
}
