import type { CacheError } from './cache-error.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Flatten a CacheError into pino-friendly fields.
 */
export function formatErrorForLogs(error: CacheError): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorTag: error._tag,
    message: error.message,
  };

  for (const [key, value] of Object.entries(error)) {
    if (key !== '_tag' && key !== 'message') {
      base[key] = value;
    }
  }

  return base;
}

/**
 * One-line hint telling the caller what to do next.
 */
export function actionableHint(error: CacheError): string {
  switch (error._tag) {
    case 'NotFound':
      return error.resource === 'version'
        ? `List available versions of ${error.project} and pick one of them`
        : `Check the ${error.resource.replace('_', ' ')} identifier "${error.id}"`;
    case 'RecordNotFound':
      return `Check ${error.recordType} ids in ${error.table}`;
    case 'AmbiguousRecord':
      return `Manifest integrity issue in ${error.table}; report it to the release maintainers`;
    case 'ArtifactMissing':
      return `${error.recordType} ${error.recordId} has no downloadable artifact in this release`;
    case 'VersionIncompatible':
      return error.range
        ? `Install a client version in [${error.range[0]}, ${error.range[1]})`
        : error.reason;
    case 'IndirectionUnsupported':
      return `Point "${error.recordType}" at a record type that carries file ids directly`;
    case 'ManifestInvalid':
      return `Re-download manifest ${error.project}@${error.version}`;
    case 'DecodeFailed':
      return `Inspect ${error.table}${error.column !== undefined ? `.${error.column}` : ''} in ${error.project}@${error.version}`;
    case 'CorruptCache':
      return `Invalidate ${error.fileId} and retry; the remote copy may not match its manifest digest`;
    case 'ArtifactLoadFailed':
      return `The file at ${error.path} passed cache verification; check the loader`;
    case 'DownloadFailed':
      return error.retryable ? 'Retry later; the object store may be unreachable' : 'The download was cancelled';
    case 'CacheIo':
      return `Check permissions and free space at ${error.path}`;
    case 'ConfigInvalid':
      return `Fix configuration:\n${error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')}`;
    default:
      return assertNever(error);
  }
}

export function formatCacheError(error: CacheError): string {
  return `[${error._tag}] ${error.message}\n  → ${actionableHint(error)}`;
}
