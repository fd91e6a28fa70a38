import type {
  CacheError,
  LookupError,
  CompatibilityError,
  DataError,
  TransferError,
} from './cache-error.js';

const TAGS: ReadonlySet<string> = new Set([
  'NotFound',
  'RecordNotFound',
  'AmbiguousRecord',
  'ArtifactMissing',
  'VersionIncompatible',
  'IndirectionUnsupported',
  'ManifestInvalid',
  'DecodeFailed',
  'CorruptCache',
  'ArtifactLoadFailed',
  'DownloadFailed',
  'CacheIo',
  'ConfigInvalid',
]);

export function isCacheError(e: unknown): e is CacheError {
  if (typeof e !== 'object' || e === null || !('_tag' in e)) return false;
  const tag: unknown = e._tag;
  return typeof tag === 'string' && TAGS.has(tag);
}

export function isLookupError(e: CacheError): e is LookupError {
  return e._tag === 'NotFound'
    || e._tag === 'RecordNotFound'
    || e._tag === 'AmbiguousRecord'
    || e._tag === 'ArtifactMissing';
}

export function isCompatibilityError(e: CacheError): e is CompatibilityError {
  return e._tag === 'VersionIncompatible' || e._tag === 'IndirectionUnsupported';
}

export function isDataError(e: CacheError): e is DataError {
  return e._tag === 'ManifestInvalid'
    || e._tag === 'DecodeFailed'
    || e._tag === 'CorruptCache'
    || e._tag === 'ArtifactLoadFailed';
}

export function isTransferError(e: CacheError): e is TransferError {
  return e._tag === 'DownloadFailed' || e._tag === 'CacheIo';
}

/**
 * Transient failures a caller may retry with backoff.
 */
export function isRetriable(e: CacheError): boolean {
  switch (e._tag) {
    case 'DownloadFailed':
      return e.retryable;
    case 'CacheIo':
      return true;
    default:
      return false;
  }
}
