/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data, not exceptions. Every variant carries the context needed
 * to act on it (project, version, table, identifier).
 */

// ============================================================================
// Error Categories
// ============================================================================

export type CacheError =
  | LookupError
  | CompatibilityError
  | DataError
  | TransferError
  | ConfigurationError;

// ============================================================================
// Lookup Errors (unknown project/version/record)
// ============================================================================

export type LookupError =
  | NotFoundError
  | RecordNotFoundError
  | AmbiguousRecordError
  | ArtifactMissingError;

export type NotFoundResource = 'project' | 'version' | 'file' | 'table' | 'record_type';

export interface NotFoundError {
  readonly _tag: 'NotFound';
  readonly resource: NotFoundResource;
  readonly project: string;
  readonly version?: string;
  readonly id: string;
  readonly message: string;
}

export interface RecordNotFoundError {
  readonly _tag: 'RecordNotFound';
  readonly recordType: string;
  readonly table: string;
  readonly recordId: number;
  readonly message: string;
}

/** More than one row shares a primary id: manifest integrity violation. */
export interface AmbiguousRecordError {
  readonly _tag: 'AmbiguousRecord';
  readonly recordType: string;
  readonly table: string;
  readonly recordId: number;
  readonly matchCount: number;
  readonly message: string;
}

export interface ArtifactMissingError {
  readonly _tag: 'ArtifactMissing';
  readonly recordType: string;
  readonly table: string;
  readonly recordId: number;
  readonly message: string;
}

// ============================================================================
// Compatibility Errors
// ============================================================================

export type CompatibilityError = VersionIncompatibleError | IndirectionUnsupportedError;

export interface VersionIncompatibleError {
  readonly _tag: 'VersionIncompatible';
  readonly project: string;
  readonly version: string;
  readonly consumer: string;
  readonly clientVersion: string;
  readonly pipelineVersion?: string;
  readonly range?: readonly [string, string];
  readonly reason: string;
  readonly message: string;
}

export interface IndirectionUnsupportedError {
  readonly _tag: 'IndirectionUnsupported';
  readonly recordType: string;
  readonly details: string;
  readonly message: string;
}

// ============================================================================
// Data Errors (malformed manifest, table cells, local state)
// ============================================================================

export type DataError = ManifestInvalidError | DecodeFailedError | CorruptCacheError | ArtifactLoadFailedError;

export interface ManifestInvalidError {
  readonly _tag: 'ManifestInvalid';
  readonly project: string;
  readonly version: string;
  readonly issues: readonly string[];
  readonly message: string;
}

export interface DecodeFailedError {
  readonly _tag: 'DecodeFailed';
  readonly project: string;
  readonly version: string;
  readonly table: string;
  readonly column?: string;
  /** 0-based data row index (header excluded) */
  readonly row?: number;
  readonly cell?: string;
  readonly details: string;
  readonly message: string;
}

export interface CorruptCacheError {
  readonly _tag: 'CorruptCache';
  readonly fileId: string;
  readonly path: string;
  readonly details: string;
  readonly message: string;
}

/** The external loader could not open a verified artifact. */
export interface ArtifactLoadFailedError {
  readonly _tag: 'ArtifactLoadFailed';
  readonly path: string;
  readonly details: string;
  readonly message: string;
}

// ============================================================================
// Transfer Errors (remote fetch, local disk)
// ============================================================================

export type TransferError = DownloadFailedError | CacheIoError;

export interface DownloadFailedError {
  readonly _tag: 'DownloadFailed';
  readonly project: string;
  readonly target: string;
  readonly attempts: number;
  readonly retryable: boolean;
  readonly details: string;
  readonly message: string;
}

export interface CacheIoError {
  readonly _tag: 'CacheIo';
  readonly path: string;
  readonly operation: string;
  readonly details: string;
  readonly message: string;
}

// ============================================================================
// Configuration Errors
// ============================================================================

export type ConfigurationError = ConfigInvalidError;

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}
