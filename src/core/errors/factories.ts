/**
 * Error Factories - Err namespace for all CacheError constructors.
 */

import type {
  NotFoundError,
  NotFoundResource,
  RecordNotFoundError,
  AmbiguousRecordError,
  ArtifactMissingError,
  VersionIncompatibleError,
  IndirectionUnsupportedError,
  ManifestInvalidError,
  DecodeFailedError,
  CorruptCacheError,
  ArtifactLoadFailedError,
  DownloadFailedError,
  CacheIoError,
  ConfigInvalidError,
  ConfigIssue,
} from './cache-error.js';

export const Err = {
  // ==========================================================================
  // Lookup
  // ==========================================================================

  notFound: (
    resource: NotFoundResource,
    project: string,
    id: string,
    version?: string
  ): NotFoundError => ({
    _tag: 'NotFound',
    resource,
    project,
    version,
    id,
    message: version !== undefined
      ? `Unknown ${resource} "${id}" in ${project}@${version}`
      : `Unknown ${resource} "${id}" in ${project}`,
  }),

  recordNotFound: (recordType: string, table: string, recordId: number): RecordNotFoundError => ({
    _tag: 'RecordNotFound',
    recordType,
    table,
    recordId,
    message: `No ${recordType} with id ${recordId} in ${table}`,
  }),

  ambiguousRecord: (
    recordType: string,
    table: string,
    recordId: number,
    matchCount: number
  ): AmbiguousRecordError => ({
    _tag: 'AmbiguousRecord',
    recordType,
    table,
    recordId,
    matchCount,
    message: `${table} should have 1 and only 1 row for ${recordType} ${recordId}; found ${matchCount}`,
  }),

  artifactMissing: (recordType: string, table: string, recordId: number): ArtifactMissingError => ({
    _tag: 'ArtifactMissing',
    recordType,
    table,
    recordId,
    message: `${recordType} ${recordId} in ${table} has neither a file id nor references to follow`,
  }),

  // ==========================================================================
  // Compatibility
  // ==========================================================================

  versionIncompatible: (input: {
    readonly project: string;
    readonly version: string;
    readonly consumer: string;
    readonly clientVersion: string;
    readonly reason: string;
    readonly pipelineVersion?: string;
    readonly range?: readonly [string, string];
  }): VersionIncompatibleError => ({
    _tag: 'VersionIncompatible',
    ...input,
    message: input.range
      ? `Manifest ${input.project}@${input.version} requires ${input.consumer} >=${input.range[0]} and <${input.range[1]}; ` +
        `running ${input.clientVersion}. Upgrade or downgrade ${input.consumer}, or open the latest manifest.`
      : `Manifest ${input.project}@${input.version} is not usable by ${input.consumer} ${input.clientVersion}: ${input.reason}`,
  }),

  indirectionUnsupported: (recordType: string, details: string): IndirectionUnsupportedError => ({
    _tag: 'IndirectionUnsupported',
    recordType,
    details,
    message: `Record type "${recordType}" needs more than one level of indirection: ${details}`,
  }),

  // ==========================================================================
  // Data
  // ==========================================================================

  manifestInvalid: (project: string, version: string, issues: readonly string[]): ManifestInvalidError => ({
    _tag: 'ManifestInvalid',
    project,
    version,
    issues,
    message: `Manifest ${project}@${version} is invalid: ${issues.slice(0, 3).join('; ')}`,
  }),

  decodeFailed: (input: {
    readonly project: string;
    readonly version: string;
    readonly table: string;
    readonly details: string;
    readonly column?: string;
    readonly row?: number;
    readonly cell?: string;
  }): DecodeFailedError => ({
    _tag: 'DecodeFailed',
    ...input,
    message: input.column !== undefined && input.row !== undefined
      ? `Failed to decode ${input.table}.${input.column} at row ${input.row} (${input.project}@${input.version}): ${input.details}`
      : `Failed to decode ${input.table} (${input.project}@${input.version}): ${input.details}`,
  }),

  corruptCache: (fileId: string, path: string, details: string): CorruptCacheError => ({
    _tag: 'CorruptCache',
    fileId,
    path,
    details,
    message: `Cached artifact ${fileId} at ${path} failed verification: ${details}`,
  }),

  artifactLoadFailed: (path: string, details: string): ArtifactLoadFailedError => ({
    _tag: 'ArtifactLoadFailed',
    path,
    details,
    message: `Failed to open artifact at ${path}: ${details}`,
  }),

  // ==========================================================================
  // Transfer
  // ==========================================================================

  downloadFailed: (
    project: string,
    target: string,
    attempts: number,
    details: string,
    retryable = true
  ): DownloadFailedError => ({
    _tag: 'DownloadFailed',
    project,
    target,
    attempts,
    retryable,
    details,
    message: `Failed to download ${target} (${project}) after ${attempts} attempt(s): ${details}`,
  }),

  cacheIo: (path: string, operation: string, details: string): CacheIoError => ({
    _tag: 'CacheIo',
    path,
    operation,
    details,
    message: `Cache ${operation} failed at ${path}: ${details}`,
  }),

  // ==========================================================================
  // Configuration
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
  }),
} as const;
