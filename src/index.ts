// Composition root
export { openProjectCache, artifactOptionsFrom, type OpenProjectCacheOptions } from './open-project-cache.js';
export { initializeContainer, resetContainer, container } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
export { loadCompatibilityTable } from './config/compatibility-file.js';

// Cache
export {
  ProjectCache,
  type ProjectCacheDeps,
  type ProjectCacheOptions,
  type VersionSelection,
} from './cache/project-cache.js';
export { ManifestCatalog, sortVersions } from './cache/manifest-catalog.js';
export { MetadataTableStore } from './cache/metadata-table-store.js';
export {
  LocalArtifactCache,
  artifactBasename,
  type ArtifactCacheOptions,
  type ArtifactCacheStats,
  type CacheEntry,
  type GetArtifactOptions,
  type VerifyMode,
} from './cache/local-artifact-cache.js';
export { RecordResolver, type ArtifactLoader } from './cache/record-resolver.js';
export type { RetryPolicy } from './cache/retry.js';

// Domain
export type { FileId, ManifestVersion, RecordId, Sha256Hex } from './domain/ids.js';
export { parseManifest, keyFromUrl, type Manifest, type ManifestFileEntry } from './domain/manifest.js';
export { compareManifests, describeManifestDiff, isEmptyDiff, type ManifestDiff } from './domain/manifest-diff.js';
export {
  VersionCompatibilityChecker,
  DEFAULT_COMPATIBILITY,
  parseCompatibilityTable,
  type CheckedManifest,
  type CompatibilityOutcome,
  type CompatibilityTable,
  type VersionCheckPolicy,
  type VersionRange,
} from './domain/version-compatibility.js';
export { decodeLiteral, type LiteralValue } from './domain/literal-decoder.js';
export type { CellValue, MetadataRow, MetadataTable } from './domain/metadata-table.js';
export {
  composeNormalizers,
  deriveColumn,
  addSessionNumber,
  suppressColumns,
  type TableNormalizer,
} from './domain/table-normalizers.js';
export {
  DEFAULT_RECORD_TYPES,
  DEFAULT_STRUCTURED_COLUMNS,
  type ArtifactLink,
  type IndirectionSpec,
  type RecordTypeSpec,
} from './domain/record-types.js';

// Ports and adapters
export type { ObjectStorePort, ObjectStoreError, ObjectLocator } from './ports/object-store.port.js';
export { S3ObjectStore, type S3ObjectStoreConfig } from './infra/s3/index.js';
export { DirectoryObjectStore } from './infra/local/directory-object-store/index.js';

// Errors and logging
export * from './core/errors/index.js';
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/types.js';
export { CLIENT_NAME, CLIENT_VERSION } from './version.js';
