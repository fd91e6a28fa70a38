import semver from 'semver';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheError } from '../core/errors/cache-error.js';
import type { ILoggerFactory, Logger } from '../core/logging/types.js';
import type { FileId, ManifestVersion, RecordId } from '../domain/ids.js';
import { metadataTableNames, type Manifest } from '../domain/manifest.js';
import { compareManifests, type ManifestDiff } from '../domain/manifest-diff.js';
import type { MetadataTable } from '../domain/metadata-table.js';
import {
  buildRecordTypeRegistry,
  tableNormalizers,
  DEFAULT_RECORD_TYPES,
  DEFAULT_STRUCTURED_COLUMNS,
  type RecordTypeSpec,
} from '../domain/record-types.js';
import {
  VersionCompatibilityChecker,
  type CheckedManifest,
  type CompatibilityOutcome,
  type CompatibilityTable,
  type VersionCheckPolicy,
} from '../domain/version-compatibility.js';
import type { ArtifactLockPort } from '../ports/artifact-lock.port.js';
import type { CacheLayoutPort } from '../ports/cache-layout.port.js';
import type { DigestPort } from '../ports/digest.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ObjectStorePort } from '../ports/object-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import {
  LocalArtifactCache,
  type ArtifactCacheOptions,
  type ArtifactCacheStats,
  type CacheEntry,
  type GetArtifactOptions,
} from './local-artifact-cache.js';
import { ManifestCatalog } from './manifest-catalog.js';
import { MetadataTableStore } from './metadata-table-store.js';
import { RecordResolver, type ArtifactLoader } from './record-resolver.js';

export interface ProjectCacheDeps {
  readonly store: ObjectStorePort;
  readonly fs: FileSystemPort;
  readonly layout: CacheLayoutPort;
  readonly digest: DigestPort;
  readonly lock: ArtifactLockPort;
  readonly clock: TimeClockPort;
  readonly loggerFactory: ILoggerFactory;
}

export type VersionSelection =
  | { readonly kind: 'latest' }
  /** Version opened last time; latest when none was recorded. */
  | { readonly kind: 'last_used' }
  /** Newest manifest already on disk; latest when none is. */
  | { readonly kind: 'latest_downloaded' }
  | { readonly kind: 'pinned'; readonly version: string };

export interface ProjectCacheOptions {
  readonly project: string;
  readonly version?: VersionSelection;
  readonly versionCheck?: VersionCheckPolicy;
  readonly compatibility?: CompatibilityTable;
  readonly consumer?: string;
  readonly clientVersion?: string;
  readonly recordTypes?: readonly RecordTypeSpec[];
  readonly structuredColumns?: readonly string[];
  readonly artifacts: ArtifactCacheOptions;
}

/**
 * One project release opened for reading: the manifest is selected and
 * checked once, then tables and artifacts are served from it.
 */
export class ProjectCache {
  private constructor(
    private readonly checked: CheckedManifest,
    private readonly catalog: ManifestCatalog,
    private readonly tableStore: MetadataTableStore,
    private readonly artifacts: LocalArtifactCache,
    private readonly resolver: RecordResolver,
    private readonly recordTypeNames: readonly string[]
  ) {}

  static open(deps: ProjectCacheDeps, options: ProjectCacheOptions): ResultAsync<ProjectCache, CacheError> {
    const { project } = options;
    const logger = deps.loggerFactory.create('ProjectCache');
    const retry = options.artifacts.retry;
    const catalog = new ManifestCatalog(
      { store: deps.store, fs: deps.fs, layout: deps.layout, clock: deps.clock, logger: deps.loggerFactory.create('ManifestCatalog') },
      retry
    );
    const checker = new VersionCompatibilityChecker({
      ...(options.compatibility !== undefined ? { table: options.compatibility } : {}),
      ...(options.consumer !== undefined ? { consumer: options.consumer } : {}),
      ...(options.clientVersion !== undefined ? { clientVersion: options.clientVersion } : {}),
      logger: deps.loggerFactory.create('VersionCompatibility'),
    });
    const recordTypes = options.recordTypes ?? DEFAULT_RECORD_TYPES;
    const selection: VersionSelection = options.version ?? { kind: 'latest' };

    const registry = buildRecordTypeRegistry(recordTypes);
    if (registry.isErr()) return errAsync(registry.error);

    return selectVersion(catalog, project, selection)
      .andThen((version) => catalog.load(project, version))
      .andThen((manifest) => checker.check(manifest, options.versionCheck))
      .andThen((checked) => requireTables(checked.manifest, recordTypes).map(() => checked))
      .andThen((checked) => catalog.markUsed(project, checked.manifest.version).map(() => checked))
      .andThen((checked) => warnIfOutdated(catalog, checked.manifest, selection, logger).map(() => checked))
      .map((checked) => {
        const tableStore = new MetadataTableStore(
          {
            store: deps.store,
            fs: deps.fs,
            layout: deps.layout,
            digest: deps.digest,
            clock: deps.clock,
            logger: deps.loggerFactory.create('MetadataTableStore'),
          },
          {
            structuredColumns: options.structuredColumns ?? DEFAULT_STRUCTURED_COLUMNS,
            normalizers: tableNormalizers(recordTypes),
            retry,
          }
        );
        const artifacts = new LocalArtifactCache(
          checked,
          {
            store: deps.store,
            fs: deps.fs,
            layout: deps.layout,
            digest: deps.digest,
            lock: deps.lock,
            clock: deps.clock,
            logger: deps.loggerFactory.create('LocalArtifactCache'),
          },
          options.artifacts
        );
        const resolver = new RecordResolver(
          checked,
          registry.value,
          tableStore,
          artifacts,
          deps.loggerFactory.create('RecordResolver')
        );

        logger.info({ project, version: checked.manifest.version, compatibility: checked.compatibility.kind }, 'project cache opened');
        return new ProjectCache(checked, catalog, tableStore, artifacts, resolver, recordTypes.map((r) => r.name));
      });
  }

  get project(): string {
    return this.checked.manifest.project;
  }

  get version(): ManifestVersion {
    return this.checked.manifest.version;
  }

  get manifest(): Manifest {
    return this.checked.manifest;
  }

  get compatibility(): CompatibilityOutcome {
    return this.checked.compatibility;
  }

  get recordTypes(): readonly string[] {
    return this.recordTypeNames;
  }

  /** Metadata tables listed by the manifest. */
  tableNames(): readonly string[] {
    return metadataTableNames(this.checked.manifest);
  }

  listVersions(): ResultAsync<readonly ManifestVersion[], CacheError> {
    return this.catalog.listVersions(this.project);
  }

  /** Normalised table of a record type. */
  getTable(recordType: string): ResultAsync<MetadataTable, CacheError> {
    return this.resolver.table(recordType);
  }

  /** Any table the manifest lists, by its manifest name. */
  loadTable(table: string): ResultAsync<MetadataTable, CacheError> {
    return this.tableStore.load(this.checked, table);
  }

  resolve(recordType: string, recordId: RecordId): ResultAsync<FileId, CacheError> {
    return this.resolver.resolve(recordType, recordId);
  }

  getArtifactPath(recordType: string, recordId: RecordId, options?: GetArtifactOptions): ResultAsync<string, CacheError> {
    return this.resolver.getArtifactPath(recordType, recordId, options);
  }

  loadArtifact<T>(
    recordType: string,
    recordId: RecordId,
    loader: ArtifactLoader<T>,
    options?: GetArtifactOptions
  ): ResultAsync<T, CacheError> {
    return this.resolver.loadArtifact(recordType, recordId, loader, options);
  }

  /** Artifact by file id, bypassing record lookup. */
  getFile(fileId: string, options?: GetArtifactOptions): ResultAsync<string, CacheError> {
    return this.artifacts.get(fileId, options);
  }

  cacheEntry(fileId: string): ResultAsync<CacheEntry | null, CacheError> {
    return this.artifacts.entry(fileId);
  }

  invalidate(fileId: string): ResultAsync<boolean, CacheError> {
    return this.artifacts.invalidate(fileId);
  }

  cacheStats(): ArtifactCacheStats {
    return this.artifacts.stats();
  }

  /** Changes from the open version to `version`. */
  compareWith(version: string): ResultAsync<ManifestDiff, CacheError> {
    return this.catalog.load(this.project, version).map((other) => compareManifests(this.checked.manifest, other));
  }
}

function selectVersion(
  catalog: ManifestCatalog,
  project: string,
  selection: VersionSelection
): ResultAsync<string, CacheError> {
  switch (selection.kind) {
    case 'pinned':
      return okAsync(selection.version);
    case 'latest':
      return catalog.latestVersion(project);
    case 'last_used':
      return catalog
        .lastUsedVersion(project)
        .andThen((v): ResultAsync<string, CacheError> => (v !== null ? okAsync(v) : catalog.latestVersion(project)));
    case 'latest_downloaded':
      return catalog
        .latestDownloadedVersion(project)
        .andThen((v): ResultAsync<string, CacheError> => (v !== null ? okAsync(v) : catalog.latestVersion(project)));
  }
}

function requireTables(manifest: Manifest, recordTypes: readonly RecordTypeSpec[]): ResultAsync<void, CacheError> {
  const missing = recordTypes.find((r) => !manifest.metadataFiles.has(r.table));
  return missing === undefined
    ? okAsync(undefined)
    : errAsync(Err.notFound('table', manifest.project, missing.table, manifest.version));
}

/**
 * A newer release is only worth a warning: listing failures (offline use)
 * are logged and ignored here.
 */
function warnIfOutdated(
  catalog: ManifestCatalog,
  manifest: Manifest,
  selection: VersionSelection,
  logger: Logger
): ResultAsync<void, CacheError> {
  if (selection.kind === 'latest') return okAsync(undefined);

  return catalog
    .listVersions(manifest.project)
    .map((versions) => {
      const newest = versions[versions.length - 1];
      if (newest !== undefined && semver.gt(newest, manifest.version)) {
        logger.warn(
          { project: manifest.project, version: manifest.version, latest: newest },
          'a newer manifest is available; open it with version "latest" to use it'
        );
      }
    })
    .orElse((e) => {
      logger.debug({ project: manifest.project, reason: e.message }, 'could not check for newer manifests');
      return okAsync(undefined);
    });
}
