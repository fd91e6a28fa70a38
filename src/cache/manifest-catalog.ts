import semver from 'semver';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheError } from '../core/errors/cache-error.js';
import type { Logger } from '../core/logging/types.js';
import { asManifestVersion, type ManifestVersion } from '../domain/ids.js';
import { parseManifest, type Manifest } from '../domain/manifest.js';
import { compareManifests, type ManifestDiff } from '../domain/manifest-diff.js';
import type { CacheLayoutPort } from '../ports/cache-layout.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ObjectStorePort } from '../ports/object-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { manifestKey } from '../infra/object-store-keys.js';
import { toCacheIo, writeFileAtomic } from './io.js';
import { withRetry, type RetryPolicy } from './retry.js';

export interface ManifestCatalogDeps {
  readonly store: ObjectStorePort;
  readonly fs: FileSystemPort;
  readonly layout: CacheLayoutPort;
  readonly clock: TimeClockPort;
  readonly logger: Logger;
}

/**
 * Keep semantic versions only, ascending. Names that are not versions are
 * dropped with a debug line.
 */
export function sortVersions(raw: readonly string[], logger?: Logger): ManifestVersion[] {
  const valid: string[] = [];
  for (const candidate of raw) {
    if (semver.valid(candidate) === null) {
      logger?.debug({ candidate }, 'ignoring manifest with a non-semver name');
      continue;
    }
    valid.push(candidate);
  }
  return [...new Set(valid)].sort(semver.compare).map(asManifestVersion);
}

const encoder = new TextEncoder();

/**
 * Version discovery and manifest loading for one cache root.
 *
 * A manifest is fetched once per version and kept on disk; later loads of
 * the same version never touch the store.
 */
export class ManifestCatalog {
  constructor(
    private readonly deps: ManifestCatalogDeps,
    private readonly retry: RetryPolicy
  ) {}

  /** Every version published for the project, ascending. */
  listVersions(project: string): ResultAsync<readonly ManifestVersion[], CacheError> {
    const { store, clock, logger } = this.deps;
    return withRetry(() => store.listVersions(project), this.retry, clock, logger)
      .mapErr(({ error, attempts }) =>
        Err.downloadFailed(project, `${project}/manifests/`, attempts, error.message, error.code === 'OBJECT_STORE_IO_ERROR')
      )
      .map((raw) => sortVersions(raw, logger));
  }

  latestVersion(project: string): ResultAsync<ManifestVersion, CacheError> {
    return this.listVersions(project).andThen((versions) => {
      const latest = versions[versions.length - 1];
      return latest === undefined ? errAsync(Err.notFound('project', project, project)) : okAsync(latest);
    });
  }

  /** Versions with a manifest already on disk, ascending. */
  downloadedVersions(project: string): ResultAsync<readonly ManifestVersion[], CacheError> {
    const dir = this.deps.layout.manifestsDir(project);
    return this.deps.fs
      .readdir(dir)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync<readonly string[]>([]) : errAsync(e)))
      .mapErr(toCacheIo('readdir', dir))
      .map((names) =>
        sortVersions(
          names.filter((n) => n.endsWith('.json')).map((n) => n.slice(0, -'.json'.length)),
          this.deps.logger
        )
      );
  }

  latestDownloadedVersion(project: string): ResultAsync<ManifestVersion | null, CacheError> {
    return this.downloadedVersions(project).map((versions) => versions[versions.length - 1] ?? null);
  }

  /**
   * Local copy first; otherwise fetch, validate, then persist atomically.
   * A local copy that no longer parses is replaced from the store.
   */
  load(project: string, version: string): ResultAsync<Manifest, CacheError> {
    if (semver.valid(version) === null) {
      return errAsync(Err.notFound('version', project, version));
    }

    const localPath = this.deps.layout.manifestPath(project, version);
    return this.deps.fs
      .readFileUtf8(localPath)
      .map((text): string | null => text)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(e)))
      .mapErr(toCacheIo('read', localPath))
      .andThen((text): ResultAsync<Manifest, CacheError> => {
        if (text === null) return this.fetchAndPersist(project, version);

        const parsed = parseManifest(text, { project, version });
        if (parsed.isOk()) return okAsync(parsed.value);

        this.deps.logger.warn({ project, version, issues: parsed.error.issues }, 'local manifest unreadable, fetching again');
        return this.fetchAndPersist(project, version);
      });
  }

  private fetchAndPersist(project: string, version: string): ResultAsync<Manifest, CacheError> {
    const { store, clock, logger, fs, layout } = this.deps;
    const key = manifestKey(project, version);

    return withRetry(() => store.fetchManifest(project, version), this.retry, clock, logger)
      .mapErr(({ error, attempts }): CacheError =>
        error.code === 'OBJECT_NOT_FOUND'
          ? Err.notFound('version', project, version)
          : Err.downloadFailed(project, key, attempts, error.message, error.code === 'OBJECT_STORE_IO_ERROR')
      )
      .andThen((bytes) => {
        const text = new TextDecoder().decode(bytes);
        return parseManifest(text, { project, version }).asyncAndThen((manifest) =>
          writeFileAtomic(fs, layout.manifestPath(project, version), encoder.encode(text)).map(() => {
            logger.info({ project, version }, 'manifest downloaded');
            return manifest;
          })
        );
      });
  }

  lastUsedVersion(project: string): ResultAsync<ManifestVersion | null, CacheError> {
    const file = this.deps.layout.lastUsedManifestPath(project);
    return this.deps.fs
      .readFileUtf8(file)
      .map((text): ManifestVersion | null => {
        const version = text.trim();
        return semver.valid(version) !== null ? asManifestVersion(version) : null;
      })
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(e)))
      .mapErr(toCacheIo('read', file));
  }

  markUsed(project: string, version: ManifestVersion): ResultAsync<void, CacheError> {
    return writeFileAtomic(this.deps.fs, this.deps.layout.lastUsedManifestPath(project), encoder.encode(version));
  }

  /** Differences between two versions of the same project. */
  compare(project: string, from: string, to: string): ResultAsync<ManifestDiff, CacheError> {
    return this.load(project, from).andThen((before) =>
      this.load(project, to).map((after) => compareManifests(before, after))
    );
  }
}
