import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheError } from '../core/errors/cache-error.js';
import type { Logger } from '../core/logging/types.js';
import type { Manifest, ManifestFileEntry } from '../domain/manifest.js';
import {
  decodeStructuredColumns,
  freezeTable,
  parseCsvTable,
  type MetadataTable,
} from '../domain/metadata-table.js';
import type { TableNormalizer } from '../domain/table-normalizers.js';
import type { CheckedManifest } from '../domain/version-compatibility.js';
import type { CacheLayoutPort } from '../ports/cache-layout.port.js';
import type { DigestPort } from '../ports/digest.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ObjectStorePort } from '../ports/object-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { toCacheIo, writeFileAtomic } from './io.js';
import { withRetry, type RetryPolicy } from './retry.js';

export interface MetadataTableStoreDeps {
  readonly store: ObjectStorePort;
  readonly fs: FileSystemPort;
  readonly layout: CacheLayoutPort;
  readonly digest: DigestPort;
  readonly clock: TimeClockPort;
  readonly logger: Logger;
}

export interface MetadataTableStoreOptions {
  /** Columns whose cells hold literal text (lists, tuples, dicts). */
  readonly structuredColumns: readonly string[];
  /** Post-processing per table name. */
  readonly normalizers: ReadonlyMap<string, TableNormalizer>;
  readonly retry: RetryPolicy;
}

/**
 * Loads metadata tables of a checked manifest: local CSV or fetch, then
 * parse, decode structured columns, normalise and freeze.
 *
 * Each table is built at most once per store; concurrent callers share the
 * in-flight load. A failed load is forgotten so the next call retries.
 */
export class MetadataTableStore {
  private readonly memo = new Map<string, ResultAsync<MetadataTable, CacheError>>();

  constructor(
    private readonly deps: MetadataTableStoreDeps,
    private readonly options: MetadataTableStoreOptions
  ) {}

  load(checked: CheckedManifest, table: string): ResultAsync<MetadataTable, CacheError> {
    const { manifest } = checked;
    const memoKey = `${manifest.project}@${manifest.version}/${table}`;

    const existing = this.memo.get(memoKey);
    if (existing !== undefined) return existing;

    const pending = this.build(manifest, table).mapErr((e) => {
      this.memo.delete(memoKey);
      return e;
    });
    this.memo.set(memoKey, pending);
    return pending;
  }

  /** Load several tables; the first failure wins. */
  loadMany(checked: CheckedManifest, tables: readonly string[]): ResultAsync<ReadonlyMap<string, MetadataTable>, CacheError> {
    return tables.reduce<ResultAsync<Map<string, MetadataTable>, CacheError>>(
      (acc, table) => acc.andThen((loaded) => this.load(checked, table).map((t) => loaded.set(table, t))),
      okAsync(new Map())
    );
  }

  private build(manifest: Manifest, table: string): ResultAsync<MetadataTable, CacheError> {
    const entry = manifest.metadataFiles.get(table);
    if (entry === undefined) {
      return errAsync(Err.notFound('table', manifest.project, table, manifest.version));
    }

    const ctx = { project: manifest.project, version: manifest.version, table };
    const normalize = this.options.normalizers.get(table);

    return this.readBytes(manifest, table, entry)
      .andThen((bytes) => parseCsvTable(bytes, ctx))
      .andThen((parsed) => decodeStructuredColumns(parsed, this.options.structuredColumns))
      .map((decoded) => {
        const frozen = freezeTable(normalize ? normalize(decoded) : decoded);
        this.deps.logger.debug({ ...ctx, rows: frozen.rows.length }, 'metadata table loaded');
        return frozen;
      });
  }

  private readBytes(manifest: Manifest, table: string, entry: ManifestFileEntry): ResultAsync<Uint8Array, CacheError> {
    const { fs, layout, digest, logger } = this.deps;
    const localPath = layout.metadataPath(manifest.project, manifest.version, table);

    return fs
      .readFileBytes(localPath)
      .map((bytes): Uint8Array | null => bytes)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(e)))
      .mapErr(toCacheIo('read', localPath))
      .andThen((bytes): ResultAsync<Uint8Array, CacheError> => {
        if (bytes === null) return this.fetchAndPersist(manifest, table, entry, localPath);
        if (entry.sha256 === undefined || digest.sha256(bytes) === entry.sha256) return okAsync(bytes);

        logger.warn({ project: manifest.project, version: manifest.version, table, path: localPath }, 'local metadata table does not match manifest digest, fetching again');
        return this.fetchAndPersist(manifest, table, entry, localPath);
      });
  }

  private fetchAndPersist(
    manifest: Manifest,
    table: string,
    entry: ManifestFileEntry,
    localPath: string
  ): ResultAsync<Uint8Array, CacheError> {
    const { store, fs, digest, clock, logger } = this.deps;

    return withRetry(() => store.fetchMetadataTable(manifest, table), this.options.retry, clock, logger)
      .mapErr(({ error, attempts }): CacheError =>
        error.code === 'OBJECT_NOT_FOUND'
          ? Err.notFound('table', manifest.project, table, manifest.version)
          : Err.downloadFailed(manifest.project, entry.key, attempts, error.message, error.code === 'OBJECT_STORE_IO_ERROR')
      )
      .andThen((bytes): ResultAsync<Uint8Array, CacheError> => {
        if (entry.sha256 !== undefined) {
          const actual = digest.sha256(bytes);
          if (actual !== entry.sha256) {
            return errAsync(Err.corruptCache(table, entry.key, `fetched sha256 ${actual} does not match manifest ${entry.sha256}`));
          }
        }
        return writeFileAtomic(fs, localPath, bytes).map(() => {
          logger.info({ project: manifest.project, version: manifest.version, table }, 'metadata table downloaded');
          return bytes;
        });
      });
  }
}
