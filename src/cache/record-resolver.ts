import { ResultAsync, okAsync, errAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheError } from '../core/errors/cache-error.js';
import type { Logger } from '../core/logging/types.js';
import type { FileId, RecordId } from '../domain/ids.js';
import type { MetadataRow, MetadataTable } from '../domain/metadata-table.js';
import {
  decodeArtifactLink,
  type ArtifactLink,
  type RecordTypeRegistry,
  type RecordRef,
  type RecordTypeSpec,
} from '../domain/record-types.js';
import type { CheckedManifest } from '../domain/version-compatibility.js';
import type { GetArtifactOptions, LocalArtifactCache } from './local-artifact-cache.js';
import type { MetadataTableStore } from './metadata-table-store.js';

/**
 * Opens a verified local file as a domain object (an NWB reader, a
 * dataframe loader). Rejections become `ArtifactLoadFailed`.
 */
export interface ArtifactLoader<T> {
  open(filePath: string): Promise<T>;
}

interface IndexedRow {
  readonly row: MetadataRow;
  readonly link: ArtifactLink;
}

type RecordIndex = ReadonlyMap<RecordId, readonly IndexedRow[]>;

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Answers "which file holds record X" for the record types of one checked
 * manifest, and hands the file id to the artifact cache.
 *
 * Rows referencing several target records resolve through the first one
 * listed; the others share its file.
 */
export class RecordResolver {
  private readonly indexes = new Map<string, ResultAsync<RecordIndex, CacheError>>();

  constructor(
    private readonly checked: CheckedManifest,
    private readonly registry: RecordTypeRegistry,
    private readonly tables: MetadataTableStore,
    private readonly artifacts: LocalArtifactCache,
    private readonly logger: Logger
  ) {}

  /** Normalised table backing a record type. */
  table(recordType: string): ResultAsync<MetadataTable, CacheError> {
    return this.spec(recordType).andThen((spec) => this.tables.load(this.checked, spec.table));
  }

  resolve(recordType: string, recordId: RecordId): ResultAsync<FileId, CacheError> {
    return this.lookup(recordType, recordId).andThen(({ spec, hit }): ResultAsync<FileId, CacheError> => {
      const { link } = hit;
      switch (link.kind) {
        case 'direct':
          return okAsync(link.fileId);
        case 'none':
          return errAsync(Err.artifactMissing(spec.name, spec.table, recordId));
        case 'indirect':
          return this.follow(spec, recordId, link.refs);
      }
    });
  }

  getArtifactPath(recordType: string, recordId: RecordId, options?: GetArtifactOptions): ResultAsync<string, CacheError> {
    return this.resolve(recordType, recordId).andThen((fileId) => this.artifacts.get(fileId, options));
  }

  loadArtifact<T>(
    recordType: string,
    recordId: RecordId,
    loader: ArtifactLoader<T>,
    options?: GetArtifactOptions
  ): ResultAsync<T, CacheError> {
    return this.getArtifactPath(recordType, recordId, options).andThen((filePath) =>
      ResultAsync.fromPromise(loader.open(filePath), (e) => Err.artifactLoadFailed(filePath, errorMessage(e)))
    );
  }

  // ---------------------------------------------------------------------------

  private spec(recordType: string): ResultAsync<RecordTypeSpec, CacheError> {
    const spec = this.registry.get(recordType);
    const { manifest } = this.checked;
    return spec !== undefined
      ? okAsync<RecordTypeSpec, CacheError>(spec)
      : errAsync<RecordTypeSpec, CacheError>(Err.notFound('record_type', manifest.project, recordType, manifest.version));
  }

  private lookup(
    recordType: string,
    recordId: RecordId
  ): ResultAsync<{ spec: RecordTypeSpec; hit: IndexedRow }, CacheError> {
    return this.spec(recordType).andThen((spec) =>
      this.index(spec).andThen((index): ResultAsync<{ spec: RecordTypeSpec; hit: IndexedRow }, CacheError> => {
        const matches = index.get(recordId) ?? [];
        const [first] = matches;
        if (first === undefined) return errAsync(Err.recordNotFound(spec.name, spec.table, recordId));
        if (matches.length > 1) {
          return errAsync(Err.ambiguousRecord(spec.name, spec.table, recordId, matches.length));
        }
        return okAsync({ spec, hit: first });
      })
    );
  }

  private follow(spec: RecordTypeSpec, recordId: RecordId, refs: readonly RecordRef[]): ResultAsync<FileId, CacheError> {
    const [first] = refs;
    if (first === undefined) return errAsync(Err.artifactMissing(spec.name, spec.table, recordId));
    if (refs.length > 1) {
      this.logger.debug({ recordType: spec.name, recordId, via: first.recordId, refs: refs.length }, 'resolving through first referenced record');
    }

    return this.lookup(first.recordType, first.recordId).andThen(({ spec: target, hit }): ResultAsync<FileId, CacheError> => {
      switch (hit.link.kind) {
        case 'direct':
          return okAsync(hit.link.fileId);
        case 'none':
          return errAsync(Err.artifactMissing(target.name, target.table, first.recordId));
        case 'indirect':
          return errAsync(Err.indirectionUnsupported(
            spec.name,
            `${target.name} ${first.recordId} is itself resolved through another record type`
          ));
      }
    });
  }

  /** Rows by primary id, with their link decided once. Built on first use. */
  private index(spec: RecordTypeSpec): ResultAsync<RecordIndex, CacheError> {
    const existing = this.indexes.get(spec.name);
    if (existing !== undefined) return existing;

    const fileIdColumn = spec.fileIdColumn ?? this.checked.manifest.fileIdColumn;
    const pending = this.tables
      .load(this.checked, spec.table)
      .andThen((table) => buildIndex(table, spec, fileIdColumn))
      .mapErr((e) => {
        this.indexes.delete(spec.name);
        return e;
      });
    this.indexes.set(spec.name, pending);
    return pending;
  }
}

function buildIndex(
  table: MetadataTable,
  spec: RecordTypeSpec,
  fileIdColumn: string
): ResultAsync<RecordIndex, CacheError> {
  if (!table.columns.includes(spec.idColumn)) {
    return errAsync(Err.configInvalid([{
      path: `recordTypes.${spec.name}.idColumn`,
      message: `column "${spec.idColumn}" is not in ${table.name}`,
    }]));
  }

  const index = new Map<RecordId, IndexedRow[]>();
  for (const [rowIndex, row] of table.rows.entries()) {
    const id = row[spec.idColumn];
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      return errAsync(Err.decodeFailed({
        project: table.project,
        version: table.version,
        table: table.name,
        column: spec.idColumn,
        row: rowIndex,
        cell: String(id),
        details: 'primary id is not an integer',
      }));
    }
    const bucket = index.get(id) ?? [];
    bucket.push({ row, link: decodeArtifactLink(row, spec, fileIdColumn) });
    index.set(id, bucket);
  }
  return okAsync(index);
}
