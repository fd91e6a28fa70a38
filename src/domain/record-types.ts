import { ok, err, type Result } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError, IndirectionUnsupportedError } from '../core/errors/cache-error.js';
import { fileIdFromCell, type FileId, type RecordId } from './ids.js';
import type { MetadataRow } from './metadata-table.js';
import { addSessionNumber, composeNormalizers, suppressColumns, type TableNormalizer } from './table-normalizers.js';

/**
 * A record type whose rows do not carry a file id themselves point at rows
 * of another record type through a list-valued column.
 */
export interface IndirectionSpec {
  readonly referenceColumn: string;
  readonly targetRecordType: string;
}

export interface RecordTypeSpec {
  readonly name: string;
  readonly table: string;
  readonly idColumn: string;
  /** Defaults to the manifest's `metadata_file_id_column_name`. */
  readonly fileIdColumn?: string;
  readonly indirection?: IndirectionSpec;
  readonly normalize?: TableNormalizer;
  /** Columns dropped after normalisation. */
  readonly suppress?: readonly string[];
}

export interface RecordRef {
  readonly recordType: string;
  readonly recordId: RecordId;
}

/**
 * Decided once per row when a table is indexed, never re-inspected.
 */
export type ArtifactLink =
  | { readonly kind: 'direct'; readonly fileId: FileId }
  | { readonly kind: 'indirect'; readonly refs: readonly RecordRef[] }
  | { readonly kind: 'none' };

function referencedIds(cell: MetadataRow[string] | undefined): RecordId[] {
  if (typeof cell === 'number') return Number.isInteger(cell) ? [cell] : [];
  if (Array.isArray(cell)) {
    return cell.filter((v): v is number => typeof v === 'number' && Number.isInteger(v));
  }
  return [];
}

export function decodeArtifactLink(row: MetadataRow, spec: RecordTypeSpec, fileIdColumn: string): ArtifactLink {
  const fileId = fileIdFromCell(row[fileIdColumn]);
  if (fileId !== null) return { kind: 'direct', fileId };

  if (spec.indirection) {
    const target = spec.indirection.targetRecordType;
    const refs = referencedIds(row[spec.indirection.referenceColumn]).map((recordId) => ({
      recordType: target,
      recordId,
    }));
    if (refs.length > 0) return { kind: 'indirect', refs };
  }

  return { kind: 'none' };
}

export type RecordTypeRegistry = ReadonlyMap<string, RecordTypeSpec>;

/**
 * Index record types by name and reject configurations the resolver cannot
 * follow: unknown indirection targets and targets that are indirect themselves.
 */
export function buildRecordTypeRegistry(
  specs: readonly RecordTypeSpec[]
): Result<RecordTypeRegistry, ConfigInvalidError | IndirectionUnsupportedError> {
  const registry = new Map<string, RecordTypeSpec>();
  for (const spec of specs) {
    if (registry.has(spec.name)) {
      return err(Err.configInvalid([{ path: `recordTypes.${spec.name}`, message: 'declared more than once' }]));
    }
    registry.set(spec.name, spec);
  }

  for (const spec of specs) {
    if (!spec.indirection) continue;
    const target = registry.get(spec.indirection.targetRecordType);
    if (!target) {
      return err(Err.configInvalid([{
        path: `recordTypes.${spec.name}.indirection.targetRecordType`,
        message: `unknown record type "${spec.indirection.targetRecordType}"`,
      }]));
    }
    if (target.indirection) {
      return err(Err.indirectionUnsupported(
        spec.name,
        `target "${target.name}" is itself resolved through "${target.indirection.targetRecordType}"`
      ));
    }
  }

  return ok(registry);
}

/**
 * Normaliser per table: each record type's own step, then its suppressed
 * columns. Record types sharing a table run in declaration order.
 */
export function tableNormalizers(specs: readonly RecordTypeSpec[]): ReadonlyMap<string, TableNormalizer> {
  const byTable = new Map<string, TableNormalizer[]>();
  for (const spec of specs) {
    const steps = byTable.get(spec.table) ?? [];
    if (spec.normalize) steps.push(spec.normalize);
    if (spec.suppress && spec.suppress.length > 0) steps.push(suppressColumns(spec.suppress));
    byTable.set(spec.table, steps);
  }
  return new Map([...byTable].map(([table, steps]) => [table, composeNormalizers(...steps)]));
}

/**
 * Record types of the visual behavior ophys releases.
 *
 * Sessions with imaging map to several experiment files; their behavior data
 * is shared, so they resolve through the first listed experiment.
 */
export const DEFAULT_RECORD_TYPES: readonly RecordTypeSpec[] = [
  {
    name: 'ophys_experiment',
    table: 'ophys_experiment_table',
    idColumn: 'ophys_experiment_id',
    normalize: addSessionNumber,
  },
  {
    name: 'behavior_session',
    table: 'behavior_session_table',
    idColumn: 'behavior_session_id',
    indirection: { referenceColumn: 'ophys_experiment_id', targetRecordType: 'ophys_experiment' },
    normalize: addSessionNumber,
  },
  {
    name: 'ophys_session',
    table: 'ophys_session_table',
    idColumn: 'ophys_session_id',
    indirection: { referenceColumn: 'ophys_experiment_id', targetRecordType: 'ophys_experiment' },
    normalize: addSessionNumber,
  },
];

/** Structured columns of the default tables. */
export const DEFAULT_STRUCTURED_COLUMNS: readonly string[] = [
  'ophys_experiment_id',
  'ophys_container_id',
  'driver_line',
];
