import { parse } from 'csv-parse/sync';
import { ok, err, type Result } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { DecodeFailedError } from '../core/errors/cache-error.js';
import { decodeLiteral, type LiteralValue } from './literal-decoder.js';

export type CellValue = LiteralValue;
export type MetadataRow = Readonly<Record<string, CellValue>>;

/**
 * One record type's rows for the active manifest. Immutable once loaded.
 */
export interface MetadataTable {
  readonly name: string;
  readonly project: string;
  readonly version: string;
  readonly columns: readonly string[];
  readonly rows: readonly MetadataRow[];
}

export interface TableContext {
  readonly project: string;
  readonly version: string;
  readonly table: string;
}

const NULL_TOKENS: ReadonlySet<string> = new Set(['', 'NaN', 'nan', 'NULL', 'null', 'None']);
const NUMERIC = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Plain CSV scalar: null, number, boolean or string.
 */
export function decodeScalar(text: string): CellValue {
  if (NULL_TOKENS.has(text)) return null;
  if (NUMERIC.test(text)) return Number(text);
  if (text === 'True') return true;
  if (text === 'False') return false;
  return text;
}

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value)
    && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));
}

/**
 * Parse header + rows. Cells become scalars; structured columns are decoded
 * later by `decodeStructuredColumns`.
 */
export function parseCsvTable(bytes: Uint8Array, ctx: TableContext): Result<MetadataTable, DecodeFailedError> {
  let records: unknown;
  try {
    records = parse(Buffer.from(bytes), { bom: true, skip_empty_lines: true });
  } catch (e) {
    return err(Err.decodeFailed({ ...ctx, details: `invalid CSV: ${e instanceof Error ? e.message : String(e)}` }));
  }

  if (!isStringMatrix(records)) {
    return err(Err.decodeFailed({ ...ctx, details: 'CSV parser returned unexpected records' }));
  }

  const [header, ...body] = records;
  if (header === undefined) {
    return err(Err.decodeFailed({ ...ctx, details: 'missing header row' }));
  }

  const seen = new Set<string>();
  for (const column of header) {
    if (seen.has(column)) {
      return err(Err.decodeFailed({ ...ctx, column, details: `duplicate column "${column}"` }));
    }
    seen.add(column);
  }

  const rows = body.map((cells) => {
    const row: Record<string, CellValue> = {};
    header.forEach((column, i) => {
      row[column] = decodeScalar(cells[i] ?? '');
    });
    return row;
  });

  return ok({ name: ctx.table, project: ctx.project, version: ctx.version, columns: header, rows });
}

/**
 * Base normalisation: decode every non-null cell of the listed columns from
 * its literal text. One bad cell fails the whole table.
 */
export function decodeStructuredColumns(
  table: MetadataTable,
  structuredColumns: readonly string[]
): Result<MetadataTable, DecodeFailedError> {
  const present = structuredColumns.filter((c) => table.columns.includes(c));
  if (present.length === 0) return ok(table);

  const rows: MetadataRow[] = [];
  for (const [index, row] of table.rows.entries()) {
    const next: Record<string, CellValue> = { ...row };
    for (const column of present) {
      const cell = row[column];
      if (typeof cell !== 'string') continue;

      const decoded = decodeLiteral(cell);
      if (decoded.isErr()) {
        return err(Err.decodeFailed({
          project: table.project,
          version: table.version,
          table: table.name,
          column,
          row: index,
          cell,
          details: decoded.error.message,
        }));
      }
      next[column] = decoded.value;
    }
    rows.push(next);
  }

  return ok({ ...table, rows });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function freezeTable(table: MetadataTable): MetadataTable {
  return deepFreeze({ ...table, columns: [...table.columns], rows: [...table.rows] });
}
