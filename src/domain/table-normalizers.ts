import type { CellValue, MetadataRow, MetadataTable } from './metadata-table.js';

/**
 * Per-record-type post-processing step, run after the base structured-column
 * decode. Pure: returns a new table, never mutates its input.
 */
export type TableNormalizer = (table: MetadataTable) => MetadataTable;

export const identityNormalizer: TableNormalizer = (table) => table;

export function composeNormalizers(...steps: readonly TableNormalizer[]): TableNormalizer {
  return (table) => steps.reduce((acc, step) => step(acc), table);
}

/**
 * Add (or overwrite) a column computed from each row.
 */
export function deriveColumn(column: string, derive: (row: MetadataRow) => CellValue): TableNormalizer {
  return (table) => ({
    ...table,
    columns: table.columns.includes(column) ? table.columns : [...table.columns, column],
    rows: table.rows.map((row) => ({ ...row, [column]: derive(row) })),
  });
}

const SESSION_NUMBER = /^OPHYS_(\d+)/;

export function parseSessionNumber(sessionType: CellValue | undefined): number | null {
  if (typeof sessionType !== 'string') return null;
  const match = SESSION_NUMBER.exec(sessionType);
  return match?.[1] !== undefined ? Number(match[1]) : null;
}

/**
 * `session_type` `OPHYS_3_images_A` -> `session_number` 3.
 * Tables without a `session_type` column pass through unchanged.
 */
export const addSessionNumber: TableNormalizer = (table) =>
  table.columns.includes('session_type')
    ? deriveColumn('session_number', (row) => parseSessionNumber(row['session_type']))(table)
    : table;

export function suppressColumns(columns: readonly string[]): TableNormalizer {
  const drop = new Set(columns);
  if (drop.size === 0) return identityNormalizer;

  return (table) => ({
    ...table,
    columns: table.columns.filter((c) => !drop.has(c)),
    rows: table.rows.map((row) =>
      Object.fromEntries(Object.entries(row).filter(([key]) => !drop.has(key)))
    ),
  });
}
