import type { Brand } from '../runtime/brand.js';

export type FileId = Brand<string, 'FileId'>;
export type ManifestVersion = Brand<string, 'ManifestVersion'>;
/** Lowercase hex sha256 of the artifact bytes (no prefix). */
export type Sha256Hex = Brand<string, 'Sha256Hex'>;

/** Primary record identifier; integers only. */
export type RecordId = number;

const FILE_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const SHA256_HEX_PATTERN = /^[0-9a-f]{64}$/;

export function isValidFileId(value: string): boolean {
  return FILE_ID_PATTERN.test(value) && value !== '.' && value !== '..';
}

export function asFileId(value: string): FileId {
  return value as FileId;
}

export function asManifestVersion(value: string): ManifestVersion {
  return value as ManifestVersion;
}

export function asSha256Hex(value: string): Sha256Hex {
  return value as Sha256Hex;
}

export function isSha256Hex(value: string): boolean {
  return SHA256_HEX_PATTERN.test(value);
}

/**
 * Normalise a table cell into a file id.
 *
 * Integer-valued floats (`123.0`, how CSV exports write an integer column
 * containing blanks) become `"123"`. Anything else that is not a usable id
 * yields null.
 */
export function fileIdFromCell(value: unknown): FileId | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? asFileId(String(value)) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 && isValidFileId(trimmed) ? asFileId(trimmed) : null;
  }
  return null;
}
