import type { ResultAsync } from 'neverthrow';
import type { Sha256Hex } from '../domain/ids.js';
import type { FsError } from './fs.port.js';

/**
 * Port: SHA-256 digests of raw bytes and of files on disk.
 *
 * Files are hashed as a stream so multi-gigabyte artifacts never sit in
 * memory.
 *
 * Guarantees:
 * - Deterministic: same bytes -> same digest
 * - Lowercase hex, no prefix
 */
export interface DigestPort {
  sha256(bytes: Uint8Array): Sha256Hex;
  sha256File(filePath: string): ResultAsync<Sha256Hex, FsError>;
}
