import { randomUUID } from 'crypto';
import * as path from 'path';
import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheIoError } from '../core/errors/cache-error.js';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';

export function toCacheIo(operation: string, filePath: string): (e: FsError) => CacheIoError {
  return (e: FsError): CacheIoError => Err.cacheIo(filePath, operation, e.message);
}

/** Sibling temp name, unique per call so concurrent writers never share one. */
export function tempPathFor(finalPath: string): string {
  return path.join(path.dirname(finalPath), `.${path.basename(finalPath)}.${randomUUID()}.tmp`);
}

/**
 * Remove a file that may already be gone. FS_NOT_FOUND is Ok(false).
 */
export function unlinkIfPresent(fs: FileSystemPort, filePath: string): ResultAsync<boolean, FsError> {
  return fs
    .unlink(filePath)
    .map(() => true)
    .orElse((e): ResultAsync<boolean, FsError> => (e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(e)));
}

/**
 * write(tmp) -> rename(tmp, final). Readers see the old file or the new one,
 * never a partial write.
 */
export function writeFileAtomic(
  fs: FileSystemPort,
  finalPath: string,
  bytes: Uint8Array
): ResultAsync<void, CacheIoError> {
  const tmp = tempPathFor(finalPath);
  return fs
    .mkdirp(path.dirname(finalPath))
    .andThen(() => fs.writeFileBytes(tmp, bytes))
    .andThen(() => fs.rename(tmp, finalPath))
    .orElse((e) => unlinkIfPresent(fs, tmp).andThen(() => errAsync(e)).orElse(() => errAsync(e)))
    .mapErr(toCacheIo('write', finalPath));
}
