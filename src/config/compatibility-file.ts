import * as fs from 'fs/promises';
import { ResultAsync as RA, err, okAsync, type Result, type ResultAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheError } from '../core/errors/cache-error.js';
import {
  DEFAULT_COMPATIBILITY,
  parseCompatibilityTable,
  type CompatibilityTable,
} from '../domain/version-compatibility.js';

/**
 * Compatibility table from a JSON file, or the embedded default when no file
 * is configured.
 */
export function loadCompatibilityTable(filePath: string | undefined): ResultAsync<CompatibilityTable, CacheError> {
  if (filePath === undefined) return okAsync(DEFAULT_COMPATIBILITY);

  return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) =>
    Err.cacheIo(filePath, 'read', e instanceof Error ? e.message : String(e))
  ).andThen((text): Result<CompatibilityTable, CacheError> => {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      return err(Err.configInvalid([{
        path: 'OPHYS_CACHE_COMPATIBILITY_FILE',
        message: `${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      }]));
    }
    return parseCompatibilityTable(raw);
  });
}
