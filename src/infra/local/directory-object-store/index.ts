import * as fs from 'fs/promises';
import { createReadStream, createWriteStream } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { ResultAsync as RA, errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { ObjectLocator, ObjectStoreError, ObjectStorePort } from '../../../ports/object-store.port.js';
import type { Manifest } from '../../../domain/manifest.js';
import { isAbortError, manifestKey, manifestsPrefix, versionFromManifestKey } from '../../object-store-keys.js';
import { nodeErrorCode } from '../fs/index.js';

function mapStoreError(e: unknown, key: string): ObjectStoreError {
  if (isAbortError(e)) return { code: 'OBJECT_STORE_ABORTED', message: `Transfer of ${key} aborted`, key };
  if (nodeErrorCode(e) === 'ENOENT') return { code: 'OBJECT_NOT_FOUND', message: `No object at ${key}`, key };
  return {
    code: 'OBJECT_STORE_IO_ERROR',
    message: `Failed to read ${key}: ${e instanceof Error ? e.message : String(e)}`,
    key,
  };
}

/**
 * Object store over a local directory laid out like the release bucket
 * (a mounted mirror, or a fixture in tests).
 */
export class DirectoryObjectStore implements ObjectStorePort {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  private resolveKey(key: string): string | null {
    const resolved = path.resolve(this.rootDir, key);
    return resolved.startsWith(this.rootDir + path.sep) ? resolved : null;
  }

  private readKey(key: string): ResultAsync<Uint8Array, ObjectStoreError> {
    const filePath = this.resolveKey(key);
    if (filePath === null) {
      return errAsync({ code: 'OBJECT_NOT_FOUND', message: `Key escapes store root: ${key}`, key });
    }
    return RA.fromPromise(fs.readFile(filePath), (e) => mapStoreError(e, key)).map((b) => new Uint8Array(b));
  }

  listVersions(project: string): ResultAsync<readonly string[], ObjectStoreError> {
    const prefix = manifestsPrefix(project);
    const dir = this.resolveKey(prefix);
    if (dir === null) return okAsync([]);

    return RA.fromPromise(fs.readdir(dir), (e) => mapStoreError(e, prefix))
      .orElse((e): ResultAsync<string[], ObjectStoreError> => (e.code === 'OBJECT_NOT_FOUND' ? okAsync([]) : errAsync(e)))
      .map((names) =>
        names
          .map((name) => versionFromManifestKey(project, name))
          .filter((v): v is string => v !== null)
      );
  }

  fetchManifest(project: string, version: string): ResultAsync<Uint8Array, ObjectStoreError> {
    return this.readKey(manifestKey(project, version));
  }

  fetchMetadataTable(manifest: Manifest, table: string): ResultAsync<Uint8Array, ObjectStoreError> {
    const entry = manifest.metadataFiles.get(table);
    if (entry === undefined) {
      return errAsync({ code: 'OBJECT_NOT_FOUND', message: `Manifest lists no metadata file "${table}"`, key: table });
    }
    return this.readKey(entry.key);
  }

  download(locator: ObjectLocator, destPath: string, signal?: AbortSignal): ResultAsync<void, ObjectStoreError> {
    const source = this.resolveKey(locator.key);
    if (source === null) {
      return errAsync({ code: 'OBJECT_NOT_FOUND', message: `Key escapes store root: ${locator.key}`, key: locator.key });
    }
    return RA.fromPromise(
      pipeline(createReadStream(source), createWriteStream(destPath), { signal }),
      (e) => mapStoreError(e, locator.key)
    );
  }
}
