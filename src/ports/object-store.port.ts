import type { ResultAsync } from 'neverthrow';
import type { FileId } from '../domain/ids.js';
import type { Manifest } from '../domain/manifest.js';

export type ObjectStoreError =
  | { readonly code: 'OBJECT_NOT_FOUND'; readonly message: string; readonly key: string }
  | { readonly code: 'OBJECT_STORE_IO_ERROR'; readonly message: string; readonly key: string }
  | { readonly code: 'OBJECT_STORE_ABORTED'; readonly message: string; readonly key: string };

/**
 * Where a data file lives in the store, as declared by the manifest.
 */
export interface ObjectLocator {
  readonly fileId: FileId;
  readonly key: string;
  readonly versionId?: string;
}

/**
 * Port: the remote immutable object store holding a release.
 *
 * The cache core never talks to the network directly; everything remote goes
 * through this port.
 *
 * Guarantees expected of adapters:
 * - listVersions returns raw version strings found for the project (unordered)
 * - missing objects are OBJECT_NOT_FOUND, never OBJECT_STORE_IO_ERROR
 * - download writes only to `destPath`; on failure the caller removes it
 * - an aborted `signal` ends the call with OBJECT_STORE_ABORTED
 */
export interface ObjectStorePort {
  listVersions(project: string): ResultAsync<readonly string[], ObjectStoreError>;
  fetchManifest(project: string, version: string): ResultAsync<Uint8Array, ObjectStoreError>;
  fetchMetadataTable(manifest: Manifest, table: string): ResultAsync<Uint8Array, ObjectStoreError>;
  download(locator: ObjectLocator, destPath: string, signal?: AbortSignal): ResultAsync<void, ObjectStoreError>;
}
