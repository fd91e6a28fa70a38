/**
 * In-memory fake for the remote object store.
 *
 * - objects live in a Map keyed by object key
 * - download() writes the bytes to the requested local path (real fs)
 * - every call is counted per key so tests can assert "exactly one download"
 * - failures can be scripted per key
 */

import * as fs from 'fs/promises';
import { ResultAsync, okAsync, errAsync, ok, err, type Result } from 'neverthrow';
import type { ObjectLocator, ObjectStoreError, ObjectStorePort } from '../../src/ports/object-store.port.js';
import type { Manifest } from '../../src/domain/manifest.js';
import { manifestKey, manifestsPrefix, versionFromManifestKey } from '../../src/infra/object-store-keys.js';

type FailureCode = 'OBJECT_STORE_IO_ERROR' | 'OBJECT_NOT_FOUND';

export class InMemoryObjectStore implements ObjectStorePort {
  private readonly objects = new Map<string, Uint8Array>();
  private readonly failures = new Map<string, { code: FailureCode; remaining: number }>();
  private readonly calls = new Map<string, number>();
  private gate: Promise<void> | null = null;
  listCalls = 0;

  // ---------------------------------------------------------------------------
  // Seeding
  // ---------------------------------------------------------------------------

  put(key: string, bytes: Uint8Array | string): void {
    this.objects.set(key, typeof bytes === 'string' ? new TextEncoder().encode(bytes) : bytes);
  }

  putManifest(project: string, version: string, manifest: unknown): void {
    this.put(manifestKey(project, version), JSON.stringify(manifest));
  }

  /** The next `times` calls touching `key` fail with `code`. */
  failNext(key: string, times: number, code: FailureCode = 'OBJECT_STORE_IO_ERROR'): void {
    this.failures.set(key, { code, remaining: times });
  }

  /** Downloads wait until `release` resolves. */
  holdDownloads(release: Promise<void>): void {
    this.gate = release;
  }

  callCount(key: string): number {
    return this.calls.get(key) ?? 0;
  }

  // ---------------------------------------------------------------------------
  // ObjectStorePort
  // ---------------------------------------------------------------------------

  listVersions(project: string): ResultAsync<readonly string[], ObjectStoreError> {
    this.listCalls++;
    const prefix = manifestsPrefix(project);
    const scripted = this.scriptedFailure(prefix);
    if (scripted !== null) return errAsync(scripted);

    return okAsync(
      [...this.objects.keys()]
        .filter((key) => key.startsWith(prefix))
        .map((key) => versionFromManifestKey(project, key))
        .filter((v): v is string => v !== null)
    );
  }

  fetchManifest(project: string, version: string): ResultAsync<Uint8Array, ObjectStoreError> {
    return this.read(manifestKey(project, version));
  }

  fetchMetadataTable(manifest: Manifest, table: string): ResultAsync<Uint8Array, ObjectStoreError> {
    const entry = manifest.metadataFiles.get(table);
    if (entry === undefined) {
      return errAsync({ code: 'OBJECT_NOT_FOUND', message: `no metadata file ${table}`, key: table });
    }
    return this.read(entry.key);
  }

  download(locator: ObjectLocator, destPath: string, signal?: AbortSignal): ResultAsync<void, ObjectStoreError> {
    const key = locator.key;
    const run = async (): Promise<Result<void, ObjectStoreError>> => {
      const read = await this.read(key);
      if (read.isErr()) return err(read.error);
      if (this.gate !== null) await this.gate;
      if (signal?.aborted === true) {
        return err({ code: 'OBJECT_STORE_ABORTED', message: `Transfer of ${key} aborted`, key });
      }
      await fs.writeFile(destPath, read.value);
      return ok(undefined);
    };
    return new ResultAsync(run());
  }

  // ---------------------------------------------------------------------------

  private scriptedFailure(key: string): ObjectStoreError | null {
    this.calls.set(key, this.callCount(key) + 1);
    const failure = this.failures.get(key);
    if (failure === undefined || failure.remaining <= 0) return null;
    failure.remaining--;
    return { code: failure.code, message: `scripted ${failure.code} for ${key}`, key };
  }

  private read(key: string): ResultAsync<Uint8Array, ObjectStoreError> {
    const scripted = this.scriptedFailure(key);
    if (scripted !== null) return errAsync(scripted);
    const bytes = this.objects.get(key);
    return bytes === undefined
      ? errAsync({ code: 'OBJECT_NOT_FOUND', message: `No object at ${key}`, key })
      : okAsync(bytes);
  }
}
