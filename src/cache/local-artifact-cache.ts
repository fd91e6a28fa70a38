import * as path from 'path';
import { z } from 'zod';
import { ResultAsync, okAsync, errAsync, ok, err, type Result } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { CacheError } from '../core/errors/cache-error.js';
import type { Logger } from '../core/logging/types.js';
import { asFileId, asSha256Hex, isValidFileId, type FileId, type Sha256Hex } from '../domain/ids.js';
import type { ManifestFileEntry } from '../domain/manifest.js';
import type { CheckedManifest } from '../domain/version-compatibility.js';
import type { ArtifactLockHandle, ArtifactLockPort } from '../ports/artifact-lock.port.js';
import type { CacheLayoutPort } from '../ports/cache-layout.port.js';
import type { DigestPort } from '../ports/digest.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ObjectLocator, ObjectStorePort } from '../ports/object-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { ENTRY_FILE } from '../infra/local/cache-layout/index.js';
import { tempPathFor, toCacheIo, unlinkIfPresent, writeFileAtomic } from './io.js';
import { withRetry, type RetryPolicy } from './retry.js';

export type VerifyMode = 'size' | 'digest';

export interface ArtifactCacheOptions {
  /** `size` trusts the recorded byte count on hits; `digest` re-hashes the file. */
  readonly verify: VerifyMode;
  readonly lockWaitMs: number;
  readonly retry: RetryPolicy;
}

export interface ArtifactCacheDeps {
  readonly store: ObjectStorePort;
  readonly fs: FileSystemPort;
  readonly layout: CacheLayoutPort;
  readonly digest: DigestPort;
  readonly lock: ArtifactLockPort;
  readonly clock: TimeClockPort;
  readonly logger: Logger;
}

export interface GetArtifactOptions {
  readonly signal?: AbortSignal;
}

const CacheEntrySchema = z.object({
  v: z.literal(1),
  fileId: z.string(),
  key: z.string(),
  versionId: z.string().optional(),
  basename: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  installedAtMs: z.number(),
});

/** Sidecar written next to an installed artifact. */
export interface CacheEntry {
  readonly v: 1;
  readonly fileId: FileId;
  readonly key: string;
  readonly versionId?: string;
  readonly basename: string;
  readonly sizeBytes: number;
  readonly sha256: Sha256Hex;
  readonly installedAtMs: number;
}

export interface ArtifactCacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly downloads: number;
  readonly repairs: number;
}

type EntryRead =
  | { readonly kind: 'ok'; readonly entry: CacheEntry }
  | { readonly kind: 'absent' }
  | { readonly kind: 'unreadable'; readonly details: string };

/**
 * One in-process population of a file id. The transfer runs under its own
 * controller; it is aborted only when every caller that passed a signal
 * has aborted and no caller without one is waiting.
 */
interface SharedPopulation {
  readonly result: Promise<Result<string, CacheError>>;
  readonly controller: AbortController;
  waiters: number;
}

type Inspection =
  | { readonly kind: 'hit'; readonly path: string; readonly entry: CacheEntry }
  | { readonly kind: 'miss' }
  | { readonly kind: 'corrupt'; readonly path: string; readonly details: string };

/**
 * File name used under `data/<fileId>/`: the key's last segment with
 * anything outside `[A-Za-z0-9._-]` replaced.
 */
export function artifactBasename(key: string): string {
  const raw = key.slice(key.lastIndexOf('/') + 1).replace(/[^A-Za-z0-9._-]/g, '_');
  if (raw.length === 0 || raw === '.' || raw === '..') return 'artifact';
  return raw === ENTRY_FILE ? `artifact-${ENTRY_FILE}` : raw;
}

/**
 * Persistent, content-verified store of the data files of one checked
 * manifest.
 *
 * Population of an entry is serialised per file id: in process through a
 * shared in-flight result, across processes through the lock port. Files
 * reach their final path only by rename, after verification.
 */
export class LocalArtifactCache {
  private readonly inflight = new Map<FileId, SharedPopulation>();
  private readonly counters = { hits: 0, misses: 0, downloads: 0, repairs: 0 };

  constructor(
    private readonly checked: CheckedManifest,
    private readonly deps: ArtifactCacheDeps,
    private readonly options: ArtifactCacheOptions
  ) {}

  private get project(): string {
    return this.checked.manifest.project;
  }

  /**
   * Local path of a verified copy of `fileId`, downloading it on a miss.
   */
  get(fileId: string, options: GetArtifactOptions = {}): ResultAsync<string, CacheError> {
    const located = this.locate(fileId);
    if (located.isErr()) return errAsync(located.error);
    const { id, entry } = located.value;

    const shared = this.inflight.get(id) ?? this.share(id, entry);
    return new ResultAsync(this.join(id, shared, options.signal));
  }

  /** Recorded entry of an installed artifact, without verifying it. */
  entry(fileId: string): ResultAsync<CacheEntry | null, CacheError> {
    const located = this.locate(fileId);
    if (located.isErr()) return errAsync(located.error);
    return this.readEntry(located.value.id).map((read) => (read.kind === 'ok' ? read.entry : null));
  }

  /**
   * Remove the artifact and its entry. Ok(false) when nothing was cached.
   */
  invalidate(fileId: string): ResultAsync<boolean, CacheError> {
    const located = this.locate(fileId);
    if (located.isErr()) return errAsync(located.error);
    const { id, entry } = located.value;

    return this.withLock(id, undefined, () => this.removeInstalled(id, entry)).map((removed) => {
      if (removed) this.deps.logger.info({ fileId: id }, 'artifact invalidated');
      return removed;
    });
  }

  stats(): ArtifactCacheStats {
    return { ...this.counters };
  }

  // ---------------------------------------------------------------------------

  private share(id: FileId, entry: ManifestFileEntry): SharedPopulation {
    const controller = new AbortController();
    const run = async (): Promise<Result<string, CacheError>> => {
      const outcome = await this.inspect(id).andThen((found): ResultAsync<string, CacheError> => {
        if (found.kind === 'hit') {
          this.counters.hits++;
          return okAsync(found.path);
        }
        if (found.kind === 'corrupt') {
          this.deps.logger.warn({ fileId: id, path: found.path, details: found.details }, 'cached artifact failed verification, repairing');
          this.counters.repairs++;
        }
        this.counters.misses++;
        return this.populate(id, entry, controller.signal);
      });
      if (this.inflight.get(id) === shared) this.inflight.delete(id);
      return outcome;
    };
    const shared: SharedPopulation = { controller, waiters: 0, result: run() };
    this.inflight.set(id, shared);
    return shared;
  }

  /**
   * Wait for a shared population under the caller's own signal. A caller
   * that aborts while others still wait leaves the transfer running.
   */
  private join(id: FileId, shared: SharedPopulation, signal?: AbortSignal): Promise<Result<string, CacheError>> {
    shared.waiters++;
    if (signal === undefined) return shared.result;

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        shared.waiters--;
        if (shared.waiters > 0) {
          resolve(err(Err.downloadFailed(this.project, id, 0, 'aborted while waiting for a shared download', false)));
          return;
        }
        if (this.inflight.get(id) === shared) this.inflight.delete(id);
        shared.controller.abort();
        resolve(shared.result);
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      shared.result.then(
        (outcome) => {
          signal.removeEventListener('abort', onAbort);
          resolve(outcome);
        },
        (e: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(e);
        }
      );
    });
  }

  private locate(fileId: string): Result<{ id: FileId; entry: ManifestFileEntry }, CacheError> {
    const { manifest } = this.checked;
    const entry = isValidFileId(fileId) ? manifest.dataFiles.get(asFileId(fileId)) : undefined;
    if (entry === undefined) {
      return err(Err.notFound('file', manifest.project, fileId, manifest.version));
    }
    return ok({ id: asFileId(fileId), entry });
  }

  private readEntry(fileId: FileId): ResultAsync<EntryRead, CacheError> {
    const entryPath = this.deps.layout.entryPath(this.project, fileId);
    return this.deps.fs
      .readFileUtf8(entryPath)
      .map((text): EntryRead => {
        let raw: unknown;
        try {
          raw = JSON.parse(text);
        } catch {
          return { kind: 'unreadable', details: 'entry is not valid JSON' };
        }
        const parsed = CacheEntrySchema.safeParse(raw);
        if (!parsed.success || parsed.data.fileId !== fileId) {
          return { kind: 'unreadable', details: 'entry does not describe this file id' };
        }
        return { kind: 'ok', entry: { ...parsed.data, v: 1, fileId, sha256: asSha256Hex(parsed.data.sha256) } };
      })
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync<EntryRead>({ kind: 'absent' }) : errAsync(e)))
      .mapErr(toCacheIo('read', entryPath));
  }

  private inspect(fileId: FileId): ResultAsync<Inspection, CacheError> {
    const { fs, layout, digest } = this.deps;
    const declared = this.checked.manifest.dataFiles.get(fileId)?.sha256;

    return this.readEntry(fileId).andThen((read): ResultAsync<Inspection, CacheError> => {
      if (read.kind === 'absent') return okAsync({ kind: 'miss' });
      const entryPath = layout.entryPath(this.project, fileId);
      if (read.kind === 'unreadable') return okAsync({ kind: 'corrupt', path: entryPath, details: read.details });

      const { entry } = read;
      const artifactPath = layout.artifactPath(this.project, fileId, entry.basename);
      const corrupt = (details: string): Inspection => ({ kind: 'corrupt', path: artifactPath, details });

      if (declared !== undefined && declared !== entry.sha256) {
        return okAsync(corrupt('installed copy does not match the manifest digest'));
      }

      return fs
        .stat(artifactPath)
        .map((s): number | null => s.sizeBytes)
        .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(e)))
        .mapErr(toCacheIo('stat', artifactPath))
        .andThen((size): ResultAsync<Inspection, CacheError> => {
          if (size === null) return okAsync(corrupt('artifact file missing'));
          if (size !== entry.sizeBytes) return okAsync(corrupt(`size ${size} differs from recorded ${entry.sizeBytes}`));
          if (this.options.verify === 'size') return okAsync({ kind: 'hit', path: artifactPath, entry });

          return digest
            .sha256File(artifactPath)
            .mapErr(toCacheIo('hash', artifactPath))
            .map((actual): Inspection =>
              actual === entry.sha256
                ? { kind: 'hit', path: artifactPath, entry }
                : corrupt(`sha256 ${actual} differs from recorded ${entry.sha256}`)
            );
        });
    });
  }

  /**
   * Under the lock: re-check, then download, verify and install. A download
   * that fails verification is fetched once more before giving up.
   */
  private populate(fileId: FileId, entry: ManifestFileEntry, signal?: AbortSignal): ResultAsync<string, CacheError> {
    return this.withLock(fileId, signal, () =>
      this.inspect(fileId).andThen((found): ResultAsync<string, CacheError> => {
        if (found.kind === 'hit') {
          this.deps.logger.debug({ fileId }, 'artifact installed by another caller');
          return okAsync(found.path);
        }
        return this.removeInstalled(fileId, entry).andThen(() =>
          this.downloadVerified(fileId, entry, signal).orElse((e): ResultAsync<string, CacheError> => {
            if (e._tag !== 'CorruptCache') return errAsync(e);
            this.deps.logger.warn({ fileId, details: e.details }, 'downloaded artifact failed verification, downloading again');
            return this.downloadVerified(fileId, entry, signal);
          })
        );
      })
    );
  }

  private downloadVerified(fileId: FileId, entry: ManifestFileEntry, signal?: AbortSignal): ResultAsync<string, CacheError> {
    const { fs, layout, digest, store, clock, logger } = this.deps;
    const basename = artifactBasename(entry.key);
    const finalPath = layout.artifactPath(this.project, fileId, basename);
    const tmpDir = layout.tmpDir(this.project);
    const tmpPath = tempPathFor(path.join(tmpDir, `${fileId}.part`));
    const locator: ObjectLocator = {
      fileId,
      key: entry.key,
      ...(entry.versionId !== undefined ? { versionId: entry.versionId } : {}),
    };

    const discardTmp = (e: CacheError): ResultAsync<never, CacheError> =>
      unlinkIfPresent(fs, tmpPath)
        .orElse((cleanup) => {
          logger.warn({ fileId, path: tmpPath, reason: cleanup.message }, 'failed to remove partial download');
          return okAsync(false);
        })
        .andThen(() => errAsync(e));

    const work = fs
      .mkdirp(tmpDir)
      .andThen(() => fs.mkdirp(layout.artifactDir(this.project, fileId)))
      .mapErr(toCacheIo('mkdir', tmpDir))
      .andThen(() => {
        this.counters.downloads++;
        return withRetry(
          () => store.download(locator, tmpPath, signal),
          this.options.retry,
          clock,
          logger,
          signal
        ).mapErr(({ error, attempts }) =>
          Err.downloadFailed(this.project, entry.key, attempts, error.message, error.code === 'OBJECT_STORE_IO_ERROR')
        );
      })
      .andThen(() => fs.stat(tmpPath).mapErr(toCacheIo('stat', tmpPath)))
      .andThen((stat) =>
        digest
          .sha256File(tmpPath)
          .mapErr(toCacheIo('hash', tmpPath))
          .andThen((actual): ResultAsync<CacheEntry, CacheError> => {
            if (entry.sha256 !== undefined && actual !== entry.sha256) {
              return errAsync(Err.corruptCache(fileId, finalPath, `downloaded sha256 ${actual} does not match manifest ${entry.sha256}`));
            }
            return okAsync({
              v: 1,
              fileId,
              key: entry.key,
              ...(entry.versionId !== undefined ? { versionId: entry.versionId } : {}),
              basename,
              sizeBytes: stat.sizeBytes,
              sha256: actual,
              installedAtMs: clock.nowMs(),
            });
          })
      )
      .andThen((installed) =>
        fs
          .rename(tmpPath, finalPath)
          .mapErr(toCacheIo('rename', finalPath))
          .andThen(() =>
            writeFileAtomic(fs, layout.entryPath(this.project, fileId), new TextEncoder().encode(JSON.stringify(installed)))
          )
          .map(() => {
            logger.info({ fileId, path: finalPath, sizeBytes: installed.sizeBytes }, 'artifact installed');
            return finalPath;
          })
      );

    return work.orElse(discardTmp);
  }

  /** Entry first, so a half-removed install reads as a miss. */
  private removeInstalled(fileId: FileId, entry: ManifestFileEntry): ResultAsync<boolean, CacheError> {
    const { fs, layout } = this.deps;
    return this.readEntry(fileId).andThen((read) => {
      const basename = read.kind === 'ok' ? read.entry.basename : artifactBasename(entry.key);
      const entryPath = layout.entryPath(this.project, fileId);
      const artifactPath = layout.artifactPath(this.project, fileId, basename);

      return unlinkIfPresent(fs, entryPath)
        .mapErr(toCacheIo('unlink', entryPath))
        .andThen((removedEntry) =>
          unlinkIfPresent(fs, artifactPath)
            .mapErr(toCacheIo('unlink', artifactPath))
            .map((removedArtifact) => removedEntry || removedArtifact)
        );
    });
  }

  private withLock<T>(
    fileId: FileId,
    signal: AbortSignal | undefined,
    body: () => ResultAsync<T, CacheError>
  ): ResultAsync<T, CacheError> {
    return this.acquire(fileId, signal).andThen((handle) => {
      const run = async (): Promise<Result<T, CacheError>> => {
        const result = await body();
        const released = await this.deps.lock.release(handle);
        if (released.isErr()) {
          this.deps.logger.error({ fileId, lockPath: released.error.lockPath, reason: released.error.message }, 'failed to release artifact lock');
        }
        return result;
      };
      return new ResultAsync(run());
    });
  }

  /**
   * Poll the lock until it is free, the wait budget is spent, or the caller
   * aborts.
   */
  private acquire(fileId: FileId, signal?: AbortSignal): ResultAsync<ArtifactLockHandle, CacheError> {
    const { lock, clock, layout } = this.deps;
    const deadline = clock.nowMs() + this.options.lockWaitMs;
    const lockPath = layout.lockPath(this.project, fileId);

    const run = async (): Promise<Result<ArtifactLockHandle, CacheError>> => {
      for (let waits = 0; ; waits++) {
        if (signal?.aborted === true) {
          return err(Err.downloadFailed(this.project, fileId, 0, 'aborted while waiting for the artifact lock', false));
        }
        const acquired = await lock.acquire(this.project, fileId);
        if (acquired.isOk()) return ok(acquired.value);

        const failure = acquired.error;
        if (failure.code === 'ARTIFACT_LOCK_IO_ERROR') {
          return err(Err.cacheIo(failure.lockPath, 'lock', failure.message));
        }
        if (clock.nowMs() >= deadline) {
          return err(Err.downloadFailed(
            this.project,
            fileId,
            0,
            `timed out after ${this.options.lockWaitMs}ms waiting for ${lockPath}`,
            true
          ));
        }
        if (waits === 0) this.deps.logger.debug({ fileId, lockPath }, 'waiting for artifact lock');
        await clock.sleep(failure.retry.afterMs);
      }
    };

    return new ResultAsync(run());
  }
}
