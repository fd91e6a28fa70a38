import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { CacheLayoutPort } from '../../../ports/cache-layout.port.js';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import type { ArtifactLockError, ArtifactLockHandle, ArtifactLockPort } from '../../../ports/artifact-lock.port.js';
import type { Logger } from '../../../core/logging/types.js';

export interface LocalArtifactLockOptions {
  /** Locks older than this were left by a crashed process and are broken. */
  readonly staleAfterMs: number;
  /** Delay suggested to callers that find the lock busy. */
  readonly pollMs: number;
}

interface LockFileBody {
  readonly v: 1;
  readonly fileId: string;
  readonly pid: number;
  readonly startedAtMs: number;
}

type LockState =
  | { readonly kind: 'gone' }
  | { readonly kind: 'held'; readonly startedAtMs: number | null };

function readStartedAt(raw: string): number | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed === 'object' && parsed !== null && 'startedAtMs' in parsed) {
    const started: unknown = parsed.startedAtMs;
    return typeof started === 'number' ? started : null;
  }
  return null;
}

/**
 * Local, per-file-id populate lock backed by an O_EXCL lock file.
 *
 * - fail fast if the lock file already exists (caller polls)
 * - a lock whose recorded start is older than `staleAfterMs` is removed once;
 *   a lock without a readable start time is never considered stale
 */
export class LocalArtifactLock implements ArtifactLockPort {
  constructor(
    private readonly layout: CacheLayoutPort,
    private readonly fs: FileSystemPort,
    private readonly clock: TimeClockPort,
    private readonly options: LocalArtifactLockOptions,
    private readonly logger?: Logger
  ) {}

  acquire(project: string, fileId: string): ResultAsync<ArtifactLockHandle, ArtifactLockError> {
    const lockPath = this.layout.lockPath(project, fileId);
    const handle: ArtifactLockHandle = { kind: 'artifact_lock_handle', project, fileId };

    const ioError = (e: FsError): ArtifactLockError => ({ code: 'ARTIFACT_LOCK_IO_ERROR', message: e.message, lockPath });
    const busy: ArtifactLockError = {
      code: 'ARTIFACT_LOCK_BUSY',
      message: `Artifact ${fileId} is being populated by another caller`,
      retry: { kind: 'retryable_after_ms', afterMs: this.options.pollMs },
      lockPath,
    };

    const create = (): ResultAsync<void, FsError> => {
      const body: LockFileBody = { v: 1, fileId, pid: this.clock.getPid(), startedAtMs: this.clock.nowMs() };
      return this.fs.createExclusive(lockPath, new TextEncoder().encode(JSON.stringify(body)));
    };

    const attempt = (): ResultAsync<void, ArtifactLockError> =>
      create().orElse((e): ResultAsync<void, ArtifactLockError> => {
        if (e.code !== 'FS_ALREADY_EXISTS') return errAsync(ioError(e));
        return this.breakIfStale(lockPath, fileId).andThen((broken): ResultAsync<void, ArtifactLockError> =>
          broken
            ? create().mapErr((e2) => (e2.code === 'FS_ALREADY_EXISTS' ? busy : ioError(e2)))
            : errAsync(busy)
        );
      });

    return this.fs
      .mkdirp(this.layout.locksDir(project))
      .mapErr(ioError)
      .andThen(attempt)
      .map(() => handle);
  }

  release(handle: ArtifactLockHandle): ResultAsync<void, ArtifactLockError> {
    const lockPath = this.layout.lockPath(handle.project, handle.fileId);
    return this.fs.unlink(lockPath).mapErr((e): ArtifactLockError => ({
      code: 'ARTIFACT_LOCK_IO_ERROR',
      message: e.message,
      lockPath,
    }));
  }

  /**
   * Ok(true) when the lock is no longer there (removed as stale, or released
   * meanwhile by its owner).
   */
  private breakIfStale(lockPath: string, fileId: string): ResultAsync<boolean, ArtifactLockError> {
    const ioError = (e: FsError): ArtifactLockError => ({ code: 'ARTIFACT_LOCK_IO_ERROR', message: e.message, lockPath });

    return this.fs
      .readFileUtf8(lockPath)
      .map((raw): LockState => ({ kind: 'held', startedAtMs: readStartedAt(raw) }))
      .orElse((e): ResultAsync<LockState, ArtifactLockError> =>
        e.code === 'FS_NOT_FOUND' ? okAsync({ kind: 'gone' }) : errAsync(ioError(e))
      )
      .andThen((state): ResultAsync<boolean, ArtifactLockError> => {
        if (state.kind === 'gone') return okAsync(true);
        if (state.startedAtMs === null) return okAsync(false);

        const ageMs = this.clock.nowMs() - state.startedAtMs;
        if (ageMs <= this.options.staleAfterMs) return okAsync(false);

        this.logger?.warn({ fileId, lockPath, ageMs }, 'breaking stale artifact lock');
        return this.fs
          .unlink(lockPath)
          .map(() => true)
          .orElse((e): ResultAsync<boolean, ArtifactLockError> =>
            e.code === 'FS_NOT_FOUND' ? okAsync(true) : errAsync(ioError(e))
          );
      });
  }
}
