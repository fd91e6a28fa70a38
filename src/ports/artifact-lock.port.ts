import type { ResultAsync } from 'neverthrow';

export type ArtifactLockError =
  | {
      readonly code: 'ARTIFACT_LOCK_BUSY';
      readonly message: string;
      readonly retry: { readonly kind: 'retryable_after_ms'; readonly afterMs: number };
      readonly lockPath: string;
    }
  | { readonly code: 'ARTIFACT_LOCK_IO_ERROR'; readonly message: string; readonly lockPath: string };

export interface ArtifactLockHandle {
  readonly kind: 'artifact_lock_handle';
  readonly project: string;
  readonly fileId: string;
}

/**
 * Port: per-file-id exclusive lock (single populator per cache entry).
 *
 * Invariants:
 * - OS-level exclusive lock file, safe across processes sharing the cache root
 * - acquire() fails fast with ARTIFACT_LOCK_BUSY; callers decide how long to wait
 * - release() required after acquire
 * - Distinct file ids never contend
 *
 * Example:
 * ```typescript
 * const handle = await lock.acquire(project, fileId);
 * try {
 *   // populate the entry
 * } finally {
 *   await lock.release(handle);
 * }
 * ```
 */
export interface ArtifactLockPort {
  acquire(project: string, fileId: string): ResultAsync<ArtifactLockHandle, ArtifactLockError>;
  release(handle: ArtifactLockHandle): ResultAsync<void, ArtifactLockError>;
}
