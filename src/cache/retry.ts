import { ResultAsync, ok, err, type Result } from 'neverthrow';
import type { Logger } from '../core/logging/types.js';
import type { ObjectStoreError } from '../ports/object-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  readonly retries: number;
  readonly baseDelayMs: number;
}

export interface RetryFailure {
  readonly error: ObjectStoreError;
  readonly attempts: number;
}

/**
 * Exponential backoff with jitter: base * 2^(attempt-1) + random(0..base).
 */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(2, attempt - 1) + Math.random() * policy.baseDelayMs;
}

/**
 * Run an object store call, retrying transport failures only. Missing
 * objects and aborted transfers end the loop on the spot.
 */
export function withRetry<T>(
  operation: (attempt: number) => ResultAsync<T, ObjectStoreError>,
  policy: RetryPolicy,
  clock: TimeClockPort,
  logger: Logger,
  signal?: AbortSignal
): ResultAsync<T, RetryFailure> {
  const run = async (): Promise<Result<T, RetryFailure>> => {
    const maxAttempts = policy.retries + 1;
    for (let attempt = 1; ; attempt++) {
      const result = await operation(attempt);
      if (result.isOk()) return ok(result.value);

      const error = result.error;
      if (error.code !== 'OBJECT_STORE_IO_ERROR' || attempt >= maxAttempts || signal?.aborted === true) {
        return err({ error, attempts: attempt });
      }

      const delayMs = backoffDelayMs(policy, attempt);
      logger.warn({ key: error.key, attempt, maxAttempts, delayMs, reason: error.message }, 'object store call failed, retrying');
      await clock.sleep(delayMs);
    }
  };

  return new ResultAsync(run());
}
