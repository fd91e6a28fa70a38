import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import { backoffDelayMs, withRetry } from '../../../src/cache/retry.js';
import type { ObjectStoreError } from '../../../src/ports/object-store.port.js';
import { FakeTimeClock } from '../../fakes/time-clock.fake.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const KEY = 'visual-behavior-ophys/manifests/';

function failing(code: ObjectStoreError['code']): ObjectStoreError {
  return { code, message: `scripted ${code}`, key: KEY };
}

/** Fails `failures` times with `code`, then succeeds with the attempt number. */
function flaky(failures: number, code: ObjectStoreError['code'] = 'OBJECT_STORE_IO_ERROR') {
  const attempts: number[] = [];
  const operation = (attempt: number): ResultAsync<number, ObjectStoreError> => {
    attempts.push(attempt);
    return attempt <= failures ? errAsync(failing(code)) : okAsync(attempt);
  };
  return { operation, attempts };
}

describe('backoffDelayMs', () => {
  beforeEach(() => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles per attempt and adds jitter below one base delay', () => {
    const policy = { retries: 3, baseDelayMs: 1_000 };
    expect(backoffDelayMs(policy, 1)).toBe(1_500);
    expect(backoffDelayMs(policy, 2)).toBe(2_500);
    expect(backoffDelayMs(policy, 3)).toBe(4_500);
  });
});

describe('withRetry', () => {
  let clock: FakeTimeClock;
  let logs: FakeLogger;

  beforeEach(() => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    clock = new FakeTimeClock();
    logs = new FakeLogger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('retries transport failures with backoff', async () => {
    const { operation, attempts } = flaky(2);

    const value = expectOk(await withRetry(operation, { retries: 3, baseDelayMs: 100 }, clock, logs.logger), 'flaky');

    expect(value).toBe(3);
    expect(attempts).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(logs.getEntries('warn').map((e) => e.fields['attempt'])).toEqual([1, 2]);
  });

  it('gives up after the configured retries', async () => {
    const { operation } = flaky(10);

    const failure = expectErr(await withRetry(operation, { retries: 2, baseDelayMs: 100 }, clock, logs.logger), 'down');

    expect(failure.attempts).toBe(3);
    expect(failure.error.code).toBe('OBJECT_STORE_IO_ERROR');
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('does not retry missing objects', async () => {
    const { operation } = flaky(1, 'OBJECT_NOT_FOUND');

    const failure = expectErr(await withRetry(operation, { retries: 3, baseDelayMs: 100 }, clock, logs.logger), 'missing');

    expect(failure).toEqual({ error: failing('OBJECT_NOT_FOUND'), attempts: 1 });
    expect(clock.sleeps).toEqual([]);
  });

  it('stops once the caller aborts', async () => {
    const controller = new AbortController();
    const operation = (attempt: number): ResultAsync<number, ObjectStoreError> => {
      controller.abort();
      return attempt > 5 ? okAsync(attempt) : errAsync(failing('OBJECT_STORE_IO_ERROR'));
    };

    const failure = expectErr(
      await withRetry(operation, { retries: 3, baseDelayMs: 100 }, clock, logs.logger, controller.signal),
      'aborted'
    );
    expect(failure.attempts).toBe(1);
  });

  it('makes a single attempt with zero retries', async () => {
    const { operation, attempts } = flaky(1);

    expectErr(await withRetry(operation, { retries: 0, baseDelayMs: 100 }, clock, logs.logger), 'no retries');
    expect(attempts).toEqual([1]);
  });
});
