import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { LocalArtifactLock } from '../../../src/infra/local/artifact-lock/index.js';
import { LocalCacheLayout } from '../../../src/infra/local/cache-layout/index.js';
import { NodeFileSystem } from '../../../src/infra/local/fs/index.js';
import { FakeTimeClock } from '../../fakes/time-clock.fake.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const PROJECT = 'visual-behavior-ophys';

describe('LocalArtifactLock', () => {
  let root: string;
  let layout: LocalCacheLayout;
  let clock: FakeTimeClock;
  let logs: FakeLogger;
  let lock: LocalArtifactLock;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'artifact-lock-'));
    layout = new LocalCacheLayout(root);
    clock = new FakeTimeClock();
    logs = new FakeLogger();
    lock = new LocalArtifactLock(layout, new NodeFileSystem(), clock, { staleAfterMs: 60_000, pollMs: 250 }, logs.logger);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('records the owner in the lock file', async () => {
    const handle = expectOk(await lock.acquire(PROJECT, '1001'), 'acquire');
    expect(handle).toEqual({ kind: 'artifact_lock_handle', project: PROJECT, fileId: '1001' });

    const body: unknown = JSON.parse(await fs.readFile(layout.lockPath(PROJECT, '1001'), 'utf8'));
    expect(body).toEqual({ v: 1, fileId: '1001', pid: 12345, startedAtMs: clock.nowMs() });
  });

  it('fails fast while held and suggests a poll delay', async () => {
    expectOk(await lock.acquire(PROJECT, '1001'), 'first');

    const error = expectErr(await lock.acquire(PROJECT, '1001'), 'second');
    expect(error).toEqual({
      code: 'ARTIFACT_LOCK_BUSY',
      message: 'Artifact 1001 is being populated by another caller',
      retry: { kind: 'retryable_after_ms', afterMs: 250 },
      lockPath: layout.lockPath(PROJECT, '1001'),
    });
  });

  it('can be taken again after release', async () => {
    const handle = expectOk(await lock.acquire(PROJECT, '1001'), 'first');
    expectOk(await lock.release(handle), 'release');
    expectOk(await lock.acquire(PROJECT, '1001'), 'again');
  });

  it('does not contend across file ids', async () => {
    expectOk(await lock.acquire(PROJECT, '1001'), '1001');
    expectOk(await lock.acquire(PROJECT, '1002'), '1002');
  });

  it('breaks a lock older than the stale threshold', async () => {
    expectOk(await lock.acquire(PROJECT, '1001'), 'crashed owner');
    clock.advance(60_001);

    expectOk(await lock.acquire(PROJECT, '1001'), 'after crash');
    expect(logs.hasEntry('warn', 'breaking stale artifact lock')).toBe(true);
  });

  it('keeps a lock at exactly the stale threshold', async () => {
    expectOk(await lock.acquire(PROJECT, '1001'), 'owner');
    clock.advance(60_000);

    expect(expectErr(await lock.acquire(PROJECT, '1001'), 'contender').code).toBe('ARTIFACT_LOCK_BUSY');
  });

  it('never breaks a lock without a readable start time', async () => {
    await fs.mkdir(layout.locksDir(PROJECT), { recursive: true });
    await fs.writeFile(layout.lockPath(PROJECT, '1001'), 'not json');
    clock.advance(10 * 60_000);

    expect(expectErr(await lock.acquire(PROJECT, '1001'), 'unreadable').code).toBe('ARTIFACT_LOCK_BUSY');
  });

  it('reports releasing a lock that is gone as I/O', async () => {
    const error = expectErr(
      await lock.release({ kind: 'artifact_lock_handle', project: PROJECT, fileId: '1003' }),
      'release missing'
    );
    expect(error.code).toBe('ARTIFACT_LOCK_IO_ERROR');
  });
});
