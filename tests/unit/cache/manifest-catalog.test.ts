import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ManifestCatalog, sortVersions } from '../../../src/cache/manifest-catalog.js';
import { LocalCacheLayout } from '../../../src/infra/local/cache-layout/index.js';
import { NodeFileSystem } from '../../../src/infra/local/fs/index.js';
import { manifestKey, manifestsPrefix } from '../../../src/infra/object-store-keys.js';
import { InMemoryObjectStore } from '../../fakes/object-store.fake.js';
import { FakeTimeClock } from '../../fakes/time-clock.fake.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { PROJECT, buildManifest, seedStore } from '../../helpers/release-fixture.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('sortVersions', () => {
  it('orders semantically and drops duplicates and non-versions', () => {
    expect(sortVersions(['1.10.0', '1.2.0', 'latest', '1.2.0', '0.9.1'])).toEqual(['0.9.1', '1.2.0', '1.10.0']);
  });
});

describe('ManifestCatalog', () => {
  let root: string;
  let store: InMemoryObjectStore;
  let layout: LocalCacheLayout;
  let clock: FakeTimeClock;
  let logs: FakeLogger;
  let catalog: ManifestCatalog;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    store = new InMemoryObjectStore();
    seedStore(store, ['1.0.0', '1.10.0', '1.2.0']);
    layout = new LocalCacheLayout(root);
    clock = new FakeTimeClock();
    logs = new FakeLogger();
    catalog = new ManifestCatalog(
      { store, fs: new NodeFileSystem(), layout, clock, logger: logs.logger },
      { retries: 1, baseDelayMs: 10 }
    );
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('version discovery', () => {
    it('lists published versions ascending', async () => {
      store.put(`${manifestsPrefix(PROJECT)}${PROJECT}_manifest_vnext.json`, '{}');

      expect(expectOk(await catalog.listVersions(PROJECT), 'list')).toEqual(['1.0.0', '1.2.0', '1.10.0']);
      expect(expectOk(await catalog.latestVersion(PROJECT), 'latest')).toBe('1.10.0');
    });

    it('reports a project without manifests as unknown', async () => {
      const error = expectErr(await catalog.latestVersion('visual-coding-2p'), 'empty');
      expect(error).toMatchObject({ _tag: 'NotFound', resource: 'project', id: 'visual-coding-2p' });
    });

    it('retries listing, then fails with the attempt count', async () => {
      store.failNext(manifestsPrefix(PROJECT), 5);

      const error = expectErr(await catalog.listVersions(PROJECT), 'listing down');
      expect(error).toMatchObject({
        _tag: 'DownloadFailed',
        target: 'visual-behavior-ophys/manifests/',
        attempts: 2,
        retryable: true,
      });
      expect(store.listCalls).toBe(2);
      expect(clock.sleeps).toHaveLength(1);
    });
  });

  describe('load', () => {
    it('fetches once, then serves the local copy', async () => {
      const first = expectOk(await catalog.load(PROJECT, '1.2.0'), 'first');
      const second = expectOk(await catalog.load(PROJECT, '1.2.0'), 'second');

      expect(first.version).toBe('1.2.0');
      expect(second.dataFiles.size).toBe(3);
      expect(store.callCount(manifestKey(PROJECT, '1.2.0'))).toBe(1);
      expect(logs.getEntries('info').map((e) => e.msg)).toEqual(['manifest downloaded']);
    });

    it('rejects names that are not versions without asking the store', async () => {
      const error = expectErr(await catalog.load(PROJECT, 'latest'), 'not semver');
      expect(error).toMatchObject({ _tag: 'NotFound', resource: 'version', id: 'latest' });
      expect(store.callCount(manifestKey(PROJECT, 'latest'))).toBe(0);
    });

    it('reports unpublished versions', async () => {
      const error = expectErr(await catalog.load(PROJECT, '9.9.9'), 'missing');
      expect(error.message).toBe('Unknown version "9.9.9" in visual-behavior-ophys');
    });

    it('replaces a local copy that no longer parses', async () => {
      await fs.mkdir(layout.manifestsDir(PROJECT), { recursive: true });
      await fs.writeFile(layout.manifestPath(PROJECT, '1.0.0'), '{"truncated":');

      expectOk(await catalog.load(PROJECT, '1.0.0'), 'repaired');
      expect(logs.hasEntry('warn', 'local manifest unreadable')).toBe(true);
      expect(JSON.parse(await fs.readFile(layout.manifestPath(PROJECT, '1.0.0'), 'utf8'))).toEqual(buildManifest('1.0.0'));
    });

    it('does not persist a manifest describing another version', async () => {
      store.putManifest(PROJECT, '2.0.0', buildManifest('1.0.0'));

      const error = expectErr(await catalog.load(PROJECT, '2.0.0'), 'mislabelled');
      expect(error._tag).toBe('ManifestInvalid');
      await expect(fs.access(layout.manifestPath(PROJECT, '2.0.0'))).rejects.toThrow();
    });
  });

  describe('local state', () => {
    it('lists downloaded versions', async () => {
      expect(expectOk(await catalog.downloadedVersions(PROJECT), 'none yet')).toEqual([]);

      expectOk(await catalog.load(PROJECT, '1.10.0'), 'load');
      expectOk(await catalog.load(PROJECT, '1.2.0'), 'load');

      expect(expectOk(await catalog.downloadedVersions(PROJECT), 'two')).toEqual(['1.2.0', '1.10.0']);
      expect(expectOk(await catalog.latestDownloadedVersion(PROJECT), 'latest local')).toBe('1.10.0');
    });

    it('remembers the last used version', async () => {
      expect(expectOk(await catalog.lastUsedVersion(PROJECT), 'unset')).toBeNull();

      const manifest = expectOk(await catalog.load(PROJECT, '1.2.0'), 'load');
      expectOk(await catalog.markUsed(PROJECT, manifest.version), 'mark');

      expect(expectOk(await catalog.lastUsedVersion(PROJECT), 'set')).toBe('1.2.0');
      expect(await fs.readFile(layout.lastUsedManifestPath(PROJECT), 'utf8')).toBe('1.2.0');
    });
  });

  it('compares two versions', async () => {
    store.putManifest(PROJECT, '1.2.0', buildManifest('1.2.0', { dropDataFiles: ['1003'], artifactBodies: { '1001': 'reprocessed' } }));

    const diff = expectOk(await catalog.compare(PROJECT, '1.0.0', '1.2.0'), 'compare');

    expect(diff).toEqual({
      from: '1.0.0',
      to: '1.2.0',
      metadataFiles: {
        added: [],
        removed: [],
        changed: ['behavior_session_table', 'ophys_experiment_table', 'ophys_session_table'],
      },
      dataFiles: { added: [], removed: ['1003'], changed: ['1001'] },
      pipelineChanged: false,
    });
  });
});
