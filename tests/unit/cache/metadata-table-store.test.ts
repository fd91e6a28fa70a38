import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { MetadataTableStore } from '../../../src/cache/metadata-table-store.js';
import { DEFAULT_RECORD_TYPES, DEFAULT_STRUCTURED_COLUMNS, tableNormalizers } from '../../../src/domain/record-types.js';
import { LocalCacheLayout } from '../../../src/infra/local/cache-layout/index.js';
import { NodeDigest } from '../../../src/infra/local/digest/index.js';
import { NodeFileSystem } from '../../../src/infra/local/fs/index.js';
import { InMemoryObjectStore } from '../../fakes/object-store.fake.js';
import { FakeTimeClock } from '../../fakes/time-clock.fake.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import {
  PROJECT,
  TABLES,
  buildManifest,
  checkedManifest,
  seedStore,
  sha256Hex,
  tableKey,
} from '../../helpers/release-fixture.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const EXPERIMENTS = 'ophys_experiment_table';

describe('MetadataTableStore', () => {
  let root: string;
  let store: InMemoryObjectStore;
  let layout: LocalCacheLayout;
  let logs: FakeLogger;

  function tableStore(): MetadataTableStore {
    return new MetadataTableStore(
      { store, fs: new NodeFileSystem(), layout, digest: new NodeDigest(), clock: new FakeTimeClock(), logger: logs.logger },
      {
        structuredColumns: DEFAULT_STRUCTURED_COLUMNS,
        normalizers: tableNormalizers(DEFAULT_RECORD_TYPES),
        retry: { retries: 0, baseDelayMs: 10 },
      }
    );
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'table-store-'));
    store = new InMemoryObjectStore();
    seedStore(store, ['1.0.0']);
    layout = new LocalCacheLayout(root);
    logs = new FakeLogger();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('decodes structured columns and applies the record type normaliser', async () => {
    const table = expectOk(await tableStore().load(checkedManifest('1.0.0'), EXPERIMENTS), 'load');

    expect(table.name).toBe(EXPERIMENTS);
    expect(table.columns).toEqual([
      'ophys_experiment_id',
      'ophys_session_id',
      'behavior_session_id',
      'ophys_container_id',
      'driver_line',
      'session_type',
      'file_id',
      'session_number',
    ]);
    expect(table.rows[0]).toEqual({
      ophys_experiment_id: 42,
      ophys_session_id: 7,
      behavior_session_id: 70,
      ophys_container_id: [900],
      driver_line: ['Sst-IRES-Cre'],
      session_type: 'OPHYS_1_images_A',
      file_id: 1001,
      session_number: 1,
    });
    expect(table.rows[2]?.['ophys_container_id']).toEqual([901, 902]);
    expect(table.rows[2]?.['file_id']).toBeNull();
  });

  it('returns frozen tables', async () => {
    const table = expectOk(await tableStore().load(checkedManifest('1.0.0'), EXPERIMENTS), 'load');

    expect(Object.isFrozen(table.rows)).toBe(true);
    expect(Object.isFrozen(table.rows[0])).toBe(true);
    expect(Object.isFrozen(table.rows[0]?.['driver_line'])).toBe(true);
  });

  it('builds each table once per store', async () => {
    const tables = tableStore();
    const checked = checkedManifest('1.0.0');

    const [a, b] = await Promise.all([tables.load(checked, EXPERIMENTS), tables.load(checked, EXPERIMENTS)]);

    expect(expectOk(a, 'a')).toBe(expectOk(b, 'b'));
    expect(store.callCount(tableKey('1.0.0', EXPERIMENTS))).toBe(1);
  });

  it('reads the persisted CSV in later sessions', async () => {
    expectOk(await tableStore().load(checkedManifest('1.0.0'), EXPERIMENTS), 'first session');
    expectOk(await tableStore().load(checkedManifest('1.0.0'), EXPERIMENTS), 'second session');

    expect(store.callCount(tableKey('1.0.0', EXPERIMENTS))).toBe(1);
    expect(await fs.readFile(layout.metadataPath(PROJECT, '1.0.0', EXPERIMENTS), 'utf8')).toBe(TABLES[EXPERIMENTS]);
  });

  it('fetches again when the local CSV no longer matches the manifest', async () => {
    expectOk(await tableStore().load(checkedManifest('1.0.0'), EXPERIMENTS), 'first session');
    await fs.writeFile(layout.metadataPath(PROJECT, '1.0.0', EXPERIMENTS), 'ophys_experiment_id\n1');

    const table = expectOk(await tableStore().load(checkedManifest('1.0.0'), EXPERIMENTS), 'second session');

    expect(table.rows).toHaveLength(4);
    expect(store.callCount(tableKey('1.0.0', EXPERIMENTS))).toBe(2);
    expect(logs.hasEntry('warn', 'local metadata table does not match manifest digest')).toBe(true);
  });

  it('refuses remote bytes that do not match the manifest and tries again next call', async () => {
    store.put(tableKey('1.0.0', EXPERIMENTS), 'ophys_experiment_id\n1');
    const tables = tableStore();
    const checked = checkedManifest('1.0.0');

    const error = expectErr(await tables.load(checked, EXPERIMENTS), 'corrupt');
    expect(error).toMatchObject({ _tag: 'CorruptCache', fileId: EXPERIMENTS, path: tableKey('1.0.0', EXPERIMENTS) });
    await expect(fs.access(layout.metadataPath(PROJECT, '1.0.0', EXPERIMENTS))).rejects.toThrow();

    store.put(tableKey('1.0.0', EXPERIMENTS), TABLES[EXPERIMENTS] ?? '');
    expectOk(await tables.load(checked, EXPERIMENTS), 'repaired upstream');
    expect(store.callCount(tableKey('1.0.0', EXPERIMENTS))).toBe(2);
  });

  it('reports tables the manifest does not list', async () => {
    const error = expectErr(await tableStore().load(checkedManifest('1.0.0'), 'ophys_cells_table'), 'unknown');
    expect(error).toMatchObject({ _tag: 'NotFound', resource: 'table', id: 'ophys_cells_table', version: '1.0.0' });
  });

  it('reports the cell that fails to decode', async () => {
    const broken = 'ophys_experiment_id,ophys_container_id,file_id\n42,[900],1001\n43,"[900",1002';
    const wire = buildManifest('1.0.0');
    const checked = checkedManifest('1.0.0', {
      ...wire,
      metadata_files: {
        ...wire.metadata_files,
        [EXPERIMENTS]: { url: `s3://visual-behavior-ophys-data/${tableKey('1.0.0', EXPERIMENTS)}`, file_hash: sha256Hex(broken) },
      },
    });
    store.put(tableKey('1.0.0', EXPERIMENTS), broken);

    const error = expectErr(await tableStore().load(checked, EXPERIMENTS), 'decode');

    expect(error).toMatchObject({
      _tag: 'DecodeFailed',
      table: EXPERIMENTS,
      column: 'ophys_container_id',
      row: 1,
      cell: '[900',
    });
  });

  it('loads several tables together', async () => {
    const loaded = expectOk(
      await tableStore().loadMany(checkedManifest('1.0.0'), ['ophys_session_table', 'behavior_session_table']),
      'many'
    );

    expect([...loaded.keys()]).toEqual(['ophys_session_table', 'behavior_session_table']);
    expect(loaded.get('ophys_session_table')?.rows[0]?.['ophys_experiment_id']).toEqual([42, 43]);
  });
});
