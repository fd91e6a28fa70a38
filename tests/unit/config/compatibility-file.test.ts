import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadCompatibilityTable } from '../../../src/config/compatibility-file.js';
import { DEFAULT_COMPATIBILITY } from '../../../src/domain/version-compatibility.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('loadCompatibilityTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'compat-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('falls back to the embedded table', async () => {
    expect(expectOk(await loadCompatibilityTable(undefined), 'default')).toBe(DEFAULT_COMPATIBILITY);
  });

  it('reads the wire form from disk', async () => {
    const file = path.join(dir, 'compat.json');
    await fs.writeFile(file, JSON.stringify({ pipeline_versions: { '3.0.0': { 'ophys-cloud-cache': ['3.0.0', '4.0.0'] } } }));

    const table = expectOk(await loadCompatibilityTable(file), 'file');
    expect(table.pipelineVersions).toEqual({ '3.0.0': { 'ophys-cloud-cache': ['3.0.0', '4.0.0'] } });
  });

  it('reports malformed JSON as configuration', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ pipeline_versions');

    const error = expectErr(await loadCompatibilityTable(file), 'broken');
    expect(error._tag).toBe('ConfigInvalid');
    if (error._tag !== 'ConfigInvalid') return;
    expect(error.issues[0]?.path).toBe('OPHYS_CACHE_COMPATIBILITY_FILE');
    expect(error.issues[0]?.message.startsWith(`${file} is not valid JSON: `)).toBe(true);
  });

  it('reports ranges that are not versions', async () => {
    const file = path.join(dir, 'bad-range.json');
    await fs.writeFile(file, JSON.stringify({ pipeline_versions: { '3.0.0': { consumer: ['three', '4.0.0'] } } }));

    const error = expectErr(await loadCompatibilityTable(file), 'range');
    expect(error._tag).toBe('ConfigInvalid');
    if (error._tag !== 'ConfigInvalid') return;
    expect(error.issues).toEqual([
      { path: 'compatibility.pipeline_versions.3.0.0.consumer.0', message: 'not a semantic version' },
    ]);
  });

  it('reports a missing file as cache I/O', async () => {
    const file = path.join(dir, 'absent.json');
    const error = expectErr(await loadCompatibilityTable(file), 'absent');
    expect(error).toMatchObject({ _tag: 'CacheIo', path: file, operation: 'read' });
  });
});
