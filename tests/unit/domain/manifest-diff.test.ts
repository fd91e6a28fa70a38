import { describe, it, expect } from 'vitest';
import { parseManifest } from '../../../src/domain/manifest.js';
import { compareManifests, describeManifestDiff, isEmptyDiff } from '../../../src/domain/manifest-diff.js';
import { expectOk } from '../../helpers/result-helpers.js';
import { buildManifest, PROJECT, type ManifestOverrides } from '../../helpers/release-fixture.js';

function manifest(version: string, overrides: ManifestOverrides = {}) {
  return expectOk(parseManifest(JSON.stringify(buildManifest(version, overrides)), { project: PROJECT, version }), version);
}

describe('compareManifests', () => {
  it('lists added, removed and changed files', () => {
    const before = manifest('1.0.0', { dropDataFiles: ['1003'] });
    const after = manifest('1.0.1', { dropDataFiles: ['1001'], artifactBodies: { '1002': 'reprocessed' } });

    const diff = compareManifests(before, after);

    expect(diff.dataFiles).toEqual({ added: ['1003'], removed: ['1001'], changed: ['1002'] });
    // table keys embed the version
    expect(diff.metadataFiles.changed).toEqual(['behavior_session_table', 'ophys_experiment_table', 'ophys_session_table']);
    expect(diff.pipelineChanged).toBe(false);
  });

  it('flags a new producing pipeline version', () => {
    const diff = compareManifests(manifest('1.0.0'), manifest('1.0.0', { pipelineVersion: '2.9.0' }));
    expect(diff.pipelineChanged).toBe(true);
    expect(isEmptyDiff(diff)).toBe(false);
  });
});

describe('describeManifestDiff', () => {
  it('says so when nothing changed', () => {
    const diff = compareManifests(manifest('1.0.0'), manifest('1.0.0'));
    expect(isEmptyDiff(diff)).toBe(true);
    expect(describeManifestDiff(diff)).toBe('No changes between 1.0.0 and 1.0.0');
  });

  it('renders one line per non-empty category', () => {
    const before = manifest('1.0.0');
    const after = manifest('1.0.0', { dropDataFiles: ['1002'], pipelineVersion: '2.9.0' });
    expect(describeManifestDiff(compareManifests(before, after))).toBe(
      ['Changes from 1.0.0 to 1.0.0:', '  data files removed: 1002', '  producing pipeline version changed'].join('\n')
    );
  });
});
