import { describe, it, expect } from 'vitest';
import {
  buildRecordTypeRegistry,
  decodeArtifactLink,
  DEFAULT_RECORD_TYPES,
  tableNormalizers,
  type RecordTypeSpec,
} from '../../../src/domain/record-types.js';
import { fileIdFromCell } from '../../../src/domain/ids.js';
import type { MetadataTable } from '../../../src/domain/metadata-table.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

const experiment: RecordTypeSpec = { name: 'ophys_experiment', table: 'ophys_experiment_table', idColumn: 'ophys_experiment_id' };
const session: RecordTypeSpec = {
  name: 'ophys_session',
  table: 'ophys_session_table',
  idColumn: 'ophys_session_id',
  indirection: { referenceColumn: 'ophys_experiment_id', targetRecordType: 'ophys_experiment' },
};

describe('fileIdFromCell', () => {
  it.each([
    [1001, '1001'],
    [' abc.nwb ', 'abc.nwb'],
    [12.5, null],
    ['', null],
    ['a/b', null],
    [null, null],
  ])('%j -> %j', (cell, expected) => {
    expect(fileIdFromCell(cell)).toBe(expected);
  });
});

describe('decodeArtifactLink', () => {
  it('prefers a file id carried by the row', () => {
    expect(decodeArtifactLink({ file_id: 1001, ophys_experiment_id: [1] }, session, 'file_id')).toEqual({
      kind: 'direct',
      fileId: '1001',
    });
  });

  it('keeps references in their listed order', () => {
    expect(decodeArtifactLink({ file_id: null, ophys_experiment_id: [43, 42] }, session, 'file_id')).toEqual({
      kind: 'indirect',
      refs: [
        { recordType: 'ophys_experiment', recordId: 43 },
        { recordType: 'ophys_experiment', recordId: 42 },
      ],
    });
  });

  it('accepts a single integer reference', () => {
    expect(decodeArtifactLink({ ophys_experiment_id: 42 }, session, 'file_id')).toEqual({
      kind: 'indirect',
      refs: [{ recordType: 'ophys_experiment', recordId: 42 }],
    });
  });

  it('yields none for an empty reference list or a type without indirection', () => {
    expect(decodeArtifactLink({ ophys_experiment_id: [] }, session, 'file_id')).toEqual({ kind: 'none' });
    expect(decodeArtifactLink({ file_id: null }, experiment, 'file_id')).toEqual({ kind: 'none' });
  });
});

describe('buildRecordTypeRegistry', () => {
  it('indexes the default record types', () => {
    const registry = expectOk(buildRecordTypeRegistry(DEFAULT_RECORD_TYPES), 'defaults');
    expect([...registry.keys()]).toEqual(['ophys_experiment', 'behavior_session', 'ophys_session']);
  });

  it('rejects duplicate names', () => {
    const error = expectErr(buildRecordTypeRegistry([experiment, experiment]), 'duplicate');
    expect(error).toMatchObject({ _tag: 'ConfigInvalid', issues: [{ path: 'recordTypes.ophys_experiment', message: 'declared more than once' }] });
  });

  it('rejects unknown indirection targets', () => {
    const error = expectErr(buildRecordTypeRegistry([session]), 'unknown target');
    expect(error._tag).toBe('ConfigInvalid');
  });

  it('rejects chained indirection', () => {
    const container: RecordTypeSpec = {
      name: 'ophys_container',
      table: 'ophys_container_table',
      idColumn: 'ophys_container_id',
      indirection: { referenceColumn: 'ophys_session_id', targetRecordType: 'ophys_session' },
    };
    const error = expectErr(buildRecordTypeRegistry([experiment, session, container]), 'chained');
    expect(error).toMatchObject({ _tag: 'IndirectionUnsupported', recordType: 'ophys_container' });
  });
});

describe('tableNormalizers', () => {
  it('runs each type\'s normaliser then drops its suppressed columns', () => {
    const spec: RecordTypeSpec = {
      ...experiment,
      normalize: (t) => ({ ...t, rows: t.rows.map((r) => ({ ...r, tagged: true })), columns: [...t.columns, 'tagged'] }),
      suppress: ['file_id'],
    };
    const input: MetadataTable = {
      name: 'ophys_experiment_table',
      project: 'p',
      version: '1.0.0',
      columns: ['ophys_experiment_id', 'file_id'],
      rows: [{ ophys_experiment_id: 1, file_id: 10 }],
    };
    const normalize = tableNormalizers([spec]).get('ophys_experiment_table');
    expect(normalize?.(input)).toEqual({ ...input, columns: ['ophys_experiment_id', 'tagged'], rows: [{ ophys_experiment_id: 1, tagged: true }] });
  });
});
