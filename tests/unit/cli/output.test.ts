import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { formatKeyValues, formatOutput, formatResult } from '../../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import { cacheFailure, misuse, successMessage } from '../../../src/cli/types/cli-result.js';
import { exitCodeForError, toNumericExitCode, toProcessExit } from '../../../src/cli/types/exit-code.js';
import { Err } from '../../../src/core/errors/factories.js';
import { RecordingProcessTerminator } from '../../fakes/process-terminator.fake.js';

describe('CLI output', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('exit codes', () => {
    it('maps error tags to exit classes', () => {
      expect(exitCodeForError(Err.notFound('version', 'visual-behavior', '9.9.9'))).toEqual({ kind: 'not_found' });
      expect(exitCodeForError(Err.artifactMissing('ophys_session', 'ophys_session_table', 9))).toEqual({
        kind: 'not_found',
      });
      expect(exitCodeForError(Err.configInvalid([{ path: 'OPHYS_CACHE_VERIFY', message: 'bad' }]))).toEqual({
        kind: 'misuse',
      });
      expect(exitCodeForError(Err.corruptCache('1001', '/cache/1001.nwb', 'digest mismatch'))).toEqual({
        kind: 'general_error',
      });
      expect(exitCodeForError(Err.downloadFailed('visual-behavior', '1001', 1, 'aborted', false))).toEqual({
        kind: 'unavailable',
      });
    });

    it('numbers each exit class', () => {
      expect(
        (['success', 'general_error', 'misuse', 'not_found', 'incompatible', 'unavailable'] as const).map((kind) =>
          toNumericExitCode({ kind })
        )
      ).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it('converts to a process exit', () => {
      expect(toProcessExit({ kind: 'success' })).toEqual({ kind: 'success' });
      expect(toProcessExit({ kind: 'incompatible' })).toEqual({ kind: 'failure', code: 4 });
    });
  });

  describe('formatting', () => {
    it('renders every section of a failure', () => {
      const text = formatOutput(
        { message: 'Cannot open', details: ['error: CacheIo'], warnings: ['stale lock'], suggestions: ['Check permissions'] },
        true
      );

      expect(text).toBe('✖ Cannot open\n  error: CacheIo\n\n⚠ stale lock\n\n→ Check permissions');
    });

    it('renders a bare success message', () => {
      expect(formatResult(successMessage('/cache/1001.nwb'))).toBe('/cache/1001.nwb');
      expect(formatResult({ kind: 'success' })).toBe('');
    });

    it('aligns key-value rows', () => {
      expect(formatKeyValues([['a', '1'], ['long', '2']])).toEqual(['a:    1', 'long: 2']);
    });
  });

  describe('interpretCliResult', () => {
    it('prints success to stdout and does not terminate', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const terminator = new RecordingProcessTerminator();

      interpretCliResult(successMessage('done'), terminator);

      expect(log).toHaveBeenCalledWith('done');
      expect(terminator.exits).toEqual([]);
    });

    it('prints failures to stderr and terminates with the mapped code', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const terminator = new RecordingProcessTerminator();

      expect(() => interpretCliResult(misuse('bad flag'), terminator)).toThrow('[ProcessTerminator] terminate(2)');

      expect(error).toHaveBeenCalledWith('✖ bad flag');
      expect(terminator.exits).toEqual([{ kind: 'failure', code: 2 }]);
    });

    it('terminates a cache failure with its hint on stderr', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const terminator = new RecordingProcessTerminator();
      const failure = cacheFailure(Err.notFound('project', 'visual-behavior', 'visual-behavior'));

      expect(() => interpretCliResult(failure, terminator)).toThrow('[ProcessTerminator] terminate(3)');

      expect(error).toHaveBeenCalledWith(
        '✖ Unknown project "visual-behavior" in visual-behavior\n  error: NotFound\n\n→ Check the project identifier "visual-behavior"'
      );
    });
  });
});
