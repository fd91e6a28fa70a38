/**
 * Pure parsing of CLI flags into library options.
 */

import { ok, err, type Result } from 'neverthrow';
import semver from 'semver';
import type { RecordId } from '../domain/ids.js';
import { isValidFileId } from '../domain/ids.js';
import type { VersionSelection } from '../cache/project-cache.js';

export interface GlobalFlags {
  readonly project?: string;
  readonly release?: string;
  readonly select?: string;
  readonly cacheDir?: string;
  readonly verify?: string;
}

const SELECTION_MODES = ['latest', 'last_used', 'latest_downloaded'] as const;
type SelectionMode = (typeof SELECTION_MODES)[number];

function isSelectionMode(value: string): value is SelectionMode {
  return SELECTION_MODES.some((mode) => mode === value);
}

/**
 * `--release` pins a version and wins over `--select`.
 */
export function parseSelection(flags: GlobalFlags): Result<VersionSelection, string> {
  if (flags.release !== undefined) {
    return parseVersion(flags.release, '--release').map((version): VersionSelection => ({ kind: 'pinned', version }));
  }
  const mode = flags.select ?? 'latest';
  if (!isSelectionMode(mode)) return err(`--select must be one of ${SELECTION_MODES.join(', ')}, got "${mode}"`);
  return ok<VersionSelection, string>({ kind: mode });
}

export function parseVersion(text: string, label: string): Result<string, string> {
  return semver.valid(text) === null ? err(`${label} must be a semantic version, got "${text}"`) : ok(text);
}

export function parseRecordId(text: string): Result<RecordId, string> {
  if (!/^\d+$/.test(text)) return err(`record id must be a non-negative integer, got "${text}"`);
  const id = Number(text);
  return Number.isSafeInteger(id) ? ok(id) : err(`record id ${text} is out of range`);
}

export function parseFileId(text: string): Result<string, string> {
  return isValidFileId(text) ? ok(text) : err(`"${text}" is not a valid file id`);
}

/**
 * Overlay flag values on the environment so config validation sees them.
 */
export function cliEnv(
  flags: GlobalFlags,
  env: Record<string, string | undefined>
): Record<string, string | undefined> {
  return {
    ...env,
    ...(flags.project !== undefined ? { OPHYS_CACHE_PROJECT: flags.project } : {}),
    ...(flags.cacheDir !== undefined ? { OPHYS_CACHE_DIR: flags.cacheDir } : {}),
    ...(flags.verify !== undefined ? { OPHYS_CACHE_VERIFY: flags.verify } : {}),
  };
}
