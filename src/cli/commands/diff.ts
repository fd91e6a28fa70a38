/**
 * Diff Command
 *
 * Compares the open release with another published version.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, misuse, cacheFailure } from '../types/cli-result.js';
import { parseVersion } from '../arguments.js';
import type { ProjectCache } from '../../cache/project-cache.js';
import { describeManifestDiff } from '../../domain/manifest-diff.js';

export type DiffCommandDeps = Pick<ProjectCache, 'compareWith'>;

export async function executeDiffCommand(deps: DiffCommandDeps, version: string): Promise<CliResult> {
  const target = parseVersion(version, 'version');
  if (target.isErr()) return misuse(target.error);

  const diff = await deps.compareWith(target.value);
  if (diff.isErr()) return cacheFailure(diff.error);

  const [headline = '', ...details] = describeManifestDiff(diff.value).split('\n');
  return success({ message: headline, details: details.map((line) => line.trim()) });
}
