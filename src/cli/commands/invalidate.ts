/**
 * Invalidate Command
 *
 * Drops the local copy of one artifact so the next read downloads it again.
 */

import type { CliResult } from '../types/cli-result.js';
import { successMessage, misuse, cacheFailure } from '../types/cli-result.js';
import { parseFileId } from '../arguments.js';
import type { ProjectCache } from '../../cache/project-cache.js';

export type InvalidateCommandDeps = Pick<ProjectCache, 'invalidate'>;

export async function executeInvalidateCommand(deps: InvalidateCommandDeps, fileIdText: string): Promise<CliResult> {
  const fileId = parseFileId(fileIdText);
  if (fileId.isErr()) return misuse(fileId.error);

  const removed = await deps.invalidate(fileId.value);
  return removed.match(
    (wasCached) => successMessage(wasCached ? `Removed cached copy of ${fileId.value}` : `${fileId.value} was not cached`),
    cacheFailure
  );
}
