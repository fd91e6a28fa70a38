/**
 * Path Command
 *
 * Ensures a record's artifact is cached and prints its local path.
 */

import type { CliResult } from '../types/cli-result.js';
import { successMessage, misuse, cacheFailure } from '../types/cli-result.js';
import { parseRecordId } from '../arguments.js';
import type { ProjectCache } from '../../cache/project-cache.js';

export type PathCommandDeps = Pick<ProjectCache, 'getArtifactPath'>;

export async function executePathCommand(
  deps: PathCommandDeps,
  recordType: string,
  recordIdText: string
): Promise<CliResult> {
  const recordId = parseRecordId(recordIdText);
  if (recordId.isErr()) return misuse(recordId.error);

  const resolved = await deps.getArtifactPath(recordType, recordId.value);
  return resolved.match(successMessage, cacheFailure);
}
