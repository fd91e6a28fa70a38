/**
 * Versions Command
 *
 * Lists published releases of the open project, oldest first.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, cacheFailure } from '../types/cli-result.js';
import type { ProjectCache } from '../../cache/project-cache.js';

export type VersionsCommandDeps = Pick<ProjectCache, 'project' | 'version' | 'listVersions'>;

export async function executeVersionsCommand(deps: VersionsCommandDeps): Promise<CliResult> {
  const listed = await deps.listVersions();
  if (listed.isErr()) return cacheFailure(listed.error);

  const details = listed.value.map((v) => (v === deps.version ? `${v} (open)` : v));
  return success({
    message: `${listed.value.length} published versions of ${deps.project}`,
    details,
  });
}
