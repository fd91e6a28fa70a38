/**
 * Info Command
 *
 * Summary of the open release: compatibility, record types, tables.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { formatKeyValues } from '../output-formatter.js';
import type { ProjectCache } from '../../cache/project-cache.js';
import type { CompatibilityOutcome } from '../../domain/version-compatibility.js';

export type InfoCommandDeps = Pick<
  ProjectCache,
  'project' | 'version' | 'compatibility' | 'recordTypes' | 'tableNames'
>;

function describeCompatibility(outcome: CompatibilityOutcome): string {
  return outcome.kind === 'verified'
    ? `pipeline ${outcome.pipelineVersion}, client range [${outcome.range[0]}, ${outcome.range[1]})`
    : `not checked (${outcome.reason})`;
}

export function executeInfoCommand(deps: InfoCommandDeps): CliResult {
  const outcome = deps.compatibility;
  return success({
    message: `${deps.project}@${deps.version}`,
    details: formatKeyValues([
      ['compatibility', describeCompatibility(outcome)],
      ['record types', deps.recordTypes.join(', ')],
      ['tables', deps.tableNames().join(', ')],
    ]),
    warnings: outcome.kind === 'skipped' ? ['Version compatibility was not verified for this release'] : undefined,
  });
}
