import type { Manifest, ManifestFileEntry } from './manifest.js';

export interface EntrySetDiff {
  readonly added: readonly string[];
  readonly removed: readonly string[];
  /** Present in both, with a different key, object version or digest. */
  readonly changed: readonly string[];
}

export interface ManifestDiff {
  readonly from: string;
  readonly to: string;
  readonly metadataFiles: EntrySetDiff;
  readonly dataFiles: EntrySetDiff;
  readonly pipelineChanged: boolean;
}

function sameEntry(a: ManifestFileEntry, b: ManifestFileEntry): boolean {
  return a.key === b.key && a.versionId === b.versionId && a.sha256 === b.sha256;
}

function diffEntries(
  before: ReadonlyMap<string, ManifestFileEntry>,
  after: ReadonlyMap<string, ManifestFileEntry>
): EntrySetDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];

  for (const [name, entry] of after) {
    const prior = before.get(name);
    if (prior === undefined) added.push(name);
    else if (!sameEntry(prior, entry)) changed.push(name);
  }
  for (const name of before.keys()) {
    if (!after.has(name)) removed.push(name);
  }

  const byName = (a: string, b: string) => a.localeCompare(b, 'en', { numeric: true });
  return { added: added.sort(byName), removed: removed.sort(byName), changed: changed.sort(byName) };
}

function pipelineKey(manifest: Manifest): string {
  return manifest.pipeline.map((p) => `${p.name}@${p.version}`).sort().join(',');
}

export function compareManifests(from: Manifest, to: Manifest): ManifestDiff {
  return {
    from: from.version,
    to: to.version,
    metadataFiles: diffEntries(from.metadataFiles, to.metadataFiles),
    dataFiles: diffEntries(from.dataFiles, to.dataFiles),
    pipelineChanged: pipelineKey(from) !== pipelineKey(to),
  };
}

export function isEmptyDiff(diff: ManifestDiff): boolean {
  const empty = (d: EntrySetDiff) => d.added.length === 0 && d.removed.length === 0 && d.changed.length === 0;
  return empty(diff.metadataFiles) && empty(diff.dataFiles) && !diff.pipelineChanged;
}

/**
 * Human summary, one line per non-empty category.
 */
export function describeManifestDiff(diff: ManifestDiff): string {
  if (isEmptyDiff(diff)) return `No changes between ${diff.from} and ${diff.to}`;

  const lines = [`Changes from ${diff.from} to ${diff.to}:`];
  const section = (label: string, d: EntrySetDiff) => {
    if (d.added.length > 0) lines.push(`  ${label} added: ${d.added.join(', ')}`);
    if (d.removed.length > 0) lines.push(`  ${label} removed: ${d.removed.join(', ')}`);
    if (d.changed.length > 0) lines.push(`  ${label} changed: ${d.changed.join(', ')}`);
  };
  section('metadata files', diff.metadataFiles);
  section('data files', diff.dataFiles);
  if (diff.pipelineChanged) lines.push('  producing pipeline version changed');
  return lines.join('\n');
}
