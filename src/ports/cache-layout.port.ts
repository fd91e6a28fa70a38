/**
 * Port: local cache directory layout (canonical paths).
 *
 * Layout, per project:
 * - <root>/<project>/manifests/<version>.json
 * - <root>/<project>/_manifest_last_used.txt
 * - <root>/<project>/metadata/<version>/<table>.csv
 * - <root>/<project>/data/<fileId>/<basename>
 * - <root>/<project>/data/<fileId>/entry.json
 * - <root>/<project>/locks/<fileId>.lock
 * - <root>/<project>/tmp/
 *
 * Guarantees:
 * - All returned paths are absolute
 * - Callers never string-concatenate cache paths
 * - Stable across processes sharing the same root
 */
export interface CacheLayoutPort {
  root(): string;

  manifestsDir(project: string): string;
  manifestPath(project: string, version: string): string;
  lastUsedManifestPath(project: string): string;

  metadataDir(project: string, version: string): string;
  metadataPath(project: string, version: string, table: string): string;

  artifactDir(project: string, fileId: string): string;
  artifactPath(project: string, fileId: string, basename: string): string;
  entryPath(project: string, fileId: string): string;

  locksDir(project: string): string;
  lockPath(project: string, fileId: string): string;

  tmpDir(project: string): string;
}
