/**
 * Release layout shared by every object store adapter:
 * `<project>/manifests/<project>_manifest_v<version>.json`
 */
export function manifestsPrefix(project: string): string {
  return `${project}/manifests/`;
}

export function manifestKey(project: string, version: string): string {
  return `${manifestsPrefix(project)}${project}_manifest_v${version}.json`;
}

/**
 * Version encoded in a manifest object name, or null for unrelated objects.
 * Accepts a bare name or a full key.
 */
export function versionFromManifestKey(project: string, key: string): string | null {
  const name = key.slice(key.lastIndexOf('/') + 1);
  const prefix = `${project}_manifest_v`;
  if (!name.startsWith(prefix) || !name.endsWith('.json')) return null;
  const version = name.slice(prefix.length, -'.json'.length);
  return version.length > 0 ? version : null;
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'RequestAbortedError');
}
