import * as path from 'path';
import type { CacheLayoutPort } from '../../../ports/cache-layout.port.js';

export const LAST_USED_MANIFEST_FILE = '_manifest_last_used.txt';
export const ENTRY_FILE = 'entry.json';

export class LocalCacheLayout implements CacheLayoutPort {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  root(): string {
    return this.rootDir;
  }

  private projectDir(project: string): string {
    return path.join(this.rootDir, project);
  }

  manifestsDir(project: string): string {
    return path.join(this.projectDir(project), 'manifests');
  }

  manifestPath(project: string, version: string): string {
    return path.join(this.manifestsDir(project), `${version}.json`);
  }

  lastUsedManifestPath(project: string): string {
    return path.join(this.projectDir(project), LAST_USED_MANIFEST_FILE);
  }

  metadataDir(project: string, version: string): string {
    return path.join(this.projectDir(project), 'metadata', version);
  }

  metadataPath(project: string, version: string, table: string): string {
    return path.join(this.metadataDir(project, version), `${table}.csv`);
  }

  artifactDir(project: string, fileId: string): string {
    return path.join(this.projectDir(project), 'data', fileId);
  }

  artifactPath(project: string, fileId: string, basename: string): string {
    return path.join(this.artifactDir(project, fileId), basename);
  }

  entryPath(project: string, fileId: string): string {
    return path.join(this.artifactDir(project, fileId), ENTRY_FILE);
  }

  locksDir(project: string): string {
    return path.join(this.projectDir(project), 'locks');
  }

  lockPath(project: string, fileId: string): string {
    return path.join(this.locksDir(project), `${fileId}.lock`);
  }

  tmpDir(project: string): string {
    return path.join(this.projectDir(project), 'tmp');
  }
}
