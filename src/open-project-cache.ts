import type { ResultAsync } from 'neverthrow';
import { container, initializeContainer } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { CacheError } from './core/errors/cache-error.js';
import type { CompatibilityTable } from './domain/version-compatibility.js';
import type { ArtifactCacheOptions } from './cache/local-artifact-cache.js';
import { ProjectCache, type ProjectCacheDeps, type ProjectCacheOptions } from './cache/project-cache.js';

export type OpenProjectCacheOptions = Partial<ProjectCacheOptions>;

export function artifactOptionsFrom(config: ValidatedConfig): ArtifactCacheOptions {
  return {
    verify: config.cache.verify,
    lockWaitMs: config.cache.lockWaitMs,
    retry: { retries: config.download.retries, baseDelayMs: config.download.retryBaseDelayMs },
  };
}

/**
 * Composition root for library users: builds the container from the
 * environment and opens the configured project.
 *
 * ```typescript
 * const cache = await openProjectCache({ version: { kind: 'pinned', version: '1.0.3' } });
 * if (cache.isOk()) {
 *   const nwb = await cache.value.getArtifactPath('ophys_experiment', 951980471);
 * }
 * ```
 */
export function openProjectCache(options: OpenProjectCacheOptions = {}): ResultAsync<ProjectCache, CacheError> {
  return initializeContainer().andThen(() => {
    const config = container.resolve<ValidatedConfig>(DI.Config.App);
    return ProjectCache.open(container.resolve<ProjectCacheDeps>(DI.Cache.Deps), {
      compatibility: container.resolve<CompatibilityTable>(DI.Config.Compatibility),
      ...options,
      project: options.project ?? config.project,
      artifacts: options.artifacts ?? artifactOptionsFrom(config),
    });
  });
}
