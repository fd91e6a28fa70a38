import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { ResultAsync, okAsync, errAsync, ok, err, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import { loadConfig, type ValidatedConfig } from '../config/app-config.js';
import { loadCompatibilityTable } from '../config/compatibility-file.js';
import type { CacheError } from '../core/errors/cache-error.js';
import { formatCacheError } from '../core/errors/formatter.js';
import { Err } from '../core/errors/factories.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import type { CompatibilityTable } from '../domain/version-compatibility.js';
import type { ArtifactLockPort } from '../ports/artifact-lock.port.js';
import type { CacheLayoutPort } from '../ports/cache-layout.port.js';
import type { DigestPort } from '../ports/digest.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { ObjectStorePort } from '../ports/object-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { NodeDigest } from '../infra/local/digest/index.js';
import { NodeTimeClock } from '../infra/local/time-clock/index.js';
import { LocalCacheLayout } from '../infra/local/cache-layout/index.js';
import { LocalArtifactLock } from '../infra/local/artifact-lock/index.js';
import type { ProjectCacheDeps } from '../cache/project-cache.js';

/** Delay between polls of a busy artifact lock. */
const LOCK_POLL_MS = 250;

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialization: Promise<Result<void, CacheError>> | null = null;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): ResultAsync<void, CacheError> {
  // Tests inject config explicitly before initialization; never overwrite it.
  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({ env: process.env });
    if (configResult.isErr()) {
      createBootstrapLogger('container').error({ issues: configResult.error.issues }, formatCacheError(configResult.error));
      return errAsync(configResult.error);
    }
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  if (container.isRegistered(DI.Config.Compatibility)) return okAsync(undefined);

  const config = container.resolve<ValidatedConfig>(DI.Config.App);
  return loadCompatibilityTable(config.compatibilityFile).map((table) => {
    container.register<CompatibilityTable>(DI.Config.Compatibility, { useValue: table });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;
  // @singleton() registers the class itself; the token delegates to it.
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

function registerIfMissing<T>(token: symbol, factory: (c: DependencyContainer) => T): void {
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
}

/**
 * Level 1: primitives (no deps). Level 2: layout and lock (config + level 1).
 * Level 3: the object store, imported lazily so the AWS SDK only loads when
 * it is actually used.
 */
async function registerInfra(): Promise<void> {
  registerIfMissing<FileSystemPort>(DI.Infra.FileSystem, () => new NodeFileSystem());
  registerIfMissing<DigestPort>(DI.Infra.Digest, () => new NodeDigest());
  registerIfMissing<TimeClockPort>(DI.Infra.TimeClock, () => new NodeTimeClock());

  registerIfMissing<CacheLayoutPort>(DI.Infra.CacheLayout, (c) =>
    new LocalCacheLayout(c.resolve<ValidatedConfig>(DI.Config.App).cache.rootDir)
  );
  registerIfMissing<ArtifactLockPort>(DI.Infra.ArtifactLock, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new LocalArtifactLock(
      c.resolve<CacheLayoutPort>(DI.Infra.CacheLayout),
      c.resolve<FileSystemPort>(DI.Infra.FileSystem),
      c.resolve<TimeClockPort>(DI.Infra.TimeClock),
      { staleAfterMs: config.cache.staleLockMs, pollMs: LOCK_POLL_MS },
      c.resolve<ILoggerFactory>(DI.Logging.Factory).create('ArtifactLock')
    );
  });

  if (!container.isRegistered(DI.Infra.ObjectStore)) {
    const { S3ObjectStore } = await import('../infra/s3/index.js');
    registerIfMissing<ObjectStorePort>(DI.Infra.ObjectStore, (c) =>
      new S3ObjectStore(
        c.resolve<ValidatedConfig>(DI.Config.App).remote,
        c.resolve<ILoggerFactory>(DI.Logging.Factory).create('S3ObjectStore')
      )
    );
  }

  registerIfMissing<ProjectCacheDeps>(DI.Cache.Deps, (c) => ({
    store: c.resolve<ObjectStorePort>(DI.Infra.ObjectStore),
    fs: c.resolve<FileSystemPort>(DI.Infra.FileSystem),
    layout: c.resolve<CacheLayoutPort>(DI.Infra.CacheLayout),
    digest: c.resolve<DigestPort>(DI.Infra.Digest),
    lock: c.resolve<ArtifactLockPort>(DI.Infra.ArtifactLock),
    clock: c.resolve<TimeClockPort>(DI.Infra.TimeClock),
    loggerFactory: c.resolve<ILoggerFactory>(DI.Logging.Factory),
  }));
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: config, logging, then infrastructure.
 *
 * Idempotent: concurrent and repeated calls share the first run. A failed
 * run is not retried; call resetContainer() first.
 */
export function initializeContainer(): ResultAsync<void, CacheError> {
  if (initialization === null) {
    const run = async (): Promise<Result<void, CacheError>> => {
      registerLogging();
      const configured = await registerConfig();
      if (configured.isErr()) return err(configured.error);
      const wired = await ResultAsync.fromPromise(registerInfra(), (e) =>
        Err.configInvalid([{ path: 'container', message: e instanceof Error ? e.message : String(e) }])
      );
      if (wired.isErr()) return err(wired.error);
      container.resolve<ILoggerFactory>(DI.Logging.Factory).create('container').debug('container initialized');
      return ok(undefined);
    };
    initialization = run();
  }
  return new ResultAsync(initialization);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialization = null;
}

// Export container for direct access when needed
export { container };
