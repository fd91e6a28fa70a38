/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized by layer, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register it in container.ts (skip when a test registered its own)
 * 3. Resolve with c.resolve<Port>(DI.X.Y)
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
    /** Version compatibility table (file or embedded default). */
    Compatibility: Symbol('Config.Compatibility'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE (ports -> adapters)
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    FileSystem: Symbol('Infra.FileSystem'),
    Digest: Symbol('Infra.Digest'),
    TimeClock: Symbol('Infra.TimeClock'),
    CacheLayout: Symbol('Infra.CacheLayout'),
    ArtifactLock: Symbol('Infra.ArtifactLock'),
    /** Remote release store (S3 unless a test registered another) */
    ObjectStore: Symbol('Infra.ObjectStore'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CACHE
  // ═══════════════════════════════════════════════════════════════════
  Cache: {
    /** Ports bundle handed to ProjectCache.open */
    Deps: Symbol('Cache.Deps'),
  },
} as const;
