/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by concern, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under the appropriate namespace
 * 2. Register it in container.ts (instanceCachingFactory for singletons)
 * 3. Resolve it through the token, never through the class
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE (adapters behind ports)
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    FileSystem: Symbol('Infra.FileSystem'),
    FileLock: Symbol('Infra.FileLock'),
    ArchiveExtractor: Symbol('Infra.ArchiveExtractor'),
    PortProbe: Symbol('Infra.PortProbe'),
    ShipRuntime: Symbol('Infra.ShipRuntime'),
    LensClient: Symbol('Infra.LensClient'),
    Sha256: Symbol('Infra.Sha256'),
    RandomEntropy: Symbol('Infra.RandomEntropy'),
    /** Mints pier ids from RandomEntropy */
    PierIds: Symbol('Infra.PierIds'),
    /** Blocking cleanup for handles dropped without finalize/release */
    SyncFallbacks: Symbol('Infra.SyncFallbacks'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** Level for the root logger, decided by runtime mode and env */
    Level: Symbol('Logging.Level'),
    /** Component logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Runtime mode (production/test/cli) */
    Mode: Symbol('Runtime.Mode'),
    /** Process lifecycle policy (signal handling, etc) */
    ProcessLifecyclePolicy: Symbol('Runtime.ProcessLifecyclePolicy'),
    /** Process signal registration port */
    ProcessSignals: Symbol('Runtime.ProcessSignals'),
    /** Shutdown request event bus */
    ShutdownEvents: Symbol('Runtime.ShutdownEvents'),
    /** Process terminator (composition roots only) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated). */
    App: Symbol('Config.App'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
