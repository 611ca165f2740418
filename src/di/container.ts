import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { ResultAsync } from 'neverthrow';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import { SyncFallbackRegistry } from '../runtime/sync-fallback-registry.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory, Logger, LogLevel } from '../core/logging/index.js';
import { PinoLoggerFactory, resolveLogLevel } from '../core/logging/index.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { LocalFileLock } from '../infra/local/file-lock/index.js';
import { TarArchiveExtractor } from '../infra/local/archive-extractor/index.js';
import { TcpPortProbe } from '../infra/local/tcp-port-probe/index.js';
import { NodeShipRuntime } from '../infra/local/ship-runtime/index.js';
import { FetchLensClient } from '../infra/local/lens-client/index.js';
import { NodeRandomEntropy, NodeSha256 } from '../infra/local/node-crypto/index.js';
import { PierIdFactory } from '../infra/local/id-factory/index.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { FileLockPort } from '../ports/file-lock.port.js';
import type { ArchiveExtractorPort } from '../ports/archive-extractor.port.js';
import type { PortProbePort } from '../ports/port-probe.port.js';
import type { ShipRuntimePort } from '../ports/ship-runtime.port.js';
import type { LensClientPort } from '../ports/lens-client.port.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import { Harbor } from '../domain/harbor.js';
import type { HarborError } from '../domain/harbor.js';
import type { PierContext, PierIdSource } from '../domain/pier-context.js';
import { PortIssuer } from '../domain/port-issuer.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Single source of truth for runtime inference.
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env.VITEST || process.env.NODE_ENV === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

function defaultLogLevel(mode: RuntimeMode): LogLevel {
  switch (mode.kind) {
    case 'test':
      return 'silent';
    case 'cli':
    case 'production':
      return 'info';
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

function registerRuntime(options: ContainerInitOptions = {}): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  const policy = toProcessLifecyclePolicy(mode);

  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  // Shutdown event bus is always available (even in tests) but only used when something emits.
  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });

  if (!container.isRegistered(DI.Logging.Level)) {
    container.register<LogLevel>(DI.Logging.Level, { useValue: resolveLogLevel(process.env, defaultLogLevel(mode)) });
  }
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): ConfigInvalidError | null {
  // Tests inject config explicitly before initialization; don't overwrite it.
  if (container.isRegistered(DI.Config.App)) return null;

  const configResult = loadConfig({ env: process.env });
  if (configResult.isErr()) return configResult.error;

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function logger(c: DependencyContainer, component: string): Logger {
  return c.resolve<ILoggerFactory>(DI.Logging.Factory).create(component);
}

function registerIfMissing<T>(token: symbol, factory: (c: DependencyContainer) => T): void {
  // Tests override individual adapters (ship runtime, port probe, entropy) before init.
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory(factory) });
}

function registerInfra(): void {
  // Level 1: primitives (no dependencies)
  registerIfMissing<FileSystemPort>(DI.Infra.FileSystem, () => new NodeFileSystem());
  registerIfMissing<Sha256Port>(DI.Infra.Sha256, () => new NodeSha256());
  registerIfMissing<RandomEntropyPort>(DI.Infra.RandomEntropy, () => new NodeRandomEntropy());
  registerIfMissing<PortProbePort>(DI.Infra.PortProbe, () => new TcpPortProbe());
  registerIfMissing<SyncFallbackRegistry>(
    DI.Infra.SyncFallbacks,
    (c) => new SyncFallbackRegistry(logger(c, 'SyncFallbacks'), c.resolve<ProcessSignals>(DI.Runtime.ProcessSignals))
  );

  // Level 2: adapters over primitives
  registerIfMissing<PierIdSource>(
    DI.Infra.PierIds,
    (c) => new PierIdFactory(c.resolve<RandomEntropyPort>(DI.Infra.RandomEntropy))
  );
  registerIfMissing<FileLockPort>(DI.Infra.FileLock, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new LocalFileLock(
      c.resolve<FileSystemPort>(DI.Infra.FileSystem),
      c.resolve<SyncFallbackRegistry>(DI.Infra.SyncFallbacks),
      logger(c, 'FileLock'),
      { pollMs: config.lock.pollMs }
    );
  });
  registerIfMissing<ArchiveExtractorPort>(
    DI.Infra.ArchiveExtractor,
    (c) => new TarArchiveExtractor(c.resolve<FileSystemPort>(DI.Infra.FileSystem), logger(c, 'ArchiveExtractor'))
  );
  registerIfMissing<ShipRuntimePort>(DI.Infra.ShipRuntime, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new NodeShipRuntime(
      {
        binary: config.runtime.binary,
        binaryDir: config.runtime.binaryDir,
        bootTimeoutMs: config.runtime.bootTimeoutMs,
      },
      c.resolve<FileSystemPort>(DI.Infra.FileSystem),
      logger(c, 'ShipRuntime')
    );
  });
  registerIfMissing<LensClientPort>(DI.Infra.LensClient, (c) => new FetchLensClient(logger(c, 'LensClient')));
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent.
 *
 * Returns the config error instead of exiting; the composition root decides what to do
 * with it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): ConfigInvalidError | null {
  if (initialized) return null;

  registerRuntime(options);
  const configError = registerConfig();
  if (configError !== null) return configError;
  registerInfra();

  initialized = true;
  return null;
}

/**
 * Opens the configured harbor and bundles everything pier operations need.
 */
export function buildPierContext(c: DependencyContainer = container): ResultAsync<PierContext, HarborError> {
  const config = c.resolve<ValidatedConfig>(DI.Config.App);
  const fs = c.resolve<FileSystemPort>(DI.Infra.FileSystem);

  return Harbor.open(config.harbor.root, fs).map(
    (harbor): PierContext => ({
      harbor,
      fs,
      fileLock: c.resolve<FileLockPort>(DI.Infra.FileLock),
      extractor: c.resolve<ArchiveExtractorPort>(DI.Infra.ArchiveExtractor),
      runtime: c.resolve<ShipRuntimePort>(DI.Infra.ShipRuntime),
      lens: c.resolve<LensClientPort>(DI.Infra.LensClient),
      sha256: c.resolve<Sha256Port>(DI.Infra.Sha256),
      ids: c.resolve<PierIdSource>(DI.Infra.PierIds),
      fallbacks: c.resolve<SyncFallbackRegistry>(DI.Infra.SyncFallbacks),
      logger: logger(c, 'Pier'),
    })
  );
}

/**
 * Fresh issuers over the configured ranges. One pair per process; each issuer hands out
 * every port at most once.
 */
export function createPortIssuers(c: DependencyContainer = container): { service: PortIssuer; peer: PortIssuer } {
  const config = c.resolve<ValidatedConfig>(DI.Config.App);
  const probe = c.resolve<PortProbePort>(DI.Infra.PortProbe);
  return {
    service: new PortIssuer(config.ports.service, probe),
    peer: new PortIssuer(config.ports.peer, probe),
  };
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
