import * as path from 'path';
import { err, errAsync, ok, okAsync, ResultAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { FileLockHandle } from '../ports/file-lock.port.js';
import type { ShipProcess, StartMode } from '../ports/ship-runtime.port.js';
import type { PierRef, PierZone } from './harbor.js';
import type { PierId, Sha256Digest, ShipName } from './ids.js';
import { formatShipName, parseShipName } from './ids.js';
import type { PendingBootMode } from './pending-boot-mode.js';
import type { PierContext } from './pier-context.js';
import { parsePierConfig } from './pier-config.js';
import type { PierConfig } from './pier-config.js';
import { PierErr } from './pier-error.js';
import type { PierError, PierOperation } from './pier-error.js';
import { pierLayout, SHIP_DATA_MARKER } from './pier-layout.js';
import type { PierLayout } from './pier-layout.js';
import { encodeConfig, PierRecord } from './pier-record.js';
import type { PortIssuer } from './port-issuer.js';
import { parseLensPort } from './ports-descriptor.js';
import { DEFAULT_RUNTIME_VERSION } from './runtime-version.js';
import type { RuntimeVersion } from './runtime-version.js';
import { Ship } from './ship.js';
import type { ShipPorts } from './ship.js';

export interface StageOptions {
  readonly runtimeVersion?: RuntimeVersion;
  /** When set, the upload is hashed and compared before anything is written. */
  readonly expectedSha256?: Sha256Digest;
}

type LockMode = 'try' | 'wait';

/**
 * A stopped pier and the lock that makes this process its only owner.
 *
 * Lifecycle:
 *   create (staging) -> launch -> Ship -> shutdown -> PierState -> releaseFromDryDock (live)
 *   any stopped PierState -> finalize
 *
 * Operations that hand the pier on (`launch` on success, `finalize`) consume the handle;
 * every later call fails with ILLEGAL_STATE_TRANSITION. One operation at a time.
 */
export class PierState {
  private consumed = false;
  private busy = false;

  private constructor(
    private readonly ctx: PierContext,
    private readonly record: PierRecord
  ) {}

  // ---------------------------------------------------------------------------
  // Constructors (staging zone)
  // ---------------------------------------------------------------------------

  /**
   * Stages a pier that will boot from `keyfile` as `name` on first launch.
   * The bytes are written as-is; they are never logged.
   */
  static fromKeyfile(
    ctx: PierContext,
    keyfile: Uint8Array,
    name: string,
    options: StageOptions = {}
  ): ResultAsync<PierState, PierError> {
    const shipName = parseShipName(name);
    if (shipName === null) return errAsync(PierErr.invalidShipName(name));

    return verifyChecksum(ctx, keyfile, options).asyncAndThen(() =>
      PierState.stage(ctx, { kind: 'keyfile', name: shipName }, shipName, options, (layout) =>
        ctx.fs
          .openExclusive(layout.keyfilePath, keyfile)
          .andThen(({ fd }) => ctx.fs.fsyncFile(fd).andThen(() => ctx.fs.closeFile(fd)))
          .map(() => false)
          .mapErr((e) => PierErr.io(e, 'could not write keyfile'))
      )
    );
  }

  /**
   * Stages a pier from an exported pier archive. The archive must contain exactly one
   * directory holding `.urb/`; that directory becomes `pier/`.
   */
  static fromArchive(ctx: PierContext, archive: Uint8Array, options: StageOptions = {}): ResultAsync<PierState, PierError> {
    return verifyChecksum(ctx, archive, options).asyncAndThen(() =>
      PierState.stage(ctx, { kind: 'extracted' }, null, options, (layout) => unpackArchive(ctx, layout, archive))
    );
  }

  /** Stages an empty pier that boots as a fresh comet. */
  static asComet(ctx: PierContext, options: StageOptions = {}): ResultAsync<PierState, PierError> {
    return PierState.stage(ctx, { kind: 'comet' }, null, options, () => okAsync(false));
  }

  private static stage(
    ctx: PierContext,
    pendingBootMode: PendingBootMode,
    name: ShipName | null,
    options: StageOptions,
    populate: (layout: PierLayout) => ResultAsync<boolean, PierError>
  ): ResultAsync<PierState, PierError> {
    const id = ctx.ids.mintPierId();
    const layout = pierLayout(ctx.harbor.pierDir({ zone: 'staging', id }));
    const runtimeVersion = options.runtimeVersion ?? DEFAULT_RUNTIME_VERSION;
    let held: FileLockHandle | null = null;

    const build = (): ResultAsync<PierRecord, PierError> =>
      ctx.fileLock
        .tryAcquire(layout.lockPath)
        .mapErr((e): PierError => e)
        .andThen((outcome) =>
          outcome.kind === 'acquired' ? okAsync(outcome.handle) : errAsync(PierErr.alreadyLocked(outcome.lockPath))
        )
        .andThen((lock) => {
          held = lock;
          return populate(layout).map((initialized) => ({ lock, initialized }));
        })
        .andThen(({ lock, initialized }) => {
          const config: PierConfig = { runtimeVersion, id, name };
          return ctx.fs
            .writeFileAtomic(layout.configPath, encodeConfig(config))
            .mapErr((e) => PierErr.io(e, 'could not write pier config'))
            .map(() =>
              PierRecord.open(
                {
                  id,
                  runtimeVersion,
                  zone: 'staging',
                  metaPath: layout.metaPath,
                  name,
                  initialized,
                  pendingBootMode,
                  lock,
                },
                ctx.fs,
                ctx.fallbacks
              )
            );
        })
        .orElse((e) => discardStaging(ctx, layout.metaPath, held).andThen(() => errAsync<PierRecord, PierError>(e)));

    return ctx.fs
      .mkdir(layout.metaPath)
      .mapErr((e) => PierErr.io(e, 'could not create staging directory'))
      .andThen(build)
      .map((record) => {
        ctx.logger.info({ pierId: id, pending: pendingBootMode.kind, initialized: record.initialized }, 'pier staged');
        return new PierState(ctx, record);
      });
  }

  // ---------------------------------------------------------------------------
  // Reattachment
  // ---------------------------------------------------------------------------

  /** Fails with PIER_ALREADY_LOCKED instead of waiting when another handle holds the pier. */
  static tryLoad(ctx: PierContext, ref: PierRef): ResultAsync<PierState, PierError> {
    return PierState.attach(ctx, ref, 'try');
  }

  /** Waits for the lock. There is no timeout. */
  static load(ctx: PierContext, ref: PierRef): ResultAsync<PierState, PierError> {
    return PierState.attach(ctx, ref, 'wait');
  }

  private static attach(ctx: PierContext, ref: PierRef, mode: LockMode): ResultAsync<PierState, PierError> {
    const layout = pierLayout(ctx.harbor.pierDir(ref));
    const key = ref.zone === 'staging' ? ref.id : ref.name;

    const lockPier = (): ResultAsync<FileLockHandle, PierError> =>
      mode === 'wait'
        ? ctx.fileLock.acquire(layout.lockPath)
        : ctx.fileLock
            .tryAcquire(layout.lockPath)
            .mapErr((e): PierError => e)
            .andThen((outcome) =>
              outcome.kind === 'acquired' ? okAsync(outcome.handle) : errAsync(PierErr.alreadyLocked(outcome.lockPath))
            );

    return ctx.fs
      .statKind(layout.metaPath)
      .mapErr((e) => (e.code === 'FS_NOT_FOUND' ? PierErr.notFound(ref.zone, key) : PierErr.io(e, 'could not inspect pier')))
      .andThen((kind) => (kind === 'directory' ? okAsync(undefined) : errAsync(PierErr.notFound(ref.zone, key))))
      .andThen(lockPier)
      .andThen((lock) =>
        inspectPier(ctx, layout, ref)
          .map((found) =>
            PierRecord.open(
              {
                id: found.config.id,
                runtimeVersion: found.config.runtimeVersion,
                zone: ref.zone,
                metaPath: layout.metaPath,
                name: found.config.name,
                initialized: found.initialized,
                pendingBootMode: found.pendingBootMode,
                lock,
              },
              ctx.fs,
              ctx.fallbacks
            )
          )
          .orElse((e) => releaseQuietly(ctx, lock).andThen(() => errAsync<PierRecord, PierError>(e)))
      )
      .map((record) => {
        ctx.logger.debug({ pierId: record.id, zone: record.zone }, 'pier loaded');
        return new PierState(ctx, record);
      });
  }

  // ---------------------------------------------------------------------------
  // Accessors
  // ---------------------------------------------------------------------------

  get id(): PierId {
    return this.record.id;
  }

  get name(): ShipName | null {
    return this.record.name;
  }

  get zone(): PierZone {
    return this.record.zone;
  }

  get runtimeVersion(): RuntimeVersion {
    return this.record.runtimeVersion;
  }

  get initialized(): boolean {
    return this.record.initialized;
  }

  get running(): boolean {
    return this.record.running;
  }

  get pendingBootMode(): PendingBootMode | null {
    return this.record.pendingBootMode;
  }

  get metaPath(): string {
    return this.record.metaPath;
  }

  get isConsumed(): boolean {
    return this.consumed;
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  /**
   * Allocates one port from each issuer and starts the ship. Consumes this handle only on
   * success; after a failure the pier is stopped and still owned here.
   */
  launch(serviceIssuer: PortIssuer, peerIssuer: PortIssuer): ResultAsync<Ship, PierError> {
    return this.exclusive('launch', (record) => {
      const mode = startModeFor(record);
      if (mode.isErr()) return errAsync(mode.error);

      const { ctx } = this;
      const layout = record.layout;

      return serviceIssuer
        .getPort()
        .andThen((servicePort) => peerIssuer.getPort().map((peerPort) => ({ servicePort, peerPort })))
        .mapErr((e): PierError => e)
        .andThen(({ servicePort, peerPort }) =>
          ctx.runtime
            .start({
              runtimeVersion: record.runtimeVersion,
              pierPath: layout.pierPath,
              servicePort,
              peerPort,
              mode: mode.value,
            })
            .mapErr((e): PierError => e)
            .andThen((process) =>
              readLensPort(ctx, layout)
                .map((lensPort): { process: ShipProcess; ports: ShipPorts } => ({
                  process,
                  ports: { servicePort, peerPort, lensPort },
                }))
                .orElse((e) => abortLaunch(ctx, process).andThen(() => errAsync(e)))
            )
        )
        .orElse((e) =>
          // A failed boot may still have created pier/.
          pierDataExists(ctx, layout).andThen((exists) => {
            record.initialized = exists;
            return errAsync<{ process: ShipProcess; ports: ShipPorts }, PierError>(e);
          })
        )
        .andThen(({ process, ports }) => {
          const bootedFromKeyfile = mode.value.kind === 'boot_from_keyfile';
          record.initialized = true;
          record.pendingBootMode = null;
          record.running = true;
          record.sync();
          this.consumed = true;
          ctx.logger.info({ pierId: record.id, pid: process.pid, ...ports }, 'ship launched');

          const ship = new Ship(ctx, record, process, ports, (r) => new PierState(ctx, r));
          return bootedFromKeyfile ? discardKeyfile(ctx, layout).map(() => ship) : okAsync(ship);
        });
    });
  }

  /**
   * Moves a booted, stopped staging pier into the live zone as `~newName`.
   * Every precondition is checked before anything on disk changes.
   */
  releaseFromDryDock(newName: string): ResultAsync<void, PierError> {
    return this.exclusive('release_from_dry_dock', (record) => {
      if (record.zone !== 'staging') {
        return errAsync(PierErr.illegalTransition('release_from_dry_dock', 'the pier is already live'));
      }
      if (!record.initialized) {
        return errAsync(PierErr.illegalTransition('release_from_dry_dock', 'the pier has never booted'));
      }
      if (record.running) {
        return errAsync(PierErr.illegalTransition('release_from_dry_dock', 'the ship is running'));
      }
      const name = parseShipName(newName);
      if (name === null) return errAsync(PierErr.invalidShipName(newName));

      const { ctx } = this;
      const from = record.metaPath;
      const to = ctx.harbor.pierDir({ zone: 'live', name });

      return ctx.fs
        .lstatKind(to)
        .map(() => true)
        .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(false) : errAsync(e)))
        .mapErr((e) => PierErr.io(e, 'could not inspect live zone'))
        .andThen((taken) => (taken ? errAsync(PierErr.nameTaken(name)) : okAsync(undefined)))
        .andThen(() =>
          ctx.fs
            .rename(from, to)
            .mapErr((e) =>
              e.code === 'FS_ALREADY_EXISTS' || e.code === 'FS_NOT_EMPTY'
                ? PierErr.nameTaken(name)
                : PierErr.io(e, 'could not move pier into the live zone')
            )
        )
        .andThen(() => {
          record.moveTo('live', to, name);
          record.lock = ctx.fileLock.relocate(record.lock, record.layout.lockPath);
          ctx.logger.info({ pierId: record.id, name: formatShipName(name) }, 'pier released from dry dock');

          return ctx.fs.writeFileAtomic(record.layout.configPath, encodeConfig(record.toConfig())).orElse((e) => {
            ctx.logger.warn({ pierId: record.id, reason: e.message }, 'could not persist config after release');
            return okAsync(undefined);
          });
        });
    });
  }

  /**
   * Writes the config, releases the lock and consumes the handle.
   * A failed write leaves the handle usable so the caller can retry.
   */
  finalize(): ResultAsync<void, PierError> {
    return this.exclusive('finalize', (record) => {
      const { ctx } = this;
      return ctx.fs
        .writeFileAtomic(record.layout.configPath, encodeConfig(record.toConfig()))
        .mapErr((e) => PierErr.io(e, 'could not write pier config'))
        .andThen(() => ctx.fileLock.release(record.lock))
        .map(() => {
          record.retire();
          this.consumed = true;
          ctx.logger.debug({ pierId: record.id, zone: record.zone }, 'pier finalized');
        });
    });
  }

  private exclusive<T>(
    operation: PierOperation,
    work: (record: PierRecord) => ResultAsync<T, PierError>
  ): ResultAsync<T, PierError> {
    if (this.consumed) {
      return errAsync(PierErr.illegalTransition(operation, 'this pier handle has been consumed'));
    }
    if (this.busy) {
      return errAsync(PierErr.illegalTransition(operation, 'another operation on this pier is in progress'));
    }
    this.busy = true;
    return work(this.record)
      .map((value) => {
        this.busy = false;
        return value;
      })
      .mapErr((e) => {
        this.busy = false;
        return e;
      });
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function verifyChecksum(ctx: PierContext, bytes: Uint8Array, options: StageOptions): Result<void, PierError> {
  if (options.expectedSha256 === undefined) return ok(undefined);
  const actual = ctx.sha256.sha256(bytes);
  return actual === options.expectedSha256 ? ok(undefined) : err(PierErr.checksumMismatch(options.expectedSha256, actual));
}

function startModeFor(record: PierRecord): Result<StartMode, PierError> {
  if (record.running) return err(PierErr.illegalTransition('launch', 'the ship is already running'));
  if (record.initialized) return ok({ kind: 'resume' });

  const pending = record.pendingBootMode;
  if (pending === null || pending.kind === 'comet') return ok({ kind: 'boot_comet' });
  if (pending.kind === 'keyfile') {
    return ok({ kind: 'boot_from_keyfile', keyfilePath: record.layout.keyfilePath, name: pending.name });
  }
  return err(PierErr.illegalTransition('launch', 'the extracted pier data is missing'));
}

function readLensPort(ctx: PierContext, layout: PierLayout): ResultAsync<number, PierError> {
  const malformed = (detail: string): PierError => ({
    code: 'PORTS_DESCRIPTOR_MALFORMED',
    message: `Ports descriptor ${detail}: ${layout.portsDescriptorPath}`,
    descriptorPath: layout.portsDescriptorPath,
  });

  return ctx.fs
    .readFileUtf8(layout.portsDescriptorPath)
    .mapErr((e) => malformed(`could not be read (${e.message})`))
    .andThen((text) => {
      const lensPort = parseLensPort(text);
      return lensPort === null ? errAsync(malformed('has no loopback line')) : okAsync(lensPort);
    });
}

function abortLaunch(ctx: PierContext, process: ShipProcess): ResultAsync<void, never> {
  return process
    .stop()
    .map(() => undefined)
    .orElse((e) => {
      ctx.logger.warn({ pid: process.pid, reason: e.message }, 'could not stop ship after a failed launch');
      return okAsync(undefined);
    });
}

function pierDataExists(ctx: PierContext, layout: PierLayout): ResultAsync<boolean, never> {
  return ctx.fs
    .statKind(layout.pierPath)
    .map((kind) => kind === 'directory')
    .orElse(() => okAsync(false));
}

// The ship has taken its identity from the keyfile; the copy on disk is no longer needed.
function discardKeyfile(ctx: PierContext, layout: PierLayout): ResultAsync<void, never> {
  return ctx.fs.unlink(layout.keyfilePath).orElse((e) => {
    if (e.code !== 'FS_NOT_FOUND') {
      ctx.logger.warn({ keyfilePath: layout.keyfilePath, reason: e.message }, 'could not delete keyfile after boot');
    }
    return okAsync(undefined);
  });
}

function releaseQuietly(ctx: PierContext, lock: FileLockHandle): ResultAsync<void, never> {
  return ctx.fileLock.release(lock).orElse((e) => {
    ctx.logger.warn({ lockPath: lock.lockPath, reason: e.message }, 'could not release lock during cleanup');
    return okAsync(undefined);
  });
}

function removeQuietly(ctx: PierContext, target: string, what: string): ResultAsync<void, never> {
  return ctx.fs.removeTree(target).orElse((e) => {
    ctx.logger.warn({ path: target, reason: e.message }, `could not remove ${what}`);
    return okAsync(undefined);
  });
}

function discardStaging(ctx: PierContext, metaPath: string, lock: FileLockHandle | null): ResultAsync<void, never> {
  const released = lock === null ? okAsync<void, never>(undefined) : releaseQuietly(ctx, lock);
  return released.andThen(() => removeQuietly(ctx, metaPath, 'half-built staging directory'));
}

interface InspectedPier {
  readonly config: PierConfig;
  readonly initialized: boolean;
  readonly pendingBootMode: PendingBootMode | null;
}

function inspectPier(ctx: PierContext, layout: PierLayout, ref: PierRef): ResultAsync<InspectedPier, PierError> {
  return ctx.fs
    .readFileUtf8(layout.configPath)
    .mapErr((e) =>
      e.code === 'FS_NOT_FOUND'
        ? PierErr.configCorrupt(layout.configPath, 'missing')
        : PierErr.io(e, 'could not read pier config')
    )
    .andThen((text) => {
      const parsed = parsePierConfig(text);
      if (parsed.isErr()) return errAsync(PierErr.configCorrupt(layout.configPath, parsed.error.reason));
      const config = parsed.value;

      if (ref.zone === 'staging' && config.id !== ref.id) {
        return errAsync(PierErr.configCorrupt(layout.configPath, `id ${config.id} does not match directory`));
      }
      if (ref.zone === 'live' && config.name !== ref.name) {
        return errAsync(
          PierErr.configCorrupt(layout.configPath, `name ${config.name ?? 'null'} does not match directory`)
        );
      }
      return okAsync(config);
    })
    .andThen((config) =>
      pierDataExists(ctx, layout).andThen((initialized) => {
        if (ref.zone === 'live' && !initialized) {
          return errAsync<InspectedPier, PierError>(PierErr.notFound('live', ref.name));
        }
        if (initialized) return okAsync({ config, initialized, pendingBootMode: null });

        return ctx.fs
          .lstatKind(layout.keyfilePath)
          .map((kind) => kind === 'file')
          .orElse(() => okAsync(false))
          .map(
            (hasKeyfile): InspectedPier => ({
              config,
              initialized,
              pendingBootMode:
                hasKeyfile && config.name !== null ? { kind: 'keyfile', name: config.name } : { kind: 'comet' },
            })
          );
      })
    );
}

function unpackArchive(ctx: PierContext, layout: PierLayout, archive: Uint8Array): ResultAsync<boolean, PierError> {
  const work = ctx.fs
    .writeFileAtomic(layout.archivePath, archive)
    .andThen(() => ctx.fs.mkdir(layout.unpackPath))
    .mapErr((e) => PierErr.io(e, 'could not stage archive'))
    .andThen(() =>
      ctx.extractor
        .extract(layout.archivePath, layout.unpackPath, { preserveTimestamps: true })
        .mapErr((e): PierError => e)
    )
    .andThen((entries) => {
      ctx.logger.debug({ entries }, 'archive unpacked');
      return locateShipData(ctx, layout.unpackPath);
    })
    .andThen((shipDir) =>
      ctx.fs.rename(shipDir, layout.pierPath).mapErr((e) => PierErr.io(e, 'could not move ship data into place'))
    )
    .map(() => true);

  const cleanup = (): ResultAsync<void, never> =>
    removeQuietly(ctx, layout.archivePath, 'staged archive').andThen(() =>
      removeQuietly(ctx, layout.unpackPath, 'unpack directory')
    );

  return work
    .andThen((initialized) => cleanup().map(() => initialized))
    .orElse((e) => cleanup().andThen(() => errAsync<boolean, PierError>(e)));
}

/**
 * Breadth-first search for directories that contain `.urb/`. A match is not searched
 * further. Exactly one match is required.
 */
function locateShipData(ctx: PierContext, root: string): ResultAsync<string, PierError> {
  return new ResultAsync(
    (async (): Promise<Result<string, PierError>> => {
      const matches: string[] = [];
      const queue: string[] = [root];

      for (let dir = queue.shift(); dir !== undefined; dir = queue.shift()) {
        const listed = await ctx.fs.readdir(dir);
        if (listed.isErr()) return err(PierErr.io(listed.error, 'could not search unpacked archive'));

        const entries = [...listed.value].sort((a, b) => a.name.localeCompare(b.name));
        if (entries.some((e) => e.name === SHIP_DATA_MARKER && e.kind === 'directory')) {
          matches.push(dir);
          continue;
        }
        for (const entry of entries) {
          if (entry.kind === 'directory') queue.push(path.join(dir, entry.name));
        }
      }

      if (matches.length === 0) return err(PierErr.noShipFound('none'));
      if (matches.length > 1) return err(PierErr.noShipFound('ambiguous'));
      return ok(matches[0]);
    })()
  );
}
