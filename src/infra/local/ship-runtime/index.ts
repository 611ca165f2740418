import * as path from 'path';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { setTimeout as sleep } from 'timers/promises';
import { err, ok, okAsync, ResultAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  ShipExit,
  ShipProcess,
  ShipRuntimeError,
  ShipRuntimePort,
  ShipStartRequest,
  StartMode,
} from '../../../ports/ship-runtime.port.js';
import type { FileReadPort } from '../../../ports/fs.port.js';
import type { Logger } from '../../../core/logging/index.js';
import { PORTS_DESCRIPTOR_FILE } from '../../../domain/ports-descriptor.js';
import type { RuntimeVersion } from '../../../domain/runtime-version.js';

export const DEFAULT_BOOT_TIMEOUT_MS = 300_000;
const DESCRIPTOR_POLL_MS = 100;
const STOP_GRACE_MS = 30_000;

export interface NodeShipRuntimeOptions {
  /** Binary used when no per-version binary directory is configured. */
  readonly binary: string;
  /** Directory holding `urbit-vX.Y` binaries, one per runtime version. */
  readonly binaryDir: string | null;
  readonly bootTimeoutMs?: number;
  readonly stopGraceMs?: number;
}

/**
 * Command line for one start request. The pier path is always last except for
 * fresh boots, which name it through `-c`.
 */
export function buildShipArgs(request: ShipStartRequest): string[] {
  const common = ['-t', '--http-port', String(request.servicePort), '-p', String(request.peerPort)];
  return [...common, ...modeArgs(request.mode, request.pierPath)];
}

function modeArgs(mode: StartMode, pierPath: string): string[] {
  switch (mode.kind) {
    case 'resume':
      return [pierPath];
    case 'boot_comet':
      return ['-c', pierPath];
    case 'boot_from_keyfile':
      return ['-w', mode.name, '-k', mode.keyfilePath, '-c', pierPath];
  }
}

export function resolveShipBinary(options: Pick<NodeShipRuntimeOptions, 'binary' | 'binaryDir'>, version: RuntimeVersion): string {
  return options.binaryDir === null ? options.binary : path.join(options.binaryDir, `urbit-${version}`);
}

type BootWait =
  | { readonly kind: 'ready' }
  | { readonly kind: 'exited'; readonly exit: ShipExit }
  | { readonly kind: 'timed_out' };

class SpawnedShip implements ShipProcess {
  private stopping: ResultAsync<ShipExit, ShipRuntimeError> | null = null;

  constructor(
    private readonly child: ChildProcess,
    private readonly exited: Promise<ShipExit>,
    private readonly stopGraceMs: number,
    private readonly logger: Logger
  ) {}

  get pid(): number | undefined {
    return this.child.pid;
  }

  stop(): ResultAsync<ShipExit, ShipRuntimeError> {
    if (this.stopping === null) {
      this.stopping = new ResultAsync(this.terminate());
    }
    return this.stopping;
  }

  private async terminate(): Promise<Result<ShipExit, ShipRuntimeError>> {
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return ok(await this.exited);
    }
    if (!this.child.kill('SIGTERM')) {
      return err({ code: 'SHIP_STOP_FAILED', message: `could not signal ship process ${String(this.child.pid)}` });
    }

    const graceful = await new Promise<ShipExit | null>((resolve) => {
      const timer = setTimeout(() => resolve(null), this.stopGraceMs);
      void this.exited.then((exit) => {
        clearTimeout(timer);
        resolve(exit);
      });
    });
    if (graceful !== null) return ok(graceful);

    this.logger.warn({ pid: this.child.pid, graceMs: this.stopGraceMs }, 'ship ignored SIGTERM; sending SIGKILL');
    this.child.kill('SIGKILL');
    return ok(await this.exited);
  }
}

/**
 * Starts the ship binary as a child process.
 *
 * Boot is considered done when `<pier>/.http.ports` appears. A process that exits first,
 * or never writes it within `bootTimeoutMs`, is a launch failure; in the timeout case the
 * process is killed before returning.
 */
export class NodeShipRuntime implements ShipRuntimePort {
  private readonly bootTimeoutMs: number;
  private readonly stopGraceMs: number;

  constructor(
    private readonly options: NodeShipRuntimeOptions,
    private readonly fs: Pick<FileReadPort, 'statKind'>,
    private readonly logger: Logger
  ) {
    this.bootTimeoutMs = options.bootTimeoutMs ?? DEFAULT_BOOT_TIMEOUT_MS;
    this.stopGraceMs = options.stopGraceMs ?? STOP_GRACE_MS;
  }

  start(request: ShipStartRequest): ResultAsync<ShipProcess, ShipRuntimeError> {
    return new ResultAsync(this.launch(request));
  }

  private async launch(request: ShipStartRequest): Promise<Result<ShipProcess, ShipRuntimeError>> {
    const binary = resolveShipBinary(this.options, request.runtimeVersion);
    const args = buildShipArgs(request);
    this.logger.info({ binary, args, mode: request.mode.kind }, 'starting ship');

    const child = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const exited = new Promise<ShipExit>((resolve) => {
      child.once('exit', (exitCode, signal) => resolve({ exitCode, signal }));
    });

    const spawned = await new Promise<Result<void, ShipRuntimeError>>((resolve) => {
      child.once('spawn', () => resolve(ok(undefined)));
      child.once('error', (e) => resolve(err({ code: 'SHIP_LAUNCH_FAILED', message: `could not start ${binary}: ${e.message}` })));
    });
    if (spawned.isErr()) return err(spawned.error);

    child.stdout?.on('data', (chunk: Buffer) => this.logger.debug({ pid: child.pid }, chunk.toString().trimEnd()));
    child.stderr?.on('data', (chunk: Buffer) => this.logger.debug({ pid: child.pid, stream: 'stderr' }, chunk.toString().trimEnd()));

    const ship = new SpawnedShip(child, exited, this.stopGraceMs, this.logger);
    const wait = await this.waitForDescriptor(path.join(request.pierPath, PORTS_DESCRIPTOR_FILE), exited);

    switch (wait.kind) {
      case 'ready':
        this.logger.info({ pid: child.pid }, 'ship is up');
        return ok(ship);
      case 'exited':
        return err({
          code: 'SHIP_LAUNCH_FAILED',
          message: `ship exited during boot (code ${String(wait.exit.exitCode)}, signal ${String(wait.exit.signal)})`,
        });
      case 'timed_out': {
        const stopped = await ship.stop();
        if (stopped.isErr()) {
          this.logger.warn({ pid: child.pid, reason: stopped.error.message }, 'could not stop ship after boot timeout');
        }
        return err({ code: 'SHIP_LAUNCH_FAILED', message: `ship did not finish booting within ${this.bootTimeoutMs}ms` });
      }
    }
  }

  private async waitForDescriptor(descriptorPath: string, exited: Promise<ShipExit>): Promise<BootWait> {
    const seen: { exit: ShipExit | null } = { exit: null };
    void exited.then((exit) => {
      seen.exit = exit;
    });

    const deadline = Date.now() + this.bootTimeoutMs;
    for (;;) {
      const present = await this.fs
        .statKind(descriptorPath)
        .map((kind) => kind === 'file')
        .orElse(() => okAsync(false));
      if (present.isOk() && present.value) return { kind: 'ready' };
      if (seen.exit !== null) return { kind: 'exited', exit: seen.exit };
      if (Date.now() >= deadline) return { kind: 'timed_out' };
      await sleep(DESCRIPTOR_POLL_MS);
    }
  }
}
