import type { ResultAsync } from 'neverthrow';
import { errAsync } from 'neverthrow';
import type { ShipProcess } from '../ports/ship-runtime.port.js';
import type { PierContext } from './pier-context.js';
import type { PierRecord } from './pier-record.js';
import type { PierState } from './pier-state.js';
import type { PierId, ShipName } from './ids.js';
import { PierErr } from './pier-error.js';
import type { PierError } from './pier-error.js';

export interface ShipPorts {
  /** HTTP service port handed to the process. */
  readonly servicePort: number;
  /** Peer-to-peer (Ames) port handed to the process. */
  readonly peerPort: number;
  /** Loopback control port, read from the ports descriptor. */
  readonly lensPort: number;
}

/**
 * A running ship. Owns its pier until `shutdown` hands it back as a PierState.
 */
export class Ship {
  private consumed = false;
  private stopping = false;

  constructor(
    private readonly ctx: PierContext,
    private readonly record: PierRecord,
    private readonly process: ShipProcess,
    readonly ports: ShipPorts,
    private readonly handBack: (record: PierRecord) => PierState
  ) {}

  get id(): PierId {
    return this.record.id;
  }

  get name(): ShipName | null {
    return this.record.name;
  }

  get pid(): number | undefined {
    return this.process.pid;
  }

  get servicePort(): number {
    return this.ports.servicePort;
  }

  get peerPort(): number {
    return this.ports.peerPort;
  }

  get lensPort(): number {
    return this.ports.lensPort;
  }

  /** Evaluates one expression on the ship and returns its printed result. */
  dojo(expression: string): ResultAsync<string, PierError> {
    if (this.consumed) {
      return errAsync(PierErr.illegalTransition('dojo', 'the ship has been shut down'));
    }
    return this.ctx.lens.dojo(this.ports.lensPort, expression);
  }

  /**
   * SIGTERM, wait for exit, return the pier. If the stop itself fails the Ship stays
   * usable and the process may still be running.
   */
  shutdown(): ResultAsync<PierState, PierError> {
    if (this.consumed) {
      return errAsync(PierErr.illegalTransition('shutdown', 'the ship has already been shut down'));
    }
    if (this.stopping) {
      return errAsync(PierErr.illegalTransition('shutdown', 'a shutdown is already in progress'));
    }
    this.stopping = true;

    return this.process
      .stop()
      .mapErr((e): PierError => {
        this.stopping = false;
        return e;
      })
      .map((exit) => {
        this.record.running = false;
        this.consumed = true;
        this.ctx.logger.info(
          { pierId: this.record.id, exitCode: exit.exitCode, signal: exit.signal },
          'ship stopped'
        );
        return this.handBack(this.record);
      });
  }
}
