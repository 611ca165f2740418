import type { Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { ProcessSignals } from './ports/process-signals.js';

/**
 * Blocking cleanup for a resource whose owner went away without its async release.
 *
 * `run` must only close over plain data (paths, serialized config, ports). A closure that
 * reaches the owner keeps it reachable and the fallback never fires on collection.
 */
export interface SyncFallback {
  readonly label: string;
  run(): Result<void, { readonly message: string }>;
}

export interface FallbackToken {
  readonly label: string;
}

export type FallbackTrigger = 'collected' | 'process_exit' | 'manual';

/**
 * Safety net standing in for destructors.
 *
 * Fires a fallback when its owner is garbage collected or when the process exits while it
 * is still armed. Every firing is logged at error: the owner skipped `finalize`/`release`,
 * which is a programmer error. Tests assert `pendingCount()` is back to zero.
 */
export class SyncFallbackRegistry {
  private readonly pending = new Map<FallbackToken, SyncFallback>();
  private readonly finalizer: FinalizationRegistry<FallbackToken>;

  constructor(
    private readonly logger: Logger,
    signals: ProcessSignals
  ) {
    this.finalizer = new FinalizationRegistry((token) => this.fire(token, 'collected'));
    signals.on('exit', () => this.runPending('process_exit'));
  }

  arm(owner: object, fallback: SyncFallback): FallbackToken {
    const token: FallbackToken = { label: fallback.label };
    this.pending.set(token, fallback);
    this.finalizer.register(owner, token, token);
    return token;
  }

  disarm(token: FallbackToken): void {
    this.pending.delete(token);
    this.finalizer.unregister(token);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  pendingLabels(): readonly string[] {
    return [...this.pending.values()].map((f) => f.label);
  }

  /** Runs every armed fallback now, oldest first. */
  runPending(trigger: FallbackTrigger = 'manual'): void {
    for (const token of [...this.pending.keys()]) {
      this.fire(token, trigger);
    }
  }

  private fire(token: FallbackToken, trigger: FallbackTrigger): void {
    const fallback = this.pending.get(token);
    if (fallback === undefined) return;
    this.pending.delete(token);
    this.finalizer.unregister(token);

    this.logger.error(
      { label: fallback.label, trigger },
      'programmer error: resource was not released through its async path; performing blocking IO in the synchronous fallback'
    );

    const outcome = fallback.run();
    if (outcome.isErr()) {
      this.logger.error({ label: fallback.label, reason: outcome.error.message }, 'synchronous fallback failed');
    }
  }
}
