import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Test mode: nothing is ever registered on the real process.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: () => void | Promise<void>): void {
    // no-op
  }
}
