import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Drops the arguments Node passes to listeners (exit code, signal name).
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    const listener = (): void => {
      void Promise.resolve(handler());
    };
    if (signal === 'exit') {
      process.on('exit', listener);
    } else {
      process.on(signal, listener);
    }
  }
}
