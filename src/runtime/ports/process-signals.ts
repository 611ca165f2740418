/**
 * Port for registering process signal handlers.
 * Keeps `process.on` out of domain code; the pier fallback registry hooks `exit` through it.
 */
export type ProcessSignal = NodeJS.Signals | 'exit';

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void;
}
