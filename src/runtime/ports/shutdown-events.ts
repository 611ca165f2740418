import type { ProcessSignal } from './process-signals.js';

export type ShutdownSignal = Exclude<ProcessSignal, 'exit'>;

export type ShutdownEvent = { readonly kind: 'shutdown_requested'; readonly signal: ShutdownSignal };

export type Unsubscribe = () => void;

/**
 * Typed "we should stop now" bus.
 * `harbormaster run` waits on it before shutting its ship down; signals feed it in the composition root.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
