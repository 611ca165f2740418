import { describe, it, expect } from 'vitest';
import { err, ok } from 'neverthrow';
import { SyncFallbackRegistry } from '../../../src/runtime/sync-fallback-registry.js';
import type { SyncFallback } from '../../../src/runtime/sync-fallback-registry.js';
import type { ProcessSignal, ProcessSignals } from '../../../src/runtime/ports/process-signals.js';
import { createMemoryLog } from '../../helpers/memory-logger.js';

function recording(ran: string[], label: string): SyncFallback {
  return {
    label,
    run: () => {
      ran.push(label);
      return ok(undefined);
    },
  };
}

class RecordingSignals implements ProcessSignals {
  readonly handlers = new Map<ProcessSignal, () => void | Promise<void>>();

  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    this.handlers.set(signal, handler);
  }
}

describe('SyncFallbackRegistry', () => {
  it('runs nothing for owners that were disarmed', () => {
    const log = createMemoryLog();
    const registry = new SyncFallbackRegistry(log.logger, new RecordingSignals());
    const ran: string[] = [];

    const token = registry.arm({}, recording(ran, 'a'));
    registry.disarm(token);
    registry.runPending();

    expect(ran).toEqual([]);
    expect(registry.pendingCount()).toBe(0);
    expect(log.messagesAt(50)).toEqual([]);
  });

  it('runs armed fallbacks oldest first, once each, and logs each as a programmer error', () => {
    const log = createMemoryLog();
    const registry = new SyncFallbackRegistry(log.logger, new RecordingSignals());
    const ran: string[] = [];

    registry.arm({}, recording(ran, 'first'));
    registry.arm({}, recording(ran, 'second'));
    expect(registry.pendingLabels()).toEqual(['first', 'second']);

    registry.runPending();
    registry.runPending();

    expect(ran).toEqual(['first', 'second']);
    expect(log.messagesAt(50)).toHaveLength(2);
    expect(log.messagesAt(50)[0]?.startsWith('programmer error: ')).toBe(true);
  });

  it('logs a failing fallback and keeps going', () => {
    const log = createMemoryLog();
    const registry = new SyncFallbackRegistry(log.logger, new RecordingSignals());
    const ran: string[] = [];

    registry.arm({}, { label: 'broken', run: () => err({ message: 'disk gone' }) });
    registry.arm({}, recording(ran, 'fine'));
    registry.runPending();

    expect(ran).toEqual(['fine']);
    expect(log.records.find((r) => r.msg === 'synchronous fallback failed')?.reason).toBe('disk gone');
  });

  it('runs pending fallbacks on process exit', async () => {
    const log = createMemoryLog();
    const signals = new RecordingSignals();
    const registry = new SyncFallbackRegistry(log.logger, signals);
    const ran: string[] = [];
    const owner = { name: 'still referenced' };
    registry.arm(owner, recording(ran, 'at exit'));

    const onExit = signals.handlers.get('exit');
    expect(onExit).toBeDefined();
    await onExit?.();

    expect(ran).toEqual(['at exit']);
    expect(log.records.find((r) => r.level === 50)?.trigger).toBe('process_exit');
    expect(owner.name).toBe('still referenced');
  });
});
