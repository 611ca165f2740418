import type { FileLockHandle } from '../ports/file-lock.port.js';
import type { SyncFileOpsPort } from '../ports/fs.port.js';
import type { FallbackToken, SyncFallbackRegistry } from '../runtime/sync-fallback-registry.js';
import type { PierZone } from './harbor.js';
import type { PierId, ShipName } from './ids.js';
import type { PendingBootMode } from './pending-boot-mode.js';
import type { PierConfig } from './pier-config.js';
import { serializePierConfig } from './pier-config.js';
import { pierLayout } from './pier-layout.js';
import type { PierLayout } from './pier-layout.js';
import type { RuntimeVersion } from './runtime-version.js';

// What the fallback writes. Plain data only; see SyncFallback.
interface PersistTarget {
  configPath: string;
  serialized: string;
}

export interface PierRecordInit {
  readonly id: PierId;
  readonly runtimeVersion: RuntimeVersion;
  readonly zone: PierZone;
  readonly metaPath: string;
  readonly name: ShipName | null;
  readonly initialized: boolean;
  readonly pendingBootMode: PendingBootMode | null;
  readonly lock: FileLockHandle;
}

export function encodeConfig(config: PierConfig): Uint8Array {
  return new TextEncoder().encode(serializePierConfig(config));
}

/**
 * The mutable state behind one pier, shared by whichever handle (PierState or Ship)
 * currently owns it.
 *
 * While armed, a blocking fallback will write the latest config if the record is dropped
 * without `retire()`.
 */
export class PierRecord {
  readonly id: PierId;
  readonly runtimeVersion: RuntimeVersion;
  zone: PierZone;
  metaPath: string;
  name: ShipName | null;
  initialized: boolean;
  pendingBootMode: PendingBootMode | null;
  running = false;
  lock: FileLockHandle;

  private readonly target: PersistTarget;
  private token: FallbackToken | null = null;

  private constructor(
    init: PierRecordInit,
    private readonly fallbacks: SyncFallbackRegistry
  ) {
    this.id = init.id;
    this.runtimeVersion = init.runtimeVersion;
    this.zone = init.zone;
    this.metaPath = init.metaPath;
    this.name = init.name;
    this.initialized = init.initialized;
    this.pendingBootMode = init.pendingBootMode;
    this.lock = init.lock;
    this.target = { configPath: '', serialized: '' };
    this.sync();
  }

  static open(init: PierRecordInit, fs: SyncFileOpsPort, fallbacks: SyncFallbackRegistry): PierRecord {
    const record = new PierRecord(init, fallbacks);
    const target = record.target;
    record.token = fallbacks.arm(record, {
      label: `pier ${init.id}`,
      run: () => fs.writeFileSync(target.configPath, new TextEncoder().encode(target.serialized)),
    });
    return record;
  }

  get layout(): PierLayout {
    return pierLayout(this.metaPath);
  }

  toConfig(): PierConfig {
    return { runtimeVersion: this.runtimeVersion, id: this.id, name: this.name };
  }

  /** Call after every mutation so the fallback writes current data to the current place. */
  sync(): void {
    this.target.configPath = this.layout.configPath;
    this.target.serialized = serializePierConfig(this.toConfig());
  }

  moveTo(zone: PierZone, metaPath: string, name: ShipName): void {
    this.zone = zone;
    this.metaPath = metaPath;
    this.name = name;
    this.sync();
  }

  /** The record was persisted through the async path; the fallback is no longer needed. */
  retire(): void {
    if (this.token !== null) {
      this.fallbacks.disarm(this.token);
    }
    this.token = null;
  }
}
