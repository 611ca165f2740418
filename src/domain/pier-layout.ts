import * as path from 'path';
import { PORTS_DESCRIPTOR_FILE } from './ports-descriptor.js';

/**
 * Files inside one pier's directory (`dry_dock/<id>/` or `port/<name>/`).
 */
export interface PierLayout {
  readonly metaPath: string;
  readonly configPath: string;
  readonly lockPath: string;
  readonly keyfilePath: string;
  /** The ship's own data directory. */
  readonly pierPath: string;
  readonly archivePath: string;
  readonly unpackPath: string;
  readonly portsDescriptorPath: string;
}

export function pierLayout(metaPath: string): PierLayout {
  const pierPath = path.join(metaPath, 'pier');
  return {
    metaPath,
    configPath: path.join(metaPath, 'config.json'),
    lockPath: path.join(metaPath, 'lockfile'),
    keyfilePath: path.join(metaPath, 'keyfile'),
    pierPath,
    archivePath: path.join(metaPath, 'archive'),
    unpackPath: path.join(metaPath, 'unpack'),
    portsDescriptorPath: path.join(pierPath, PORTS_DESCRIPTOR_FILE),
  };
}

/** Marker directory that identifies a ship's data directory. */
export const SHIP_DATA_MARKER = '.urb';
