import { gzipSync } from 'zlib';

export type TarEntrySpec =
  | { readonly type: 'file'; readonly path: string; readonly content?: string }
  | { readonly type: 'directory'; readonly path: string }
  | { readonly type: 'symlink'; readonly path: string; readonly linkpath: string }
  | { readonly type: 'link'; readonly path: string; readonly linkpath: string };

const BLOCK = 512;

const TYPE_FLAGS: Record<TarEntrySpec['type'], string> = {
  file: '0',
  link: '1',
  symlink: '2',
  directory: '5',
};

function writeString(block: Uint8Array, offset: number, length: number, value: string): void {
  const bytes = new TextEncoder().encode(value);
  if (bytes.length > length) throw new Error(`tar field too long: ${value}`);
  block.set(bytes, offset);
}

function writeOctal(block: Uint8Array, offset: number, length: number, value: number): void {
  writeString(block, offset, length, `${value.toString(8).padStart(length - 1, '0')}\0`);
}

function header(entry: TarEntrySpec, size: number): Uint8Array {
  const block = new Uint8Array(BLOCK);
  writeString(block, 0, 100, entry.path);
  writeOctal(block, 100, 8, entry.type === 'directory' ? 0o755 : 0o644);
  writeOctal(block, 108, 8, 0);
  writeOctal(block, 116, 8, 0);
  writeOctal(block, 124, 12, size);
  writeOctal(block, 136, 12, 1_700_000_000);
  block.fill(0x20, 148, 156);
  writeString(block, 156, 1, TYPE_FLAGS[entry.type]);
  if (entry.type === 'symlink' || entry.type === 'link') {
    writeString(block, 157, 100, entry.linkpath);
  }
  writeString(block, 257, 6, 'ustar\0');
  writeString(block, 263, 2, '00');

  const checksum = block.reduce((sum, byte) => sum + byte, 0);
  writeString(block, 148, 8, `${checksum.toString(8).padStart(6, '0')}\0 `);
  return block;
}

/**
 * Hand-assembled ustar archive. Paths are written exactly as given, including `..` and
 * leading slashes, which a normal tar writer would refuse or strip.
 */
export function buildTar(entries: readonly TarEntrySpec[]): Uint8Array {
  const chunks: Uint8Array[] = [];
  for (const entry of entries) {
    const data = entry.type === 'file' ? new TextEncoder().encode(entry.content ?? '') : new Uint8Array(0);
    chunks.push(header(entry, data.length));
    if (data.length > 0) {
      const padded = new Uint8Array(Math.ceil(data.length / BLOCK) * BLOCK);
      padded.set(data);
      chunks.push(padded);
    }
  }
  chunks.push(new Uint8Array(BLOCK * 2));

  const total = chunks.reduce((n, c) => n + c.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function buildTarGz(entries: readonly TarEntrySpec[]): Uint8Array {
  return new Uint8Array(gzipSync(buildTar(entries)));
}

/** A minimal exported pier: `<dir>/.urb/` plus one file. */
export function pierArchiveEntries(dir: string): TarEntrySpec[] {
  return [
    { type: 'directory', path: `${dir}/` },
    { type: 'directory', path: `${dir}/.urb/` },
    { type: 'file', path: `${dir}/.urb/log`, content: 'event log' },
  ];
}
