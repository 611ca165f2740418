/**
 * The ship writes `.http.ports` into its data directory on boot, one listener per line:
 *
 *   8080 secure public
 *   12321 insecure loopback
 *
 * The control (lens) port is the first token of the first line ending in `loopback`.
 */
export const PORTS_DESCRIPTOR_FILE = '.http.ports';

const LOOPBACK_MARKER = 'loopback';

export type PortsDescriptorError = {
  readonly code: 'PORTS_DESCRIPTOR_MALFORMED';
  readonly message: string;
  readonly descriptorPath: string;
};

export function parseLensPort(text: string): number | null {
  const line = text.split(/\r?\n/).find((l) => l.endsWith(LOOPBACK_MARKER));
  if (line === undefined) return null;

  const token = line.trim().split(/\s+/)[0] ?? '';
  if (!/^\d+$/.test(token)) return null;

  const port = Number(token);
  return port >= 1 && port <= 65535 ? port : null;
}
