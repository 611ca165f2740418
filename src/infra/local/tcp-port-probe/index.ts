import * as net from 'net';
import { ResultAsync } from 'neverthrow';
import type { PortProbePort } from '../../../ports/port-probe.port.js';

/**
 * Probes by binding an exclusive listener on loopback and closing it again.
 */
export class TcpPortProbe implements PortProbePort {
  constructor(private readonly host: string = '127.0.0.1') {}

  isBindable(port: number): ResultAsync<boolean, never> {
    return ResultAsync.fromSafePromise(
      new Promise<boolean>((resolve) => {
        const server = net.createServer();
        server.once('error', () => resolve(false));
        server.listen({ port, host: this.host, exclusive: true }, () => {
          server.close(() => resolve(true));
        });
      })
    );
  }
}
