import * as http from 'http';
import type { AddressInfo } from 'net';

export interface LensStubRequest {
  readonly method: string;
  readonly contentType: string | undefined;
  readonly body: string;
}

export interface LensStub {
  readonly port: number;
  readonly requests: LensStubRequest[];
  close(): Promise<void>;
}

export interface LensStubReply {
  readonly status: number;
  readonly body: string;
}

/**
 * In-process stand-in for a ship's loopback control listener.
 */
export async function startLensStub(reply: (body: string) => LensStubReply): Promise<LensStub> {
  const requests: LensStubRequest[] = [];

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      requests.push({ method: req.method ?? '', contentType: req.headers['content-type'], body });
      const answer = reply(body);
      res.writeHead(answer.status, { 'Content-Type': 'application/json' });
      res.end(answer.body);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('lens stub has no TCP address');
  const { port }: AddressInfo = address;

  return {
    port,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((e) => (e ? reject(e) : resolve()));
      }),
  };
}
