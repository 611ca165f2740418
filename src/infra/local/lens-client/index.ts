import { errAsync, okAsync, Result, ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { ControlChannelError, LensClientPort } from '../../../ports/lens-client.port.js';
import type { Logger } from '../../../core/logging/index.js';

const DEFAULT_TIMEOUT_MS = 30_000;

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => (e instanceof Error ? e.message : String(e))
);

export interface FetchLensClientOptions {
  readonly host?: string;
  readonly timeoutMs?: number;
}

/**
 * Control channel over the ship's loopback HTTP listener.
 */
export class FetchLensClient implements LensClientPort {
  private readonly host: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: Logger,
    options: FetchLensClientOptions = {}
  ) {
    this.host = options.host ?? '127.0.0.1';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  dojo(lensPort: number, expression: string): ResultAsync<string, ControlChannelError> {
    const url = `http://${this.host}:${lensPort}`;
    const body = JSON.stringify({ source: { dojo: expression }, sink: { stdout: null } });
    this.logger.debug({ lensPort, expression }, 'dojo request');

    return RA.fromPromise(
      fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      }),
      (e): ControlChannelError => ({
        code: 'CONTROL_CHANNEL_UNREACHABLE',
        message: `could not reach ${url}: ${e instanceof Error ? e.message : String(e)}`,
        lensPort,
      })
    )
      .andThen((response) =>
        RA.fromPromise(
          response.text().then((text) => ({ status: response.status, ok: response.ok, text })),
          (e): ControlChannelError => ({
            code: 'CONTROL_CHANNEL_UNREACHABLE',
            message: `connection dropped while reading the reply: ${e instanceof Error ? e.message : String(e)}`,
            lensPort,
          })
        )
      )
      .andThen(({ status, ok, text }) => {
        if (!ok) return errAsync(violation(lensPort, `HTTP ${status}`));

        const parsed = parseJson(text);
        if (parsed.isErr()) return errAsync(violation(lensPort, `reply is not JSON (${parsed.error})`));
        if (typeof parsed.value !== 'string') return errAsync(violation(lensPort, 'reply is not a JSON string'));
        return okAsync(parsed.value);
      });
  }
}

function violation(lensPort: number, detail: string): ControlChannelError {
  return { code: 'CONTROL_PROTOCOL_VIOLATION', message: `dojo reply rejected: ${detail}`, lensPort };
}
