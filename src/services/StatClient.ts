// src/services/StatClient.ts
import { USER_AGENT } from 'App/config/config';
import { UpstreamError } from 'App/errors/CustomError';
import http from 'node:http';
import https from 'node:https';

export interface StatClientOptions {
  url: string;
  timeoutMs: number;
}

/**
 * Fetches and decodes the stat document. One keep-alive agent per client so
 * the 1 Hz loop reuses its socket.
 */
export class StatClient {
  private readonly url: URL;
  private readonly timeoutMs: number;
  private readonly agent: http.Agent;

  constructor({ url, timeoutMs }: StatClientOptions) {
    this.url = new URL(url);
    this.timeoutMs = timeoutMs;
    this.agent =
      this.url.protocol === 'https:'
        ? new https.Agent({ keepAlive: true })
        : new http.Agent({ keepAlive: true });
  }

  get target(): string {
    return this.url.toString();
  }

  /** Resolves with the parsed JSON body; rejects with {@link UpstreamError}. */
  fetchSnapshot(): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      const options: https.RequestOptions = {
        method: 'GET',
        agent: this.agent,
        timeout: this.timeoutMs,
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      };
      const onResponse = (res: http.IncomingMessage) => {
        const status = res.statusCode ?? 0;
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', err =>
          reject(
            new UpstreamError(
              `cannot get results from ${this.target}: ${err.message}`,
            ),
          ),
        );
        res.on('end', () => {
          if (status < 200 || status >= 300) {
            reject(
              new UpstreamError(`unexpected status ${status} from ${this.target}`),
            );
            return;
          }
          try {
            resolve(JSON.parse(Buffer.concat(chunks).toString('utf8')));
          } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            reject(
              new UpstreamError(`malformed json from ${this.target}: ${reason}`),
            );
          }
        });
      };

      const req =
        this.url.protocol === 'https:'
          ? https.request(this.url, options, onResponse)
          : http.request(this.url, options, onResponse);
      req.on('timeout', () => {
        req.destroy(new Error(`timed out after ${this.timeoutMs}ms`));
      });
      req.on('error', err => {
        reject(
          new UpstreamError(`cannot send request to ${this.target}: ${err.message}`),
        );
      });
      req.end();
    });
  }

  /** Releases pooled sockets. */
  close() {
    this.agent.destroy();
  }
}
