/**
 * @module connectors/http
 *
 * HTTP(S) {@link Connector} implementation.
 *
 * Uses the Node.js built-in `fetch` to issue one `GET` per read with a
 * per-request timeout. It makes exactly one attempt: retry, backoff and
 * validation belong to the {@link TileFetcher}, which needs to treat a bad
 * body exactly like a failed request.
 */

import { HttpError } from '../errors.js';
import type { Connector, ReadOptions } from './connector.js';

/**
 * Configuration options for {@link HttpConnector}.
 */
export interface HttpConnectorOptions {
  /**
   * Default headers sent with every request, e.g. an authorization token or
   * a custom user agent.
   */
  headers?: Record<string, string>;
  /**
   * Per-request timeout in milliseconds. A request that has not produced a
   * complete body within this window is aborted with a `TimeoutError`.
   *
   * @defaultValue 30000
   */
  timeout?: number;
}

/**
 * HTTP(S) connector for tile render and cache endpoints.
 *
 * @example
 * ```typescript
 * const connector = new HttpConnector({ timeout: 15_000 });
 * const png = await connector.read('http://localhost/tile/3/4/2.png');
 * ```
 */
export class HttpConnector implements Connector {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;

  constructor(options?: HttpConnectorOptions) {
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30_000;
  }

  /**
   * `GET` the tile at `url`.
   *
   * @throws {HttpError} On any non-2xx status.
   * @throws {Error} `TimeoutError` when the timeout elapses, `AbortError`
   *   when `options.signal` aborts, or the transport error from `fetch`.
   */
  async read(url: string, options?: ReadOptions): Promise<Uint8Array> {
    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const signal = options?.signal
      ? AbortSignal.any([timeoutSignal, options.signal])
      : timeoutSignal;

    const response = await fetch(url, { headers: this.headers, signal });

    if (!response.ok) {
      await response.arrayBuffer().catch(() => undefined);
      throw new HttpError(response.status, url);
    }

    return new Uint8Array(await response.arrayBuffer());
  }

  /**
   * No-op for the HTTP connector: `fetch` keeps no connections that need
   * explicit cleanup.
   */
  async close(): Promise<void> {}
}
