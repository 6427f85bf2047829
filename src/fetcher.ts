/**
 * @module fetcher
 *
 * Fetch one tile from a render endpoint (optionally a cache first) and
 * place it in the store.
 *
 * The canonical artifact path only ever holds a valid PNG or nothing:
 *
 * 1. Bytes are written to a temporary file next to the destination.
 * 2. The written file is validated exactly as the store inspector does.
 * 3. Only a valid file is renamed over the destination; anything else is
 *    deleted.
 *
 * Attempts for one tile are strictly sequential, with exponential backoff
 * and linear jitter between them. The backoff wait only blocks the tile's
 * own retry loop, so other tiles in the same pool keep progressing.
 *
 * Every cache or source read is bounded by the per-read `timeout` and by the
 * caller's `deadline`. The bound holds even for a connector that ignores the
 * signal it is handed: the fetcher stops waiting and records a failure.
 *
 * Two tiers mirror the rest of the library:
 *
 * | Tier | Export | Use case |
 * |------|--------|----------|
 * | **Stateful** | {@link TileFetcher} | Connectors and retry policy bound once, many tiles |
 * | **Stateless** | {@link fetchTile} | One-off fetch of a single tile |
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Connector } from './connectors/connector.js';
import { HttpConnector } from './connectors/http.js';
import { createAbortError, isAbortError, toErrorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { hasPngSignature, isValidTile } from './store/inspector.js';
import { expandTemplate, sourceTemplate } from './store/layout.js';
import { tileKey } from './tiles.js';
import type { TileCoord } from './types.js';

/** Backoff schedule parameters, in milliseconds. */
export interface BackoffOptions {
  /** Delay before the first retry; doubled on every further retry. @defaultValue 500 */
  base: number;
  /** Extra delay added per attempt already made. @defaultValue 100 */
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = { base: 500, jitter: 100 };

/**
 * Configuration for {@link TileFetcher}.
 */
export interface TileFetcherOptions {
  /** Connector for the render endpoint. */
  source: Connector;
  /** URL template for the render endpoint, e.g. `http://localhost/tile/{z}/{x}/{y}.png`. */
  sourceTemplate: string;
  /**
   * Optional cache consulted before any network access. A cached object is
   * used only if it carries the PNG signature; otherwise the fetch falls
   * through to the source.
   */
  cache?: {
    connector: Connector;
    /** Path or URL template, e.g. `/var/cache/renderd/tiles/default/{z}/{x}/{y}.png`. */
    template: string;
  };
  /** Total attempts against the source, including the first. @defaultValue 5 */
  maxAttempts?: number;
  /** Upper bound on one cache or source read, in milliseconds. @defaultValue 30000 */
  timeout?: number;
  backoff?: Partial<BackoffOptions>;
  logger?: Logger;
}

/** Where a successful tile came from. `none` marks a failure. */
export type FetchSource = 'existing' | 'cache' | 'network' | 'none';

/** Final outcome of one tile fetch. Individual attempts are not surfaced. */
export interface FetchOutcome {
  coord: TileCoord;
  ok: boolean;
  source: FetchSource;
  /** Requests made against the source. */
  attempts: number;
  /** Last error seen, when `ok` is false. */
  error?: string;
  /** The fetch stopped early because the stop signal fired. */
  aborted?: boolean;
}

export interface FetchOptions {
  /**
   * Cooperative stop. Checked before each attempt and interrupts backoff
   * waits; a request or write already in progress is left to finish.
   */
  signal?: AbortSignal;
  /** Hard stop: also aborts a cache or source read in progress. */
  deadline?: AbortSignal;
}

/**
 * Delay before the retry that follows attempt `attempt` (zero-based):
 * `base * 2^attempt + jitter * attempt`.
 *
 * @example
 * ```typescript
 * backoffDelay(0, { base: 500, jitter: 100 }); // => 500
 * backoffDelay(2, { base: 500, jitter: 100 }); // => 2200
 * ```
 */
export function backoffDelay(attempt: number, backoff: BackoffOptions = DEFAULT_BACKOFF): number {
  return backoff.base * 2 ** attempt + backoff.jitter * attempt;
}

/**
 * Sleep for `ms`, rejecting with an `AbortError` as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(createAbortError());
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with `signal.reason` once `signal`
 * aborts, whichever comes first.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Write `bytes` to `destPath` through a validated temporary file.
 *
 * @returns `true` if a valid artifact now sits at `destPath`; `false` if the
 *   written bytes failed validation (nothing is left behind).
 * @throws {Error} On filesystem errors; the temporary file is removed.
 */
export async function placeTile(bytes: Uint8Array, destPath: string, log?: Logger): Promise<boolean> {
  await mkdir(dirname(destPath), { recursive: true });
  const tmp = `${destPath}.${process.pid}.${++tmpCounter}.tmp`;

  try {
    await writeFile(tmp, bytes);
    if (!(await isValidTile(tmp, log))) return false;
    await rename(tmp, destPath);
    return true;
  } finally {
    await rm(tmp, { force: true });
  }
}

let tmpCounter = 0;

/**
 * Stateful tile fetcher.
 *
 * @example
 * ```typescript
 * const fetcher = new TileFetcher({
 *   source: new HttpConnector({ timeout: 30_000 }),
 *   sourceTemplate: 'http://localhost/tile/{z}/{x}/{y}.png',
 *   cache: {
 *     connector: new LocalConnector(),
 *     template: '/var/cache/renderd/tiles/default/{z}/{x}/{y}.png',
 *   },
 *   maxAttempts: 5,
 * });
 *
 * const outcome = await fetcher.fetch({ z: 3, x: 4, y: 2 }, './tiles/demo/3/4/2.png');
 * ```
 */
export class TileFetcher {
  private readonly source: Connector;
  private readonly sourceTemplate: string;
  private readonly cache: TileFetcherOptions['cache'];
  private readonly maxAttempts: number;
  private readonly timeout: number;
  private readonly backoff: BackoffOptions;
  private readonly log: Logger;

  constructor(options: TileFetcherOptions) {
    this.source = options.source;
    this.sourceTemplate = options.sourceTemplate;
    this.cache = options.cache;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.timeout = options.timeout ?? 30_000;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.log = options.logger ?? createLogger('fetcher');
  }

  /**
   * Make `destPath` hold a valid artifact for `coord`.
   *
   * An already valid artifact is left untouched and reported with source
   * `existing`. An invalid leftover is deleted before anything else. Never
   * throws: every failure is folded into the returned outcome, and after a
   * failure no file exists at `destPath`.
   */
  async fetch(coord: TileCoord, destPath: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const { deadline } = options;
    const signal = options.signal && deadline ? AbortSignal.any([options.signal, deadline]) : options.signal ?? deadline;
    const key = tileKey(coord);

    try {
      if (await isValidTile(destPath, this.log)) {
        return { coord, ok: true, source: 'existing', attempts: 0 };
      }
      await rm(destPath, { force: true });
    } catch (err) {
      return { coord, ok: false, source: 'none', attempts: 0, error: toErrorMessage(err) };
    }

    if (this.cache && (await this.fromCache(coord, destPath, deadline))) {
      return { coord, ok: true, source: 'cache', attempts: 0 };
    }

    const url = expandTemplate(this.sourceTemplate, coord);
    let lastError = 'no attempt made';

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { coord, ok: false, source: 'none', attempts: attempt, error: lastError, aborted: true };
      }

      try {
        const bytes = await this.read(this.source, url, deadline);
        if (await placeTile(bytes, destPath, this.log)) {
          return { coord, ok: true, source: 'network', attempts: attempt + 1 };
        }
        lastError = `response is not a PNG (${bytes.length} bytes)`;
      } catch (err) {
        lastError = toErrorMessage(err);
      }

      this.log.debug('Tile attempt failed', { tile: key, attempt: attempt + 1, error: lastError });

      if (deadline?.aborted) {
        return { coord, ok: false, source: 'none', attempts: attempt + 1, error: lastError, aborted: true };
      }

      if (attempt < this.maxAttempts - 1) {
        try {
          await sleep(backoffDelay(attempt, this.backoff), signal);
        } catch (err) {
          if (!isAbortError(err)) throw err;
          return { coord, ok: false, source: 'none', attempts: attempt + 1, error: lastError, aborted: true };
        }
      }
    }

    return { coord, ok: false, source: 'none', attempts: this.maxAttempts, error: lastError };
  }

  /** Copy a valid cached tile into place; `false` on any miss or error. */
  private async fromCache(coord: TileCoord, destPath: string, deadline: AbortSignal | undefined): Promise<boolean> {
    if (!this.cache) return false;
    const path = expandTemplate(this.cache.template, coord);

    try {
      const bytes = await this.read(this.cache.connector, path, deadline);
      if (!hasPngSignature(bytes)) {
        this.log.debug('Cached tile is not a PNG', { tile: tileKey(coord), path });
        return false;
      }
      return await placeTile(bytes, destPath, this.log);
    } catch (err) {
      this.log.debug('Cache miss', { tile: tileKey(coord), path, error: toErrorMessage(err) });
      return false;
    }
  }

  private read(connector: Connector, path: string, deadline: AbortSignal | undefined): Promise<Uint8Array> {
    const timeout = AbortSignal.timeout(this.timeout);
    const signal = deadline ? AbortSignal.any([timeout, deadline]) : timeout;
    if (signal.aborted) return Promise.reject(signal.reason);
    return abortable(connector.read(path, { signal }), signal);
  }
}

/**
 * Fetch a single tile from `sourceUrl` into `destPath`.
 *
 * @param sourceUrl - Endpoint base URL (`http://localhost/tile`) or a
 *   template with `{z}/{x}/{y}` placeholders.
 * @returns Whether a valid artifact sits at `destPath` afterwards.
 */
export async function fetchTile(
  coord: TileCoord,
  sourceUrl: string,
  destPath: string,
  maxAttempts = 5,
): Promise<boolean> {
  const source = new HttpConnector();
  const fetcher = new TileFetcher({
    source,
    sourceTemplate: sourceTemplate(sourceUrl),
    maxAttempts,
  });

  try {
    return (await fetcher.fetch(coord, destPath)).ok;
  } finally {
    await source.close();
  }
}
