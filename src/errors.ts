/**
 * @module errors
 *
 * Error taxonomy.
 *
 * | Error | Raised by | Handling |
 * |-------|-----------|----------|
 * | {@link ConfigError} | config parsing, planner | Fatal, before any network or file activity |
 * | {@link HttpError} | {@link HttpConnector} | Transient, retried inside the fetcher |
 * | `AbortError` | pool, fetcher, reconciler | Cooperative stop requested by the caller |
 *
 * Running out of rounds without converging is not an error: the reconciler
 * reports it as the `EXHAUSTED` terminal state.
 */

/**
 * Invalid job configuration (bbox ordering or range, zoom ordering or range,
 * missing fields) or a plan that cannot be built from it.
 */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Non-2xx response from a tile or cache endpoint. */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} fetching ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

export function createAbortError(message = 'Operation aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/** Throw an `AbortError` when `signal` has been aborted. */
export function ensureNotAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim()) return error.message;
  return String(error);
}
