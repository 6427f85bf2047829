/**
 * @module connector
 *
 * Abstract read interface for tile objects.
 *
 * A {@link Connector} encapsulates the transport and authentication details
 * of a specific storage backend (render endpoint over HTTP, local cache
 * directory, S3 bucket) while exposing a uniform "read this whole tile"
 * API. The fetcher consumes Connectors without knowledge of the underlying
 * storage, so the same retry and validation logic applies to every backend.
 *
 * Connectors are **path-agnostic** -- a single Connector instance serves
 * reads for every tile, with paths interpreted in a backend-specific format
 * (URLs, filesystem paths, S3 URIs).
 *
 * Built-in implementations:
 *
 * | Connector | Backend | Path format |
 * |-----------|---------|-------------|
 * | {@link HttpConnector} | Render/cache endpoint over HTTP(S) | `http://localhost/tile/3/4/2.png` |
 * | {@link LocalConnector} | Local filesystem | `/var/cache/renderd/tiles/default/3/4/2.png` |
 * | {@link S3Connector} | AWS S3 / S3-compatible stores | `s3://bucket/tiles/3/4/2.png` |
 */

/** Per-read options. */
export interface ReadOptions {
  /**
   * Aborts this read. The fetcher passes its per-read timeout combined with
   * the round deadline; the cooperative stop signal is not forwarded.
   */
  signal?: AbortSignal;
}

export interface Connector {
  /**
   * Read the complete object at `path`.
   *
   * @param path - Connector-specific resource identifier.
   * @returns The object's bytes.
   * @throws {Error} If the object cannot be read (not found, non-2xx
   *   response, timeout, permission denied, etc.).
   */
  read(path: string, options?: ReadOptions): Promise<Uint8Array>;

  /**
   * Release all resources held by this connector. Calling `close()` on an
   * already-closed connector is a safe no-op.
   */
  close(): Promise<void>;
}
