/**
 * @module connectors/s3
 *
 * Amazon S3 {@link Connector} implementation using AWS SDK v3.
 *
 * Reads tile objects via `GetObject`. The `@aws-sdk/client-s3` module is
 * imported lazily at first use so that runs without an S3 cache never load
 * the SDK.
 *
 * Compatible with any S3-compatible object store (MinIO, Cloudflare R2,
 * Backblaze B2, etc.) via the `endpoint` and `forcePathStyle` options.
 */

import type { S3Client } from '@aws-sdk/client-s3';
import type { Connector, ReadOptions } from './connector.js';

type S3Module = typeof import('@aws-sdk/client-s3');

/**
 * Configuration options for {@link S3Connector}.
 */
export interface S3ConnectorOptions {
  /** AWS region for the S3 client (e.g. `"us-east-1"`). */
  region: string;
  /**
   * Explicit AWS credentials.
   *
   * When omitted, the SDK falls back to the default credential provider
   * chain (environment variables, shared credentials file, instance
   * metadata, etc.).
   */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    /** Session token for temporary credentials (STS). */
    sessionToken?: string;
  };
  /** Custom endpoint URL for S3-compatible object stores. */
  endpoint?: string;
  /**
   * Force path-style addressing (`endpoint/bucket/key`) instead of the
   * default virtual-hosted style (`bucket.endpoint/key`).
   */
  forcePathStyle?: boolean;
}

/**
 * Parse an S3 path string into its bucket name and object key.
 *
 * Accepts both the `s3://` URI scheme and bare `bucket/key` format:
 *
 * - `"s3://my-bucket/tiles/3/4/2.png"` -> `{ bucket: "my-bucket", key: "tiles/3/4/2.png" }`
 * - `"my-bucket/tiles/3/4/2.png"` -> `{ bucket: "my-bucket", key: "tiles/3/4/2.png" }`
 *
 * @throws {Error} If the path has no key portion.
 */
export function parseS3Path(path: string): { bucket: string; key: string } {
  let normalized = path;
  if (normalized.startsWith('s3://')) {
    normalized = normalized.slice(5);
  }
  const slashIdx = normalized.indexOf('/');
  if (slashIdx <= 0 || slashIdx === normalized.length - 1) {
    throw new Error(`Invalid S3 path (no key): ${path}`);
  }
  return {
    bucket: normalized.slice(0, slashIdx),
    key: normalized.slice(slashIdx + 1),
  };
}

/**
 * S3 connector using AWS SDK v3 (`@aws-sdk/client-s3`).
 *
 * The S3 client is created lazily on the first read and reused for all
 * subsequent requests. Call {@link S3Connector.close} to destroy the
 * client and release its HTTP connection pool.
 *
 * @example
 * ```typescript
 * const cache = new S3Connector({ region: 'eu-central-1' });
 * const png = await cache.read('s3://tile-cache/default/3/4/2.png');
 * await cache.close();
 * ```
 */
export class S3Connector implements Connector {
  private readonly clientOptions: S3ConnectorOptions;
  private state: { client: S3Client; sdk: S3Module } | null = null;
  private statePromise: Promise<{ client: S3Client; sdk: S3Module }> | null = null;

  /**
   * The underlying `S3Client` is **not** created until the first read, so
   * construction is synchronous and never throws.
   */
  constructor(options: S3ConnectorOptions) {
    this.clientOptions = options;
  }

  /**
   * Read a whole S3 object.
   *
   * @throws {Error} If the response body is empty, the SDK call fails
   *   (`NoSuchKey`, permissions, network errors, etc.), or `options.signal`
   *   aborts the request.
   */
  async read(path: string, options?: ReadOptions): Promise<Uint8Array> {
    const { client, sdk } = await this.getClient();
    const { bucket, key } = parseS3Path(path);

    const response = await client.send(
      new sdk.GetObjectCommand({ Bucket: bucket, Key: key }),
      { abortSignal: options?.signal },
    );

    if (!response.Body) {
      throw new Error(`Empty response body for ${path}`);
    }

    return response.Body.transformToByteArray();
  }

  /**
   * Destroy the underlying `S3Client`. Safe to call more than once.
   */
  async close(): Promise<void> {
    this.statePromise = null;
    if (this.state) {
      this.state.client.destroy();
      this.state = null;
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * Lazily load the SDK and construct the client. Concurrent calls during
   * initialization share one promise; a failed initialization is cleared so
   * the next call can retry.
   */
  private getClient(): Promise<{ client: S3Client; sdk: S3Module }> {
    if (this.state) return Promise.resolve(this.state);

    if (!this.statePromise) {
      this.statePromise = this.initClient().catch((err: unknown) => {
        this.statePromise = null;
        throw err;
      });
    }

    return this.statePromise;
  }

  private async initClient(): Promise<{ client: S3Client; sdk: S3Module }> {
    const sdk = await import('@aws-sdk/client-s3');
    const { region, credentials, endpoint, forcePathStyle } = this.clientOptions;

    const client = new sdk.S3Client({
      region,
      ...(credentials ? { credentials } : {}),
      ...(endpoint ? { endpoint } : {}),
      ...(forcePathStyle ? { forcePathStyle: true } : {}),
    });

    this.state = { client, sdk };
    return this.state;
  }
}
