/**
 * @module connectors/local
 *
 * Local filesystem {@link Connector} implementation, used to read a render
 * daemon's on-disk tile cache.
 */

import { readFile, stat } from 'node:fs/promises';
import type { Connector, ReadOptions } from './connector.js';

/**
 * Configuration options for {@link LocalConnector}.
 */
export interface LocalConnectorOptions {
  /**
   * Refuse files larger than this many bytes. A cached tile is a few
   * kilobytes; anything beyond the limit is not a tile.
   *
   * @defaultValue 16 MiB
   */
  maxFileSize?: number;
}

/**
 * Reads whole files from the local filesystem.
 *
 * @example
 * ```typescript
 * const cache = new LocalConnector();
 * const png = await cache.read('/var/cache/renderd/tiles/default/3/4/2.png');
 * ```
 */
export class LocalConnector implements Connector {
  private readonly maxFileSize: number;

  constructor(options?: LocalConnectorOptions) {
    this.maxFileSize = options?.maxFileSize ?? 16 * 1024 * 1024;
  }

  /**
   * Read the file at `path`.
   *
   * @throws {Error} If the file does not exist (`ENOENT`), is not a regular
   *   file, exceeds `maxFileSize`, or cannot be read.
   */
  async read(path: string, options?: ReadOptions): Promise<Uint8Array> {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new Error(`Not a regular file: ${path}`);
    }
    if (info.size > this.maxFileSize) {
      throw new Error(`File too large (${info.size} bytes): ${path}`);
    }

    const buf = await readFile(path, { signal: options?.signal });
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  /** Nothing to release: files are opened and closed per read. */
  async close(): Promise<void> {}
}
