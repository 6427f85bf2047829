/**
 * @module connectors
 *
 * Connector selection by path scheme.
 */

import type { Connector } from './connector.js';
import { HttpConnector, type HttpConnectorOptions } from './http.js';
import { LocalConnector } from './local.js';
import { S3Connector, type S3ConnectorOptions } from './s3.js';

export { HttpConnector, LocalConnector, S3Connector };
export type { Connector, ReadOptions } from './connector.js';
export type { HttpConnectorOptions } from './http.js';
export type { LocalConnectorOptions } from './local.js';
export type { S3ConnectorOptions } from './s3.js';

export type ConnectorKind = 'http' | 's3' | 'local';

export interface ConnectorForOptions {
  http?: HttpConnectorOptions;
  /** S3 client settings. The region falls back to `AWS_REGION`, then `us-east-1`. */
  s3?: Partial<S3ConnectorOptions>;
}

/** Classify a path or template by its scheme. */
export function connectorKind(pathOrTemplate: string): ConnectorKind {
  if (/^https?:\/\//i.test(pathOrTemplate)) return 'http';
  if (pathOrTemplate.startsWith('s3://')) return 's3';
  return 'local';
}

/**
 * Create the connector that can read `pathOrTemplate`:
 *
 * | Prefix | Connector |
 * |--------|-----------|
 * | `http://`, `https://` | {@link HttpConnector} |
 * | `s3://` | {@link S3Connector} |
 * | anything else | {@link LocalConnector} |
 */
export function connectorFor(pathOrTemplate: string, options: ConnectorForOptions = {}): Connector {
  switch (connectorKind(pathOrTemplate)) {
    case 'http':
      return new HttpConnector(options.http);
    case 's3':
      return new S3Connector({
        ...options.s3,
        region: options.s3?.region ?? process.env.AWS_REGION ?? 'us-east-1',
      });
    case 'local':
      return new LocalConnector();
  }
}
