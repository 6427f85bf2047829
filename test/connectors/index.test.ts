import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  HttpConnector,
  LocalConnector,
  S3Connector,
  connectorFor,
  connectorKind,
} from '../../src/connectors/index.js';

describe('connectorKind', () => {
  it('should classify by scheme', () => {
    expect(connectorKind('http://localhost/tile/{z}/{x}/{y}.png')).toBe('http');
    expect(connectorKind('HTTPS://cdn.example.com/{z}/{x}/{y}.png')).toBe('http');
    expect(connectorKind('s3://tile-cache/{z}/{x}/{y}.png')).toBe('s3');
    expect(connectorKind('/var/cache/renderd/tiles/default/{z}/{x}/{y}.png')).toBe('local');
    expect(connectorKind('relative/{z}/{x}/{y}.png')).toBe('local');
  });
});

describe('connectorFor', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should create the matching connector', () => {
    expect(connectorFor('https://cdn.example.com/{z}/{x}/{y}.png')).toBeInstanceOf(HttpConnector);
    expect(connectorFor('s3://tile-cache/{z}/{x}/{y}.png')).toBeInstanceOf(S3Connector);
    expect(connectorFor('/var/cache/renderd/tiles/default/{z}/{x}/{y}.png')).toBeInstanceOf(LocalConnector);
  });

  it('should create S3 connectors without touching the SDK', async () => {
    vi.stubEnv('AWS_REGION', 'ap-south-1');
    const connector = connectorFor('s3://tile-cache/{z}/{x}/{y}.png');
    await expect(connector.close()).resolves.toBeUndefined();
  });
});
