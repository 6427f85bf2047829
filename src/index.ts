/**
 * @module tile-converge
 *
 * Public API surface for the tile-converge library.
 *
 * tile-converge computes the exact set of raster tiles needed to cover an
 * area over a zoom range, fetches every missing tile from a render endpoint
 * (optionally a cache first), checks that each artifact is a PNG, and keeps
 * going in rounds until the store matches the plan or the round budget runs
 * out.
 *
 * ---
 *
 * ### API Tiers
 *
 * | Tier | Export | State | Use case |
 * |------|--------|-------|----------|
 * | **Stateful** | {@link Reconciler} | Job, options, connectors, fetcher | Full plan → fetch → validate loop with round bookkeeping and hooks. |
 * | **Semi-stateful** | {@link TileFetcher} | Connectors and retry policy | Caller-driven fetching of individual tiles. |
 * | **Stateless** | {@link fetchTile}, {@link planCoverage}, {@link validationReport} | None | One-off planning, fetching or validation. |
 *
 * ---
 *
 * ### Connectors
 *
 * Connectors read whole tile objects from render endpoints and caches.
 * Each implements the {@link Connector} interface:
 *
 * | Connector | Backend | Path format |
 * |-----------|---------|-------------|
 * | {@link LocalConnector} | Local filesystem | `/var/cache/renderd/tiles/default/{z}/{x}/{y}.png` |
 * | {@link HttpConnector} | HTTP/HTTPS | `http://localhost/tile/{z}/{x}/{y}.png` |
 * | {@link S3Connector} | AWS S3 / S3-compatible stores | `s3://bucket/tiles/{z}/{x}/{y}.png` |
 */

// ─── API Tiers ──────────────────────────────────────────────────────────────

export { Reconciler } from './reconcile.js';
export { TileFetcher, fetchTile, backoffDelay } from './fetcher.js';
export { planCoverage, countTiles, levelRange } from './plan.js';

// ─── Store ──────────────────────────────────────────────────────────────────

export {
  isValidTile,
  hasPngSignature,
  findMissing,
  inspectPlan,
  countValidInStore,
  validationReport,
  PNG_SIGNATURE,
} from './store/inspector.js';
export { projectRoot, tilePath, expandTemplate, sourceTemplate } from './store/layout.js';

// ─── Configuration & reporting ──────────────────────────────────────────────

export { loadJobConfig, parseJobConfig, resolveOptions, DEFAULT_RECONCILE_OPTIONS } from './config.js';
export { formatReport, toJSONReport, validationToJSON, tileJSON } from './report.js';
export { ConfigError, HttpError, isAbortError } from './errors.js';
export { createLogger, silentLogger } from './logger.js';

// ─── Connectors ─────────────────────────────────────────────────────────────

export { LocalConnector } from './connectors/local.js';
export { HttpConnector } from './connectors/http.js';
export { S3Connector } from './connectors/s3.js';
export { connectorFor } from './connectors/index.js';

// ─── Geometry ───────────────────────────────────────────────────────────────

export { project } from './geometry/project.js';
export { tileKey, tileId, tileBBox, MAX_ZOOM } from './tiles.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { Connector, ReadOptions } from './connectors/connector.js';
export type { LocalConnectorOptions } from './connectors/local.js';
export type { HttpConnectorOptions } from './connectors/http.js';
export type { S3ConnectorOptions } from './connectors/s3.js';
export type { JobConfig, ReconcileOptions } from './config.js';
export type { BackoffOptions, FetchOutcome, FetchSource, TileFetcherOptions } from './fetcher.js';
export type {
  ReconcileResult,
  ReconcileState,
  ReconcilerDeps,
  ReconcilerHooks,
  RoundSummary,
  TerminalState,
} from './reconcile.js';
export type { MissingTileJSON, ReconcileJSON, ValidationJSON, TileTriple } from './report.js';
export type { Logger, LogLevel } from './logger.js';
export type {
  BBox,
  CoverageArea,
  CoveragePlan,
  GeoBBox,
  LevelRange,
  TileCoord,
  TileJSON,
  ValidationReport,
  ZoomRange,
  ZoomStats,
} from './types.js';
