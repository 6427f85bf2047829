/**
 * @module types
 *
 * Shared type definitions for the tile-converge engine.
 *
 * This module defines the data structures that flow between stages:
 *
 * - **GeoBBox / ZoomRange**: the validated geographic and zoom inputs
 * - **TileCoord**: the atomic unit of work and of storage addressing
 * - **LevelRange / CoveragePlan**: the expected tile set per zoom level
 * - **ZoomStats / ValidationReport**: what the store currently holds
 * - **TileJSON**: TileJSON 3.0.0 metadata for the produced raster tileset
 *
 * Every value here is treated as immutable once produced.
 */

// ─── Bounding Box ───────────────────────────────────────────────────────────

/**
 * Axis-aligned bounding box.
 *
 * Used for WGS84 tile extents and TileJSON bounds.
 */
export interface BBox {
  /** Minimum X (western longitude). */
  minX: number;
  /** Minimum Y (southern latitude). */
  minY: number;
  /** Maximum X (eastern longitude). */
  maxX: number;
  /** Maximum Y (northern latitude). */
  maxY: number;
}

/**
 * A validated geographic rectangle in decimal degrees.
 *
 * Guaranteed by {@link parseJobConfig} to satisfy `minLon < maxLon`,
 * `minLat < maxLat`, longitudes in [-180, 180] and latitudes in [-90, 90].
 */
export interface GeoBBox {
  readonly minLon: number;
  readonly minLat: number;
  readonly maxLon: number;
  readonly maxLat: number;
}

/** Inclusive zoom range, integers in [0, 20] with `minZoom <= maxZoom`. */
export interface ZoomRange {
  readonly minZoom: number;
  readonly maxZoom: number;
}

/**
 * The area a plan must cover.
 *
 * `full` ignores any bounding box and plans the entire `2^z x 2^z` grid at
 * every zoom level.
 */
export type CoverageArea =
  | { readonly type: 'bbox'; readonly bbox: GeoBBox }
  | { readonly type: 'full' };

// ─── Tiles ──────────────────────────────────────────────────────────────────

/**
 * Slippy-map tile address. `0 <= x, y < 2^z`; `y = 0` is the northern edge.
 */
export interface TileCoord {
  readonly z: number;
  readonly x: number;
  readonly y: number;
}

/**
 * Clipped column/row rectangle planned at one zoom level.
 */
export interface LevelRange {
  readonly zoom: number;
  readonly minColumn: number;
  readonly maxColumn: number;
  readonly minRow: number;
  readonly maxRow: number;
  /** `(maxColumn - minColumn + 1) * (maxRow - minRow + 1)`. */
  readonly count: number;
}

/**
 * The exact set of tiles required to cover an area over a zoom range.
 *
 * Levels are ordered by ascending zoom. Enumeration through {@link tiles}
 * is lazy and restartable: every call starts a fresh generator over the
 * same immutable ranges.
 */
export interface CoveragePlan {
  readonly area: CoverageArea;
  readonly zoomRange: ZoomRange;
  readonly levels: readonly LevelRange[];
  /** Closed-form total over all levels. */
  readonly count: number;
  /** Lazily enumerate every planned coordinate (zoom, column, row ascending). */
  tiles(): Generator<TileCoord, void, undefined>;
  /** Whether a coordinate falls inside the planned rectangle of its zoom level. */
  has(coord: TileCoord): boolean;
}

// ─── Validation ─────────────────────────────────────────────────────────────

/** Planned versus valid tile counts for one zoom level. */
export interface ZoomStats {
  readonly zoom: number;
  readonly expected: number;
  readonly valid: number;
  readonly missing: number;
  /** Percentage in [0, 100]; 0 when nothing is expected. */
  readonly completionRate: number;
}

/**
 * Snapshot of store completeness against a plan.
 *
 * Derived on demand from the filesystem and the plan; never persisted.
 */
export interface ValidationReport {
  /** Closed-form planned tile count. */
  readonly expected: number;
  /** Valid PNG artifacts found by scanning the store itself. */
  readonly valid: number;
  readonly missingCount: number;
  /** Planned coordinates without a valid artifact, in plan order. */
  readonly missing: readonly TileCoord[];
  /** `valid / expected * 100`, or 0 when `expected` is 0. */
  readonly completionRate: number;
  readonly zooms: readonly ZoomStats[];
}

// ─── TileJSON ───────────────────────────────────────────────────────────────

/**
 * TileJSON 3.0.0 metadata descriptor for a raster tileset.
 *
 * @see {@link https://github.com/mapbox/tilejson-spec/tree/master/3.0.0 | TileJSON 3.0.0 Spec}
 */
export interface TileJSON {
  /** Specification version, always `"3.0.0"`. */
  tilejson: '3.0.0';
  /** Human-readable tileset name. */
  name?: string;
  description?: string;
  /** Tile URL templates. */
  tiles: string[];
  /** WGS84 bounding box: `[west, south, east, north]`. */
  bounds: [number, number, number, number];
  minzoom: number;
  maxzoom: number;
  /** `[longitude, latitude, zoom]`. */
  center: [number, number, number];
}
