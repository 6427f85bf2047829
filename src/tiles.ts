/**
 * @module tiles
 *
 * Tile coordinate utilities.
 *
 * Provides identity (the `z/x/y` key and a numeric id), ordering, and the inverse
 * projection from a tile address back to its WGS84 extent. All functions in
 * this module are deterministic and side-effect-free.
 */

import type { BBox, TileCoord } from './types.js';

const PI = Math.PI;

/** Highest zoom level the engine plans for. */
export const MAX_ZOOM = 20;

// ─── Identity ───────────────────────────────────────────────────────────────

/** `"z/x/y"` form used in logs, reports and error messages. */
export function tileKey(coord: TileCoord): string {
  return `${coord.z}/${coord.x}/${coord.y}`;
}

/**
 * Unique numeric key for a coordinate, for sets and dedupe.
 *
 * Tiles of every lower zoom come first, then rows, then columns, so ids are
 * dense and ordered by zoom. Exact up to zoom 26.
 *
 * @example
 * ```typescript
 * tileId(0, 0, 0); // => 0
 * tileId(1, 1, 0); // => 2
 * tileId(2, 0, 0); // => 5
 * ```
 */
export function tileId(z: number, x: number, y: number): number {
  return (4 ** z - 1) / 3 + y * 2 ** z + x;
}

/**
 * Total order over tile coordinates: zoom, then column, then row. Matches
 * the enumeration order of a {@link CoveragePlan}.
 */
export function compareTiles(a: TileCoord, b: TileCoord): number {
  return a.z - b.z || a.x - b.x || a.y - b.y;
}

/** Whether `coord` addresses a cell inside the `2^z x 2^z` grid. */
export function isInGrid(coord: TileCoord): boolean {
  const n = 2 ** coord.z;
  return (
    Number.isInteger(coord.z) && coord.z >= 0 &&
    Number.isInteger(coord.x) && coord.x >= 0 && coord.x < n &&
    Number.isInteger(coord.y) && coord.y >= 0 && coord.y < n
  );
}

// ─── Tile → WGS84 BBox ─────────────────────────────────────────────────────

/**
 * Convert slippy map tile coordinates to a WGS84 bounding box.
 *
 * Uses the standard Web Mercator tile grid where `y = 0` is the top
 * (north) edge of the projection. The returned bounding box has
 * longitude values in `[-180, 180]` and latitude values within the
 * Web Mercator limits (~`-85.051` to ~`85.051`).
 *
 * @example
 * ```typescript
 * const bbox = tileBBox(1, 0, 0);
 * // bbox.minX === -180, bbox.maxX === 0
 * // bbox.minY ≈ 0,     bbox.maxY ≈ 85.051
 * ```
 */
export function tileBBox(z: number, x: number, y: number): BBox {
  const n = 2 ** z;
  return {
    minX: (x / n) * 360 - 180,
    minY: tileLatDeg(y + 1, n),
    maxX: ((x + 1) / n) * 360 - 180,
    maxY: tileLatDeg(y, n),
  };
}

/**
 * Convert a tile-grid Y position to latitude in degrees by applying the
 * inverse Mercator projection within an `n x n` grid.
 */
function tileLatDeg(y: number, n: number): number {
  const latRad = Math.atan(Math.sinh(PI - (2 * PI * y) / n));
  return (latRad * 180) / PI;
}
