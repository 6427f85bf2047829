/**
 * @module geometry/project
 *
 * Spherical Web Mercator projection from WGS84 geographic coordinates to the
 * slippy-map tile grid.
 *
 * Projection first maps into a **unit square** where both X and Y range
 * from 0 to 1 over the valid world, then scales by `2^zoom` and floors to get
 * a tile column and row. Nothing is clamped here: a latitude beyond the
 * Mercator limit (~85.0511 degrees) yields a row outside the grid, and a
 * malformed input yields `NaN`. Clipping into the grid is the planner's job.
 *
 * **Coordinate conventions:**
 * - **X**: 0 = antimeridian (180 W), 0.5 = prime meridian, 1 = antimeridian (180 E).
 * - **Y**: 0 = north edge, 1 = south edge (rows grow southward).
 */

const PI = Math.PI;

/**
 * Project a WGS84 longitude to mercator X in [0, 1] space.
 *
 * @example
 * ```ts
 * projectX(0);    // => 0.5
 * projectX(-180); // => 0
 * projectX(180);  // => 1
 * ```
 */
export function projectX(lon: number): number {
  return (lon + 180) / 360;
}

/**
 * Project a WGS84 latitude to mercator Y using
 * `(1 - asinh(tan(lat)) / PI) / 2`.
 *
 * Y = 0 is the northern edge of the projected world and Y = 1 the southern
 * edge. The result is **not** clamped.
 *
 * @example
 * ```ts
 * projectY(0);       // => 0.5
 * projectY(85.0511); // => ~0
 * ```
 */
export function projectY(lat: number): number {
  const rad = (lat * PI) / 180;
  return (1 - Math.asinh(Math.tan(rad)) / PI) / 2;
}

/**
 * Map a geographic position to the tile column and row containing it at
 * `zoom`.
 *
 * `column = floor((lon + 180) / 360 * 2^zoom)` and
 * `row = floor((1 - asinh(tan(lat)) / PI) / 2 * 2^zoom)`.
 *
 * @param lat - Latitude in decimal degrees.
 * @param lon - Longitude in decimal degrees.
 * @param zoom - Integer zoom level.
 * @returns Unclipped grid position; may lie outside `[0, 2^zoom)` or be `NaN`.
 *
 * @example
 * ```ts
 * project(35.7, 32.2, 1); // => { column: 1, row: 0 }
 * ```
 */
export function project(lat: number, lon: number, zoom: number): { column: number; row: number } {
  const n = 2 ** zoom;
  return {
    column: Math.floor(projectX(lon) * n),
    row: Math.floor(projectY(lat) * n),
  };
}

