/**
 * @module report
 *
 * Renderings of validation and reconciliation results: operator-facing
 * text, machine-readable JSON, and a TileJSON descriptor for the finished
 * tileset.
 */

import type { JobConfig } from './config.js';
import type { ReconcileResult, RoundSummary, TerminalState } from './reconcile.js';
import { tileBBox } from './tiles.js';
import type { CoveragePlan, TileCoord, TileJSON, ValidationReport, ZoomStats } from './types.js';

/** Web mercator latitude limit, used for world-wide bounds. */
const MERCATOR_MAX_LAT = 85.0511;

export interface FormatReportOptions {
  /** Missing coordinates listed before the "... and N more" line. @defaultValue 10 */
  sampleSize?: number;
}

/**
 * Render a validation report as text lines.
 *
 * @example
 * ```typescript
 * formatReport(report, { sampleSize: 2 });
 * // [
 * //   'Expected tiles: 5',
 * //   'Valid tiles: 2',
 * //   'Missing tiles: 3',
 * //   'Completion rate: 40.0%',
 * //   'Zoom 0: 1/1 valid (100.0%), 0 missing',
 * //   'Zoom 1: 1/4 valid (25.0%), 3 missing',
 * //   'Missing tiles (first 2):',
 * //   '  1. zoom 1, x 0, y 1',
 * //   '  2. zoom 1, x 1, y 0',
 * //   '  ... and 1 more',
 * // ]
 * ```
 */
export function formatReport(report: ValidationReport, options: FormatReportOptions = {}): string[] {
  const sampleSize = options.sampleSize ?? 10;
  const lines = [
    `Expected tiles: ${formatCount(report.expected)}`,
    `Valid tiles: ${formatCount(report.valid)}`,
    `Missing tiles: ${formatCount(report.missingCount)}`,
    `Completion rate: ${report.completionRate.toFixed(1)}%`,
    ...report.zooms.map(formatZoom),
  ];

  if (report.missing.length > 0 && sampleSize > 0) {
    const sample = report.missing.slice(0, sampleSize);
    lines.push(`Missing tiles (first ${sample.length}):`);
    sample.forEach((t, i) => lines.push(`  ${i + 1}. zoom ${t.z}, x ${t.x}, y ${t.y}`));
    const rest = report.missing.length - sample.length;
    if (rest > 0) lines.push(`  ... and ${formatCount(rest)} more`);
  }

  return lines;
}

function formatZoom(zoom: ZoomStats): string {
  return (
    `Zoom ${zoom.zoom}: ${formatCount(zoom.valid)}/${formatCount(zoom.expected)} valid ` +
    `(${zoom.completionRate.toFixed(1)}%), ${formatCount(zoom.missing)} missing`
  );
}

function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

// ─── JSON ───────────────────────────────────────────────────────────────────

/** `[z, x, y]` */
export type TileTriple = [number, number, number];

export interface ValidationJSON {
  expected: number;
  valid: number;
  missingCount: number;
  completionRate: number;
  zooms: ZoomStats[];
  missing: TileTriple[];
}

/** A sampled missing tile with its WGS84 extent. */
export interface MissingTileJSON {
  tile: TileTriple;
  /** `[west, south, east, north]` */
  bounds: [number, number, number, number];
}

export interface ReconcileJSON extends ValidationJSON {
  state: TerminalState;
  storeRoot: string;
  rounds: RoundSummary[];
  missingSample: MissingTileJSON[];
}

export function validationToJSON(report: ValidationReport): ValidationJSON {
  return {
    expected: report.expected,
    valid: report.valid,
    missingCount: report.missingCount,
    completionRate: report.completionRate,
    zooms: [...report.zooms],
    missing: report.missing.map((t): TileTriple => [t.z, t.x, t.y]),
  };
}

/** Structured form of a reconciliation result, ready for `JSON.stringify`. */
export function toJSONReport(result: ReconcileResult): ReconcileJSON {
  return {
    state: result.state,
    storeRoot: result.storeRoot,
    rounds: result.rounds,
    ...validationToJSON(result.report),
    missingSample: result.missingSample.map(describeMissing),
  };
}

function describeMissing(t: TileCoord): MissingTileJSON {
  const { minX, minY, maxX, maxY } = tileBBox(t.z, t.x, t.y);
  return { tile: [t.z, t.x, t.y], bounds: [minX, minY, maxX, maxY] };
}

// ─── TileJSON ───────────────────────────────────────────────────────────────

/**
 * TileJSON 3.0.0 descriptor for the raster tileset a job produces.
 *
 * `tileUrlTemplate` is where clients fetch the tiles from: the URL the store
 * is published under, or the render endpoint that produced it. Bounds come
 * from the job's bounding box, or the web mercator world for full coverage;
 * the center sits in the middle of the bounds at the lowest planned zoom.
 */
export function tileJSON(config: JobConfig, plan: CoveragePlan, tileUrlTemplate: string): TileJSON {
  const bounds: TileJSON['bounds'] =
    config.area.type === 'bbox'
      ? [config.area.bbox.minLon, config.area.bbox.minLat, config.area.bbox.maxLon, config.area.bbox.maxLat]
      : [-180, -MERCATOR_MAX_LAT, 180, MERCATOR_MAX_LAT];

  return {
    tilejson: '3.0.0',
    name: config.name,
    ...(config.description !== undefined ? { description: config.description } : {}),
    tiles: [tileUrlTemplate],
    bounds,
    minzoom: plan.zoomRange.minZoom,
    maxzoom: plan.zoomRange.maxZoom,
    center: [(bounds[0] + bounds[2]) / 2, (bounds[1] + bounds[3]) / 2, plan.zoomRange.minZoom],
  };
}
