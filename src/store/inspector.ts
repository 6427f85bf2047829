/**
 * @module store/inspector
 *
 * Tile store inspection: which planned tiles exist and are structurally
 * valid.
 *
 * A tile is valid when a file exists at its canonical path and its first
 * eight bytes are the PNG signature. This is a cheap structural check, not
 * an image decode: it rejects zero-byte files, truncated downloads and HTML
 * error pages saved as tiles, but accepts a well-formed PNG with the wrong
 * content. Inspection is read-only and runs with bounded parallelism.
 */

import { open, readdir, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, type Logger } from '../logger.js';
import { runPool } from '../pool.js';
import { compareTiles, tileId } from '../tiles.js';
import type { CoveragePlan, TileCoord, ValidationReport, ZoomStats } from '../types.js';
import { parseTilePath, tilePath } from './layout.js';

/** The fixed eight-byte PNG file signature. */
export const PNG_SIGNATURE = Uint8Array.of(
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
);

const DEFAULT_CONCURRENCY = 32;

export interface InspectOptions {
  /** Parallel file checks. @defaultValue 32 */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/** Result of walking a plan against the store. */
export interface Inspection {
  /** Planned coordinates without a valid artifact, sorted by {@link compareTiles}. */
  missing: TileCoord[];
  /** Per-zoom counts, ascending zoom. */
  zooms: ZoomStats[];
}

/** Whether `bytes` starts with {@link PNG_SIGNATURE}. */
export function hasPngSignature(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  for (let i = 0; i < PNG_SIGNATURE.length; i++) {
    if (bytes[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Check the artifact at `path`.
 *
 * Reads at most eight bytes. A missing file, a directory or any read error
 * counts as invalid; this never throws.
 */
export async function isValidTile(path: string, log?: Logger): Promise<boolean> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, 'r');
    const buf = new Uint8Array(PNG_SIGNATURE.length);
    const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
    return bytesRead === buf.length && hasPngSignature(buf);
  } catch (err) {
    if (!isNotFound(err)) {
      log?.debug('Tile check failed', { path, error: String(err) });
    }
    return false;
  } finally {
    await handle?.close();
  }
}

/**
 * Walk every planned coordinate and test its artifact.
 *
 * O(planned tile count); nothing is sampled.
 */
export async function inspectPlan(
  plan: CoveragePlan,
  storeRoot: string,
  options: InspectOptions = {},
): Promise<Inspection> {
  const log = options.logger ?? createLogger('inspector');
  const missing: TileCoord[] = [];
  const validByZoom = new Map<number, number>();

  await runPool(
    plan.tiles(),
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async tile => {
      if (await isValidTile(tilePath(storeRoot, tile), log)) {
        validByZoom.set(tile.z, (validByZoom.get(tile.z) ?? 0) + 1);
      } else {
        missing.push(tile);
      }
    },
    { signal: options.signal },
  );

  missing.sort(compareTiles);

  const zooms = plan.levels.map(level => {
    const valid = validByZoom.get(level.zoom) ?? 0;
    return {
      zoom: level.zoom,
      expected: level.count,
      valid,
      missing: level.count - valid,
      completionRate: rate(valid, level.count),
    };
  });

  return { missing, zooms };
}

/** Planned coordinates without a valid artifact. */
export async function findMissing(
  plan: CoveragePlan,
  storeRoot: string,
  options?: InspectOptions,
): Promise<TileCoord[]> {
  return (await inspectPlan(plan, storeRoot, options)).missing;
}

/**
 * Count valid artifacts by scanning the store tree itself, independent of
 * any plan. Only canonical `{z}/{x}/{y}.png` entries are considered, and
 * names that resolve to the same tile (`3/4/2.png`, `03/4/2.png`) count once.
 * A missing store root counts zero.
 */
export async function countValidInStore(
  storeRoot: string,
  options: InspectOptions = {},
): Promise<number> {
  const log = options.logger ?? createLogger('inspector');
  let entries: string[];
  try {
    entries = await readdir(storeRoot, { recursive: true });
  } catch (err) {
    if (isNotFound(err)) return 0;
    throw err;
  }

  const tiles: Array<{ entry: string; coord: TileCoord }> = [];
  for (const entry of entries) {
    const coord = parseTilePath(entry);
    if (coord) tiles.push({ entry, coord });
  }

  const valid = new Set<number>();
  await runPool(
    tiles,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async ({ entry, coord }) => {
      if (await isValidTile(join(storeRoot, entry), log)) valid.add(tileId(coord.z, coord.x, coord.y));
    },
    { signal: options.signal },
  );
  return valid.size;
}

/**
 * Full completeness snapshot of a project store against a plan.
 *
 * `valid` comes from {@link countValidInStore}, so artifacts left over from
 * a wider earlier plan are counted too and the rate can exceed 100.
 */
export async function validationReport(
  plan: CoveragePlan,
  storeRoot: string,
  options: InspectOptions = {},
): Promise<ValidationReport> {
  const { missing, zooms } = await inspectPlan(plan, storeRoot, options);
  const valid = await countValidInStore(storeRoot, options);

  return {
    expected: plan.count,
    valid,
    missingCount: missing.length,
    missing,
    completionRate: rate(valid, plan.count),
    zooms,
  };
}

function rate(valid: number, expected: number): number {
  return expected > 0 ? (valid / expected) * 100 : 0;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
