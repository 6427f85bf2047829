/**
 * @module config
 *
 * Job configuration and runtime options.
 *
 * A job file is the JSON document produced by the surrounding tool:
 *
 * ```json
 * {
 *   "name": "cyprus",
 *   "render_type": "bbox",
 *   "bbox": { "min_lon": 32.2, "min_lat": 34.5, "max_lon": 34.7, "max_lat": 35.7 },
 *   "zoom_levels": { "min_zoom": 0, "max_zoom": 12 }
 * }
 * ```
 *
 * Keys this library does not use (`pbf_path`, `style`, `tile_size`,
 * timestamps) are accepted and dropped. Validation happens once, here, and
 * reports every problem at once as a {@link ConfigError}.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from './errors.js';
import type { BackoffOptions } from './fetcher.js';
import { MAX_ZOOM } from './tiles.js';
import type { CoverageArea, ZoomRange } from './types.js';

// ─── Job file ───────────────────────────────────────────────────────────────

const BBoxSchema = z
  .object({
    min_lon: z.number().min(-180).max(180),
    min_lat: z.number().min(-90).max(90),
    max_lon: z.number().min(-180).max(180),
    max_lat: z.number().min(-90).max(90),
  })
  .superRefine((bbox, ctx) => {
    if (bbox.min_lon >= bbox.max_lon) {
      ctx.addIssue({ code: 'custom', path: ['max_lon'], message: 'max_lon must be greater than min_lon' });
    }
    if (bbox.min_lat >= bbox.max_lat) {
      ctx.addIssue({ code: 'custom', path: ['max_lat'], message: 'max_lat must be greater than min_lat' });
    }
  });

const ZoomLevelsSchema = z
  .object({
    min_zoom: z.number().int().min(0).max(MAX_ZOOM),
    max_zoom: z.number().int().min(0).max(MAX_ZOOM),
  })
  .superRefine((zoom, ctx) => {
    if (zoom.min_zoom > zoom.max_zoom) {
      ctx.addIssue({ code: 'custom', path: ['max_zoom'], message: 'max_zoom must not be below min_zoom' });
    }
  });

export const JobFileSchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1, 'name must not be empty')
      .refine(name => !/[/\\]/.test(name) && name !== '.' && name !== '..', {
        message: 'name must be a single path segment',
      }),
    description: z.string().optional(),
    render_type: z.enum(['bbox', 'full']),
    bbox: BBoxSchema.optional(),
    zoom_levels: ZoomLevelsSchema,
  })
  .superRefine((job, ctx) => {
    if (job.render_type === 'bbox' && !job.bbox) {
      ctx.addIssue({ code: 'custom', path: ['bbox'], message: 'bbox is required when render_type is "bbox"' });
    }
  });

/** Validated job, in the shape the rest of the library consumes. */
export interface JobConfig {
  readonly name: string;
  readonly description?: string;
  readonly area: CoverageArea;
  readonly zoomRange: ZoomRange;
}

/**
 * Validate a parsed job document.
 *
 * @throws {ConfigError} Listing every violation found.
 */
export function parseJobConfig(raw: unknown): JobConfig {
  const parsed = JobFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid job configuration', formatIssues(parsed.error));
  }

  const job = parsed.data;
  const area: CoverageArea =
    job.render_type === 'bbox' && job.bbox
      ? {
          type: 'bbox',
          bbox: {
            minLon: job.bbox.min_lon,
            minLat: job.bbox.min_lat,
            maxLon: job.bbox.max_lon,
            maxLat: job.bbox.max_lat,
          },
        }
      : { type: 'full' };

  return Object.freeze({
    name: job.name,
    ...(job.description !== undefined ? { description: job.description } : {}),
    area,
    zoomRange: { minZoom: job.zoom_levels.min_zoom, maxZoom: job.zoom_levels.max_zoom },
  });
}

/**
 * Read and validate a job file.
 *
 * @throws {ConfigError} If the file cannot be read, is not JSON, or fails
 *   validation.
 */
export async function loadJobConfig(path: string): Promise<JobConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read job file ${path}`, [toErrorMessage(err)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Job file ${path} is not valid JSON`, [toErrorMessage(err)]);
  }

  return parseJobConfig(raw);
}

// ─── Runtime options ────────────────────────────────────────────────────────

/** Runtime knobs of a reconciliation run. */
export interface ReconcileOptions {
  /** Directory holding one store per project. */
  outputRoot: string;
  /** Render endpoint base URL or `{z}/{x}/{y}` template. */
  sourceUrl: string;
  /** Cache path or URL template consulted before the render endpoint. */
  cacheTemplate?: string;
  /** Tiles fetched in parallel. */
  concurrency: number;
  /** Attempts per tile per round. */
  maxAttempts: number;
  /** Reconciliation rounds, including the first. */
  maxRounds: number;
  /** Per-request timeout in milliseconds. */
  timeout: number;
  /** Per-round wall clock budget in milliseconds; unbounded when absent. */
  roundTimeout?: number;
  backoff: BackoffOptions;
  /** Extra request headers for the render endpoint. */
  headers: Record<string, string>;
  /** Missing coordinates listed in logs and text reports. */
  sampleSize: number;
}

export const DEFAULT_RECONCILE_OPTIONS: Readonly<ReconcileOptions> = Object.freeze({
  outputRoot: './tiles',
  sourceUrl: 'http://localhost/tile',
  concurrency: 4,
  maxAttempts: 5,
  maxRounds: 3,
  timeout: 30_000,
  backoff: { base: 500, jitter: 100 },
  headers: {},
  sampleSize: 10,
});

/** Environment variables read by {@link resolveOptions}. */
export const ENV_VARS = {
  outputRoot: 'TILE_CONVERGE_OUTPUT',
  sourceUrl: 'TILE_CONVERGE_SOURCE_URL',
  cacheTemplate: 'TILE_CONVERGE_CACHE',
  concurrency: 'TILE_CONVERGE_CONCURRENCY',
  maxAttempts: 'TILE_CONVERGE_ATTEMPTS',
  maxRounds: 'TILE_CONVERGE_ROUNDS',
  timeout: 'TILE_CONVERGE_TIMEOUT',
  roundTimeout: 'TILE_CONVERGE_ROUND_TIMEOUT',
} as const satisfies Partial<Record<keyof ReconcileOptions, string>>;

const positiveInt = z.number().int().min(1);

const ReconcileOptionsSchema = z.object({
  outputRoot: z.string().min(1),
  sourceUrl: z.string().min(1),
  cacheTemplate: z.string().min(1).optional(),
  concurrency: positiveInt,
  maxAttempts: positiveInt,
  maxRounds: positiveInt,
  timeout: z.number().positive(),
  roundTimeout: z.number().positive().optional(),
  backoff: z.object({ base: z.number().min(0), jitter: z.number().min(0) }),
  headers: z.record(z.string()),
  sampleSize: z.number().int().min(0),
});

/**
 * Resolve runtime options with the precedence
 * explicit value → `TILE_CONVERGE_*` environment variable → built-in default.
 *
 * @example
 * ```typescript
 * // TILE_CONVERGE_CONCURRENCY=8 in the environment
 * resolveOptions({ maxRounds: 5 });
 * // → { ..., concurrency: 8, maxRounds: 5, maxAttempts: 5, ... }
 * ```
 *
 * @throws {ConfigError} If a resolved value is out of range or an
 *   environment variable is not a number where one is expected.
 */
export function resolveOptions(
  explicit: Partial<ReconcileOptions> = {},
  env: NodeJS.ProcessEnv = process.env,
): ReconcileOptions {
  const issues: string[] = [];
  const envNumber = (key: keyof typeof ENV_VARS): number | undefined => {
    const value = env[ENV_VARS[key]];
    if (value === undefined || value.trim() === '') return undefined;
    const n = Number(value);
    if (!Number.isFinite(n)) {
      issues.push(`${ENV_VARS[key]}: expected a number, got "${value}"`);
      return undefined;
    }
    return n;
  };
  const envString = (key: keyof typeof ENV_VARS): string | undefined => {
    const value = env[ENV_VARS[key]];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  const defaults = DEFAULT_RECONCILE_OPTIONS;
  const roundTimeout = explicit.roundTimeout ?? envNumber('roundTimeout');
  const cacheTemplate = explicit.cacheTemplate ?? envString('cacheTemplate');

  const merged: ReconcileOptions = {
    outputRoot: explicit.outputRoot ?? envString('outputRoot') ?? defaults.outputRoot,
    sourceUrl: explicit.sourceUrl ?? envString('sourceUrl') ?? defaults.sourceUrl,
    ...(cacheTemplate !== undefined ? { cacheTemplate } : {}),
    concurrency: explicit.concurrency ?? envNumber('concurrency') ?? defaults.concurrency,
    maxAttempts: explicit.maxAttempts ?? envNumber('maxAttempts') ?? defaults.maxAttempts,
    maxRounds: explicit.maxRounds ?? envNumber('maxRounds') ?? defaults.maxRounds,
    timeout: explicit.timeout ?? envNumber('timeout') ?? defaults.timeout,
    ...(roundTimeout !== undefined ? { roundTimeout } : {}),
    backoff: { ...defaults.backoff, ...explicit.backoff },
    headers: { ...defaults.headers, ...explicit.headers },
    sampleSize: explicit.sampleSize ?? defaults.sampleSize,
  };

  const parsed = ReconcileOptionsSchema.safeParse(merged);
  if (!parsed.success) issues.push(...formatIssues(parsed.error));
  if (issues.length > 0) {
    throw new ConfigError('Invalid runtime options', issues);
  }

  return merged;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
