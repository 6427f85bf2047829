/**
 * @module reconcile
 *
 * Round-based reconciliation of a tile store against its coverage plan.
 *
 * ```text
 * PLANNING ─▶ FETCHING ─▶ REVALIDATING ─┬─▶ CONVERGED
 *                 ▲                     ├─▶ PARTIAL
 *                 └──── missing shrank ─┴─▶ EXHAUSTED
 * ```
 *
 * Every round fetches the coordinates the previous validation found
 * missing, then validates the whole plan again. A coordinate belongs to
 * exactly one fetch task per round, so there is a single writer per
 * artifact path. Rounds stop when nothing is missing, when a round makes no
 * progress, when the round budget is spent, or when a round overruns its
 * time budget.
 */

import type { JobConfig, ReconcileOptions } from './config.js';
import type { Connector } from './connectors/connector.js';
import { HttpConnector } from './connectors/http.js';
import { connectorFor } from './connectors/index.js';
import { ensureNotAborted } from './errors.js';
import { TileFetcher, type FetchOutcome } from './fetcher.js';
import { createLogger, type Logger } from './logger.js';
import { planCoverage } from './plan.js';
import { runPool } from './pool.js';
import { validationReport } from './store/inspector.js';
import { projectRoot, sourceTemplate, tilePath } from './store/layout.js';
import { tileKey } from './tiles.js';
import type { CoveragePlan, TileCoord, ValidationReport } from './types.js';

export type TerminalState = 'CONVERGED' | 'PARTIAL' | 'EXHAUSTED';
export type ReconcileState = 'PLANNING' | 'FETCHING' | 'REVALIDATING' | TerminalState;

/** What one reconciliation round did. */
export interface RoundSummary {
  /** 1-based round number. */
  round: number;
  /** Fetch tasks started. */
  attempted: number;
  succeeded: number;
  failed: number;
  /** Successes served from the cache. */
  fromCache: number;
  missingBefore: number;
  missingAfter: number;
  durationMs: number;
  /** The round hit its time budget and stopped dispatching. */
  timedOut: boolean;
}

export interface ReconcileResult {
  state: TerminalState;
  rounds: RoundSummary[];
  /** Validation of the store after the last round. */
  report: ValidationReport;
  /** First few coordinates still missing, in plan order. */
  missingSample: TileCoord[];
  plan: CoveragePlan;
  /** Directory holding this project's artifacts. */
  storeRoot: string;
}

/** Progress callbacks. Exceptions thrown by a hook abort the run. */
export interface ReconcilerHooks {
  onStateChange?: (state: ReconcileState, previous: ReconcileState | null) => void;
  onRound?: (summary: RoundSummary) => void;
  onTile?: (outcome: FetchOutcome) => void;
}

/**
 * Collaborators of a {@link Reconciler}. Anything left out is built from the
 * resolved options.
 */
export interface ReconcilerDeps extends ReconcilerHooks {
  /** Render endpoint connector. @defaultValue an {@link HttpConnector} */
  source?: Connector;
  /** Cache connector, used when `cacheTemplate` is set. @defaultValue chosen by scheme */
  cache?: Connector;
  logger?: Logger;
}

export interface RunOptions {
  /**
   * Cooperative stop. Aborting before planning rejects with an `AbortError`;
   * aborting later ends the run as `PARTIAL` with an up-to-date report.
   */
  signal?: AbortSignal;
}

/**
 * Drives a store toward completeness for one job.
 *
 * @example
 * ```typescript
 * const job = await loadJobConfig('./cyprus.json');
 * const reconciler = new Reconciler(job, resolveOptions({ maxRounds: 5 }));
 *
 * const result = await reconciler.run();
 * if (result.state !== 'CONVERGED') {
 *   console.error(formatReport(result.report).join('\n'));
 * }
 * ```
 */
export class Reconciler {
  private readonly job: JobConfig;
  private readonly options: ReconcileOptions;
  private readonly deps: ReconcilerDeps;
  private readonly log: Logger;
  private state: ReconcileState | null = null;

  constructor(job: JobConfig, options: ReconcileOptions, deps: ReconcilerDeps = {}) {
    this.job = job;
    this.options = options;
    this.deps = deps;
    this.log = deps.logger ?? createLogger('reconcile');
  }

  async run(options: RunOptions = {}): Promise<ReconcileResult> {
    const { signal } = options;
    ensureNotAborted(signal);

    this.transition('PLANNING');
    const plan = planCoverage(this.job.area, this.job.zoomRange);
    const storeRoot = projectRoot(this.options.outputRoot, this.job.name);

    this.log.info('Coverage planned', {
      project: this.job.name,
      expected: plan.count,
      minZoom: plan.zoomRange.minZoom,
      maxZoom: plan.zoomRange.maxZoom,
    });

    let report = await this.validate(plan, storeRoot);
    const rounds: RoundSummary[] = [];

    if (report.missingCount === 0) {
      const summary: RoundSummary = {
        round: 1,
        attempted: 0,
        succeeded: 0,
        failed: 0,
        fromCache: 0,
        missingBefore: 0,
        missingAfter: 0,
        durationMs: 0,
        timedOut: false,
      };
      rounds.push(summary);
      this.deps.onRound?.(summary);
      return this.finish('CONVERGED', { rounds, report, plan, storeRoot });
    }

    const owned: Connector[] = [];
    const fetcher = this.createFetcher(owned);

    try {
      let missing = report.missing;
      for (let round = 1; ; round++) {
        if (signal?.aborted) {
          return this.finish('PARTIAL', { rounds, report, plan, storeRoot });
        }

        this.transition('FETCHING');
        const started = performance.now();
        const counts = await this.fetchRound(fetcher, missing, storeRoot, signal);

        this.transition('REVALIDATING');
        report = await this.validate(plan, storeRoot);

        const summary: RoundSummary = {
          round,
          ...counts,
          missingBefore: missing.length,
          missingAfter: report.missingCount,
          durationMs: Math.round(performance.now() - started),
        };
        rounds.push(summary);
        this.logRound(summary, report);
        this.deps.onRound?.(summary);

        if (report.missingCount === 0) {
          return this.finish('CONVERGED', { rounds, report, plan, storeRoot });
        }
        if (signal?.aborted) {
          return this.finish('PARTIAL', { rounds, report, plan, storeRoot });
        }
        if (summary.timedOut) {
          this.log.warn('Round time budget exceeded', { round, roundTimeout: this.options.roundTimeout });
          return this.finish('EXHAUSTED', { rounds, report, plan, storeRoot });
        }
        if (report.missingCount >= missing.length) {
          this.log.warn('Round made no progress', { round, missing: report.missingCount });
          return this.finish('EXHAUSTED', { rounds, report, plan, storeRoot });
        }
        if (round >= this.options.maxRounds) {
          return this.finish('EXHAUSTED', { rounds, report, plan, storeRoot });
        }

        missing = report.missing;
      }
    } finally {
      await Promise.all(owned.map(connector => connector.close()));
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private async fetchRound(
    fetcher: TileFetcher,
    missing: readonly TileCoord[],
    storeRoot: string,
    signal: AbortSignal | undefined,
  ): Promise<Pick<RoundSummary, 'attempted' | 'succeeded' | 'failed' | 'fromCache' | 'timedOut'>> {
    const timeout =
      this.options.roundTimeout !== undefined ? AbortSignal.timeout(this.options.roundTimeout) : undefined;
    const stops = [signal, timeout].filter((s): s is AbortSignal => s !== undefined);
    const stop = stops.length > 0 ? AbortSignal.any(stops) : undefined;

    let succeeded = 0;
    let failed = 0;
    let fromCache = 0;

    const pool = await runPool(
      missing,
      this.options.concurrency,
      async tile => {
        const outcome = await fetcher.fetch(tile, tilePath(storeRoot, tile), { signal: stop, deadline: timeout });
        if (outcome.ok) {
          succeeded++;
          if (outcome.source === 'cache') fromCache++;
        } else {
          failed++;
          this.log.debug('Tile failed', { tile: tileKey(tile), attempts: outcome.attempts, error: outcome.error });
        }
        this.deps.onTile?.(outcome);
      },
      { signal: stop },
    );

    return {
      attempted: pool.started,
      succeeded,
      failed,
      fromCache,
      timedOut: timeout?.aborted === true && signal?.aborted !== true,
    };
  }

  /** Revalidation runs to completion even after a stop request. */
  private validate(plan: CoveragePlan, storeRoot: string): Promise<ValidationReport> {
    return validationReport(plan, storeRoot, { logger: this.log });
  }

  private createFetcher(owned: Connector[]): TileFetcher {
    const { options } = this;
    let source = this.deps.source;
    if (!source) {
      source = new HttpConnector({ headers: options.headers, timeout: options.timeout });
      owned.push(source);
    }

    let cache: { connector: Connector; template: string } | undefined;
    if (options.cacheTemplate !== undefined) {
      let connector = this.deps.cache;
      if (!connector) {
        connector = connectorFor(options.cacheTemplate, { http: { timeout: options.timeout } });
        owned.push(connector);
      }
      cache = { connector, template: options.cacheTemplate };
    }

    return new TileFetcher({
      source,
      sourceTemplate: sourceTemplate(options.sourceUrl),
      ...(cache ? { cache } : {}),
      maxAttempts: options.maxAttempts,
      timeout: options.timeout,
      backoff: options.backoff,
      logger: this.log,
    });
  }

  private logRound(summary: RoundSummary, report: ValidationReport): void {
    this.log.info('Round complete', {
      round: summary.round,
      attempted: summary.attempted,
      succeeded: summary.succeeded,
      failed: summary.failed,
      fromCache: summary.fromCache,
      missing: summary.missingAfter,
      durationMs: summary.durationMs,
    });
    for (const zoom of report.zooms) {
      this.log.info('Zoom level', {
        zoom: zoom.zoom,
        expected: zoom.expected,
        valid: zoom.valid,
        missing: zoom.missing,
        completionRate: Number(zoom.completionRate.toFixed(1)),
      });
    }
  }

  private finish(
    state: TerminalState,
    parts: Omit<ReconcileResult, 'state' | 'missingSample'>,
  ): ReconcileResult {
    this.transition(state);
    const missingSample = parts.report.missing.slice(0, this.options.sampleSize);

    if (state === 'CONVERGED') {
      this.log.info('Store converged', {
        project: this.job.name,
        rounds: parts.rounds.length,
        valid: parts.report.valid,
      });
    } else {
      this.log.warn('Tiles still missing', {
        project: this.job.name,
        state,
        missing: parts.report.missingCount,
        sample: missingSample.map(tileKey),
      });
    }

    return { state, missingSample, ...parts };
  }

  private transition(next: ReconcileState): void {
    const previous = this.state;
    this.state = next;
    this.log.debug('State change', { from: previous, to: next });
    this.deps.onStateChange?.(next, previous);
  }
}
