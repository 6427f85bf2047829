/**
 * @module cli
 *
 * `tile-converge` command line.
 *
 * Usage:
 *   tile-converge plan <config> [--json]
 *   tile-converge validate <config> [--output <dir>] [--sample <n>] [--json]
 *   tile-converge run <config> [options]
 *
 * Exit codes:
 *   0  store complete (converged)
 *   1  invalid configuration or options
 *   2  store incomplete (exhausted, partial, or validation found gaps)
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { loadJobConfig, resolveOptions, type ReconcileOptions } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { planCoverage } from './plan.js';
import { Reconciler, type ReconcilerDeps } from './reconcile.js';
import { formatReport, tileJSON, toJSONReport, validationToJSON } from './report.js';
import { validationReport } from './store/inspector.js';
import { projectRoot, sourceTemplate } from './store/layout.js';

export const VERSION = '0.1.0';

export const EXIT_OK = 0;
export const EXIT_CONFIG = 1;
export const EXIT_INCOMPLETE = 2;

/** Where the CLI writes and how it reports its exit status. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  out: text => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
  err: text => process.stderr.write(text.endsWith('\n') ? text : `${text}\n`),
  setExitCode: code => {
    process.exitCode = code;
  },
};

export interface CliDeps extends Omit<ReconcilerDeps, 'logger'> {
  logger?: Logger;
  /** Environment consulted for `TILE_CONVERGE_*` defaults. @defaultValue process.env */
  env?: NodeJS.ProcessEnv;
}

interface PlanFlags {
  readonly json?: boolean;
}

interface ValidateFlags {
  readonly output?: string;
  readonly sample?: number;
  readonly json?: boolean;
}

interface RunFlags {
  readonly output?: string;
  readonly sourceUrl?: string;
  readonly cache?: string;
  readonly concurrency?: number;
  readonly attempts?: number;
  readonly rounds?: number;
  readonly timeout?: number;
  readonly roundTimeout?: number;
  readonly sample?: number;
  readonly json?: boolean;
  readonly tilejson?: boolean;
  readonly tileUrl?: string;
}

/**
 * Build the command tree. Commander errors are thrown as `CommanderError`
 * rather than exiting the process.
 */
export function createProgram(io: CliIO = processIO, deps: CliDeps = {}): Command {
  const log = deps.logger ?? createLogger('cli');
  const env = deps.env ?? process.env;

  const program = new Command()
    .name('tile-converge')
    .description('Plan, fetch and validate raster map tiles until the store matches its coverage plan')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command('plan')
    .description('Show the tile ranges and totals a job covers')
    .argument('<config>', 'job configuration file')
    .option('--json', 'output as JSON')
    .action(async (configPath: string, flags: PlanFlags) => {
      await withConfigErrors(io, async () => {
        const job = await loadJobConfig(configPath);
        const plan = planCoverage(job.area, job.zoomRange);

        if (flags.json) {
          io.out(JSON.stringify({ name: job.name, count: plan.count, levels: plan.levels }, null, 2));
        } else {
          io.out(`Project: ${job.name}`);
          for (const level of plan.levels) {
            io.out(
              `Zoom ${level.zoom}: columns ${level.minColumn}-${level.maxColumn}, ` +
                `rows ${level.minRow}-${level.maxRow} (${level.count.toLocaleString('en-US')} tiles)`,
            );
          }
          io.out(`Total: ${plan.count.toLocaleString('en-US')} tiles`);
        }
        io.setExitCode(EXIT_OK);
      });
    });

  program
    .command('validate')
    .description('Check the project store against the coverage plan')
    .argument('<config>', 'job configuration file')
    .option('-o, --output <dir>', 'output root holding project stores')
    .option('--sample <n>', 'missing tiles to list', parseCount)
    .option('--json', 'output as JSON')
    .action(async (configPath: string, flags: ValidateFlags) => {
      await withConfigErrors(io, async () => {
        const job = await loadJobConfig(configPath);
        const options = resolveOptions({ outputRoot: flags.output, sampleSize: flags.sample }, env);
        const plan = planCoverage(job.area, job.zoomRange);
        const report = await validationReport(plan, projectRoot(options.outputRoot, job.name), { logger: log });

        if (flags.json) {
          io.out(JSON.stringify(validationToJSON(report), null, 2));
        } else {
          io.out(`Project: ${job.name}`);
          for (const line of formatReport(report, { sampleSize: options.sampleSize })) io.out(line);
        }
        io.setExitCode(report.missingCount === 0 ? EXIT_OK : EXIT_INCOMPLETE);
      });
    });

  program
    .command('run')
    .description('Fetch missing tiles in rounds until the store converges')
    .argument('<config>', 'job configuration file')
    .option('-o, --output <dir>', 'output root holding project stores')
    .option('-s, --source-url <url>', 'render endpoint base URL or {z}/{x}/{y} template')
    .option('--cache <template>', 'cache path or URL template tried before the endpoint')
    .option('-c, --concurrency <n>', 'tiles fetched in parallel', parsePositive)
    .option('--attempts <n>', 'attempts per tile per round', parsePositive)
    .option('--rounds <n>', 'maximum reconciliation rounds', parsePositive)
    .option('--timeout <ms>', 'per-request timeout', parsePositive)
    .option('--round-timeout <ms>', 'per-round time budget', parsePositive)
    .option('--sample <n>', 'missing tiles to list', parseCount)
    .option('--json', 'output as JSON')
    .option('--tilejson', 'write tilejson.json into the project store')
    .option('--tile-url <template>', 'tile URL template for tilejson.json (default: the render endpoint)')
    .action(async (configPath: string, flags: RunFlags) => {
      await withConfigErrors(io, async () => {
        const job = await loadJobConfig(configPath);
        const explicit: Partial<ReconcileOptions> = {
          outputRoot: flags.output,
          sourceUrl: flags.sourceUrl,
          cacheTemplate: flags.cache,
          concurrency: flags.concurrency,
          maxAttempts: flags.attempts,
          maxRounds: flags.rounds,
          timeout: flags.timeout,
          roundTimeout: flags.roundTimeout,
          sampleSize: flags.sample,
        };
        const options = resolveOptions(explicit, env);

        const controller = new AbortController();
        const onSigint = () => {
          io.err('Interrupted, finishing in-flight tiles...');
          controller.abort();
        };
        process.once('SIGINT', onSigint);

        try {
          const reconciler = new Reconciler(job, options, { ...deps, logger: log });
          const result = await reconciler.run({ signal: controller.signal });

          if (flags.tilejson) {
            await mkdir(result.storeRoot, { recursive: true });
            const descriptor = tileJSON(job, result.plan, sourceTemplate(flags.tileUrl ?? options.sourceUrl));
            await writeFile(join(result.storeRoot, 'tilejson.json'), `${JSON.stringify(descriptor, null, 2)}\n`);
          }

          if (flags.json) {
            io.out(JSON.stringify(toJSONReport(result), null, 2));
          } else {
            io.out(`Project: ${job.name}`);
            io.out(`State: ${result.state} after ${result.rounds.length} round(s)`);
            for (const line of formatReport(result.report, { sampleSize: options.sampleSize })) io.out(line);
          }
          io.setExitCode(result.state === 'CONVERGED' ? EXIT_OK : EXIT_INCOMPLETE);
        } finally {
          process.off('SIGINT', onSigint);
        }
      });
    });

  return program;
}

async function withConfigErrors(io: CliIO, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    io.err(`Error: ${err.message}`);
    io.setExitCode(EXIT_CONFIG);
  }
}

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}
