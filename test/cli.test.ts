import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createProgram, type CliDeps, type CliIO } from '../src/cli.js';
import { HttpError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { MockConnector, healthySource, makeTempDir, writeTile } from './helpers/mock-connector.js';

const WORLD_JOB = {
  name: 'world',
  render_type: 'full',
  zoom_levels: { min_zoom: 0, max_zoom: 1 },
};

interface Captured {
  io: CliIO;
  out: string[];
  err: string[];
  exitCode(): number | undefined;
}

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  let code: number | undefined;
  return {
    io: {
      out: text => out.push(text),
      err: text => err.push(text),
      setExitCode: c => {
        code = c;
      },
    },
    out,
    err,
    exitCode: () => code,
  };
}

describe('cli', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = join(dir, 'world.json');
    await writeFile(configPath, JSON.stringify(WORLD_JOB));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function run(args: string[], deps: CliDeps = {}): Promise<Captured> {
    const captured = capture();
    await createProgram(captured.io, { logger: silentLogger, env: {}, ...deps }).parseAsync(args, { from: 'user' });
    return captured;
  }

  describe('plan', () => {
    it('should print per-zoom ranges and the total', async () => {
      const { out, exitCode } = await run(['plan', configPath]);

      expect(out).toEqual([
        'Project: world',
        'Zoom 0: columns 0-0, rows 0-0 (1 tiles)',
        'Zoom 1: columns 0-1, rows 0-1 (4 tiles)',
        'Total: 5 tiles',
      ]);
      expect(exitCode()).toBe(0);
    });

    it('should print JSON', async () => {
      const { out } = await run(['plan', configPath, '--json']);
      const parsed: unknown = JSON.parse(out[0]);
      expect(parsed).toMatchObject({ name: 'world', count: 5 });
    });

    it('should exit 1 on an invalid job file', async () => {
      await writeFile(configPath, JSON.stringify({ ...WORLD_JOB, zoom_levels: { min_zoom: 4, max_zoom: 2 } }));

      const { out, err, exitCode } = await run(['plan', configPath]);

      expect(out).toEqual([]);
      expect(err).toEqual([
        'Error: Invalid job configuration: zoom_levels.max_zoom: max_zoom must not be below min_zoom',
      ]);
      expect(exitCode()).toBe(1);
    });
  });

  describe('validate', () => {
    it('should exit 2 for an incomplete store', async () => {
      const { out, exitCode } = await run(['validate', configPath, '--output', dir, '--sample', '1']);

      expect(out.slice(0, 5)).toEqual([
        'Project: world',
        'Expected tiles: 5',
        'Valid tiles: 0',
        'Missing tiles: 5',
        'Completion rate: 0.0%',
      ]);
      expect(out.slice(-3)).toEqual(['Missing tiles (first 1):', '  1. zoom 0, x 0, y 0', '  ... and 4 more']);
      expect(exitCode()).toBe(2);
    });

    it('should exit 0 and print JSON for a complete store', async () => {
      for (const tile of [
        { z: 0, x: 0, y: 0 },
        { z: 1, x: 0, y: 0 },
        { z: 1, x: 0, y: 1 },
        { z: 1, x: 1, y: 0 },
        { z: 1, x: 1, y: 1 },
      ]) {
        await writeTile(join(dir, 'world'), tile);
      }

      const { out, exitCode } = await run(['validate', configPath, '--output', dir, '--json']);

      expect(JSON.parse(out[0])).toMatchObject({ expected: 5, valid: 5, missingCount: 0, missing: [] });
      expect(exitCode()).toBe(0);
    });

    it('should take the output root from the environment', async () => {
      await writeTile(join(dir, 'world'), { z: 0, x: 0, y: 0 });

      const { out } = await run(['validate', configPath, '--json'], { env: { TILE_CONVERGE_OUTPUT: dir } });

      expect(JSON.parse(out[0])).toMatchObject({ valid: 1, missingCount: 4 });
    });
  });

  describe('run', () => {
    it('should converge and exit 0', async () => {
      const { out, exitCode } = await run(['run', configPath, '--output', dir], { source: healthySource() });

      expect(out.slice(0, 2)).toEqual(['Project: world', 'State: CONVERGED after 1 round(s)']);
      expect(out).toContain('Completion rate: 100.0%');
      expect(exitCode()).toBe(0);
    });

    it('should write tilejson.json into the project store', async () => {
      await run(['run', configPath, '--output', dir, '--tilejson', '--source-url', 'http://renderer/tile/'], {
        source: healthySource(),
      });

      const descriptor: unknown = JSON.parse(await readFile(join(dir, 'world', 'tilejson.json'), 'utf8'));
      expect(descriptor).toMatchObject({
        tilejson: '3.0.0',
        name: 'world',
        tiles: ['http://renderer/tile/{z}/{x}/{y}.png'],
        minzoom: 0,
        maxzoom: 1,
      });
    });

    it('should point tilejson.json at a separate tile URL when given one', async () => {
      await run(
        ['run', configPath, '--output', dir, '--tilejson', '--tile-url', 'https://tiles.example.test/world'],
        { source: healthySource() },
      );

      const descriptor: unknown = JSON.parse(await readFile(join(dir, 'world', 'tilejson.json'), 'utf8'));
      expect(descriptor).toMatchObject({ tiles: ['https://tiles.example.test/world/{z}/{x}/{y}.png'] });
    });

    it('should exit 2 and report JSON when tiles stay missing', async () => {
      const source = new MockConnector(path => new HttpError(503, path));

      const { out, exitCode } = await run(
        ['run', configPath, '--output', dir, '--rounds', '1', '--attempts', '1', '--json'],
        { source },
      );

      expect(JSON.parse(out[0])).toMatchObject({ state: 'EXHAUSTED', missingCount: 5, valid: 0 });
      expect(source.calls).toHaveLength(5);
      expect(exitCode()).toBe(2);
    });

    it('should exit 1 on invalid environment options', async () => {
      const { err, exitCode } = await run(['run', configPath], {
        source: healthySource(),
        env: { TILE_CONVERGE_ROUNDS: 'lots' },
      });

      expect(err).toEqual(['Error: Invalid runtime options: TILE_CONVERGE_ROUNDS: expected a number, got "lots"']);
      expect(exitCode()).toBe(1);
    });

    it('should refuse a non-positive concurrency', async () => {
      const captured = capture();
      const program = createProgram(captured.io, { logger: silentLogger, env: {} });

      await expect(
        program.parseAsync(['run', configPath, '--concurrency', '0'], { from: 'user' }),
      ).rejects.toMatchObject({ code: 'commander.invalidArgument' });
      expect(captured.err.join('')).toContain('Expected a positive integer.');
    });
  });
});
