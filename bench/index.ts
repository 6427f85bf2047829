/**
 * Performance benchmarks for tile-converge.
 *
 * These benchmarks exercise the CPU-bound stages on their own, measuring
 * throughput in operations/sec and tiles/sec. Nothing touches the network
 * or the filesystem.
 *
 * Run: npm run bench
 */

import { project } from '../src/geometry/project.js';
import { countTiles, planCoverage } from '../src/plan.js';
import { PNG_SIGNATURE, hasPngSignature } from '../src/store/inspector.js';
import { expandTemplate, parseTilePath, tilePath } from '../src/store/layout.js';
import type { CoverageArea } from '../src/types.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function bench(name: string, fn: () => void, iterations: number): void {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 100); i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  const elapsed = performance.now() - start;

  const opsPerSec = (iterations / elapsed) * 1000;
  const usPerOp = (elapsed / iterations) * 1000;

  console.log(
    `  ${name.padEnd(45)} ${fmt(opsPerSec, 0).padStart(12)} ops/s  ${fmt(usPerOp, 1).padStart(10)} µs/op`,
  );
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

const ISLAND: CoverageArea = {
  type: 'bbox',
  bbox: { minLon: 32.2, minLat: 34.5, maxLon: 34.7, maxLat: 35.7 },
};

const WORLD: CoverageArea = { type: 'full' };

// ─── Benchmark suites ───────────────────────────────────────────────────────

function benchProjection() {
  console.log('\n── Projection (WGS84 → tile column/row) ──');

  const points = new Float64Array(2000);
  for (let i = 0; i < points.length; i += 2) {
    points[i] = -180 + Math.random() * 360;
    points[i + 1] = -85 + Math.random() * 170;
  }

  bench('1,000 points at zoom 14', () => {
    for (let i = 0; i < points.length; i += 2) project(points[i + 1], points[i], 14);
  }, 10000);
}

function benchCounting() {
  console.log('\n── Closed-form counting ──');

  bench('island bbox, zoom 0-20', () => countTiles(ISLAND, { minZoom: 0, maxZoom: 20 }), 50000);
  bench('world, zoom 0-20', () => countTiles(WORLD, { minZoom: 0, maxZoom: 20 }), 50000);
}

function benchEnumeration() {
  console.log('\n── Plan enumeration ──');

  for (const maxZoom of [10, 12, 14]) {
    const plan = planCoverage(ISLAND, { minZoom: 0, maxZoom });
    const start = performance.now();
    let n = 0;
    for (const tile of plan.tiles()) {
      if (tile.z >= 0) n++;
    }
    const elapsed = performance.now() - start;
    console.log(
      `  ${`island bbox, zoom 0-${maxZoom} (${fmt(n, 0)} tiles)`.padEnd(45)} ` +
        `${fmt((n / elapsed) * 1000, 0).padStart(12)} tiles/s`,
    );
  }
}

function benchAddressing() {
  console.log('\n── Addressing ──');

  const coord = { z: 12, x: 2415, y: 1617 };
  const template = 'http://localhost/tile/{z}/{x}/{y}.png';

  bench('expandTemplate', () => expandTemplate(template, coord), 200000);
  bench('tilePath', () => tilePath('./tiles/demo', coord), 200000);
  bench('parseTilePath', () => parseTilePath('12/2415/1617.png'), 200000);
}

function benchSignature() {
  console.log('\n── PNG signature check ──');

  const png = new Uint8Array(4096);
  png.set(PNG_SIGNATURE);
  const html = new TextEncoder().encode('<html><body>Service unavailable</body></html>');

  bench('valid PNG header', () => hasPngSignature(png), 500000);
  bench('HTML error page', () => hasPngSignature(html), 500000);
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  tile-converge Performance Benchmarks                                ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

benchProjection();
benchCounting();
benchEnumeration();
benchAddressing();
benchSignature();

console.log('\nDone.');
