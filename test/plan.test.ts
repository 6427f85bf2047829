import { describe, it, expect } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { countTiles, levelRange, levelTiles, planCoverage } from '../src/plan.js';
import { tileKey } from '../src/tiles.js';
import type { CoverageArea } from '../src/types.js';

const ISLAND: CoverageArea = {
  type: 'bbox',
  bbox: { minLon: 32.2, minLat: 34.5, maxLon: 34.7, maxLat: 35.7 },
};

const WORLD: CoverageArea = { type: 'full' };

describe('levelRange', () => {
  it('should cover the full grid for full coverage', () => {
    expect(levelRange(WORLD, 3)).toEqual({
      zoom: 3, minColumn: 0, maxColumn: 7, minRow: 0, maxRow: 7, count: 64,
    });
  });

  it('should span the projected corners of a bbox', () => {
    expect(levelRange(ISLAND, 1)).toEqual({
      zoom: 1, minColumn: 1, maxColumn: 1, minRow: 0, maxRow: 0, count: 1,
    });
    expect(levelRange(ISLAND, 8)).toEqual({
      zoom: 8, minColumn: 150, maxColumn: 152, minRow: 100, maxRow: 101, count: 6,
    });
  });

  it('should clip bounds beyond the mercator limit into the grid', () => {
    const polar: CoverageArea = {
      type: 'bbox',
      bbox: { minLon: -180, minLat: -89, maxLon: 180, maxLat: 89 },
    };
    expect(levelRange(polar, 1)).toEqual({
      zoom: 1, minColumn: 0, maxColumn: 1, minRow: 0, maxRow: 1, count: 4,
    });
  });

  it('should reject a bbox that does not project', () => {
    const broken: CoverageArea = {
      type: 'bbox',
      bbox: { minLon: Number.NaN, minLat: 0, maxLon: 10, maxLat: 10 },
    };
    expect(() => levelRange(broken, 0)).toThrow(ConfigError);
    expect(() => levelRange(broken, 0)).toThrow(/does not project at zoom 0/);
  });

  it('should reject an inverted rectangle', () => {
    const inverted: CoverageArea = {
      type: 'bbox',
      bbox: { minLon: 10, minLat: -10, maxLon: -10, maxLat: 10 },
    };
    expect(levelRange(inverted, 0).count).toBe(1);
    expect(() => levelRange(inverted, 1)).toThrow(/inverted tile rectangle at zoom 1/);
  });
});

describe('planCoverage', () => {
  it('should plan one level per zoom in ascending order', () => {
    const plan = planCoverage(ISLAND, { minZoom: 0, maxZoom: 2 });
    expect(plan.levels.map(l => l.zoom)).toEqual([0, 1, 2]);
    expect(plan.count).toBe(3);
  });

  it('should enumerate zoom, column, row ascending', () => {
    const plan = planCoverage(WORLD, { minZoom: 0, maxZoom: 1 });
    expect([...plan.tiles()].map(tileKey)).toEqual(['0/0/0', '1/0/0', '1/0/1', '1/1/0', '1/1/1']);
  });

  it('should enumerate exactly count distinct tiles', () => {
    const plan = planCoverage(ISLAND, { minZoom: 0, maxZoom: 10 });
    const keys = new Set([...plan.tiles()].map(tileKey));
    expect(keys.size).toBe(plan.count);
  });

  it('should restart enumeration on every call', () => {
    const plan = planCoverage(WORLD, { minZoom: 1, maxZoom: 1 });
    expect([...plan.tiles()]).toEqual([...plan.tiles()]);
  });

  it('should answer membership from the ranges', () => {
    const plan = planCoverage(ISLAND, { minZoom: 0, maxZoom: 1 });
    expect(plan.has({ z: 1, x: 1, y: 0 })).toBe(true);
    expect(plan.has({ z: 1, x: 0, y: 0 })).toBe(false);
    expect(plan.has({ z: 5, x: 0, y: 0 })).toBe(false);
  });

  it('should be deterministic', () => {
    const a = planCoverage(ISLAND, { minZoom: 3, maxZoom: 9 });
    const b = planCoverage(ISLAND, { minZoom: 3, maxZoom: 9 });
    expect(a.levels).toEqual(b.levels);
  });

  it('should reject an inverted or fractional zoom range', () => {
    expect(() => planCoverage(WORLD, { minZoom: 3, maxZoom: 2 })).toThrow(ConfigError);
    expect(() => planCoverage(WORLD, { minZoom: 0.5, maxZoom: 2 })).toThrow('Invalid zoom range');
  });

  it('should reject zoom levels beyond the supported maximum', () => {
    expect(() => planCoverage(WORLD, { minZoom: 0, maxZoom: 21 })).toThrow(
      'Invalid zoom range: min_zoom 0, max_zoom 21',
    );
  });
});

describe('countTiles', () => {
  it('should sum 4^z over the world', () => {
    expect(countTiles(WORLD, { minZoom: 0, maxZoom: 2 })).toBe(21);
  });

  it('should handle zoom 20 without enumerating', () => {
    expect(countTiles(WORLD, { minZoom: 20, maxZoom: 20 })).toBe(4 ** 20);
  });

  it('should validate the zoom range like the planner', () => {
    expect(() => countTiles(WORLD, { minZoom: 3, maxZoom: 1 })).toThrow(ConfigError);
    expect(() => countTiles(WORLD, { minZoom: 0, maxZoom: 21 })).toThrow('Invalid zoom range');
  });

  it('should agree with the plan total', () => {
    const range = { minZoom: 0, maxZoom: 14 };
    expect(countTiles(ISLAND, range)).toBe(planCoverage(ISLAND, range).count);
  });
});

describe('levelTiles', () => {
  it('should walk columns outer and rows inner', () => {
    const tiles = [...levelTiles({ zoom: 4, minColumn: 2, maxColumn: 3, minRow: 5, maxRow: 6, count: 4 })];
    expect(tiles.map(tileKey)).toEqual(['4/2/5', '4/2/6', '4/3/5', '4/3/6']);
  });
});
