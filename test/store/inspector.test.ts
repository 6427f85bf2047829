import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { silentLogger } from '../../src/logger.js';
import { planCoverage } from '../../src/plan.js';
import {
  countValidInStore,
  findMissing,
  hasPngSignature,
  inspectPlan,
  isValidTile,
  PNG_SIGNATURE,
  validationReport,
} from '../../src/store/inspector.js';
import { tileKey } from '../../src/tiles.js';
import { HTML_PAGE, makeTempDir, pngBytes, writeTile } from '../helpers/mock-connector.js';

const WORLD_0_1 = planCoverage({ type: 'full' }, { minZoom: 0, maxZoom: 1 });

describe('hasPngSignature', () => {
  it('should accept bytes starting with the signature', () => {
    expect(hasPngSignature(pngBytes())).toBe(true);
    expect(hasPngSignature(PNG_SIGNATURE)).toBe(true);
  });

  it('should reject other payloads', () => {
    expect(hasPngSignature(HTML_PAGE)).toBe(false);
    expect(hasPngSignature(new Uint8Array(0))).toBe(false);
    expect(hasPngSignature(PNG_SIGNATURE.subarray(0, 7))).toBe(false);
  });
});

describe('tile store inspector', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('isValidTile', () => {
    it('should accept a file with the PNG signature', async () => {
      const path = await writeTile(root, { z: 0, x: 0, y: 0 });
      expect(await isValidTile(path)).toBe(true);
    });

    it('should reject an HTML error page saved as a tile', async () => {
      const path = await writeTile(root, { z: 0, x: 0, y: 0 }, HTML_PAGE);
      expect(await isValidTile(path)).toBe(false);
    });

    it('should reject an empty file', async () => {
      const path = await writeTile(root, { z: 0, x: 0, y: 0 }, new Uint8Array(0));
      expect(await isValidTile(path)).toBe(false);
    });

    it('should reject a truncated file holding part of the signature', async () => {
      const path = await writeTile(root, { z: 0, x: 0, y: 0 }, PNG_SIGNATURE.subarray(0, 4));
      expect(await isValidTile(path)).toBe(false);
    });

    it('should report a missing file or a directory as invalid', async () => {
      expect(await isValidTile(join(root, 'nope.png'))).toBe(false);
      await mkdir(join(root, 'dir.png'));
      expect(await isValidTile(join(root, 'dir.png'), silentLogger)).toBe(false);
    });
  });

  describe('inspectPlan', () => {
    beforeEach(async () => {
      await writeTile(root, { z: 0, x: 0, y: 0 });
      await writeTile(root, { z: 1, x: 0, y: 0 });
      await writeTile(root, { z: 1, x: 0, y: 1 }, HTML_PAGE);
      await writeTile(root, { z: 1, x: 1, y: 1 });
    });

    it('should list missing and invalid coordinates in plan order', async () => {
      const { missing } = await inspectPlan(WORLD_0_1, root, { logger: silentLogger });
      expect(missing.map(tileKey)).toEqual(['1/0/1', '1/1/0']);
    });

    it('should count per zoom level', async () => {
      const { zooms } = await inspectPlan(WORLD_0_1, root, { concurrency: 1, logger: silentLogger });
      expect(zooms).toEqual([
        { zoom: 0, expected: 1, valid: 1, missing: 0, completionRate: 100 },
        { zoom: 1, expected: 4, valid: 2, missing: 2, completionRate: 50 },
      ]);
    });

    it('should expose the missing set directly', async () => {
      const missing = await findMissing(WORLD_0_1, root, { logger: silentLogger });
      expect(missing).toEqual([{ z: 1, x: 0, y: 1 }, { z: 1, x: 1, y: 0 }]);
    });
  });

  describe('countValidInStore', () => {
    it('should count canonical valid artifacts anywhere in the store', async () => {
      await writeTile(root, { z: 0, x: 0, y: 0 });
      await writeTile(root, { z: 5, x: 3, y: 9 });
      await writeTile(root, { z: 1, x: 1, y: 1 }, HTML_PAGE);
      await writeFile(join(root, 'tilejson.json'), '{}');
      await writeFile(join(root, '0', '0', '0.png.1.1.tmp'), pngBytes());

      expect(await countValidInStore(root, { logger: silentLogger })).toBe(2);
    });

    it('should count a tile once when two names resolve to it', async () => {
      await writeTile(root, { z: 3, x: 4, y: 2 });
      await mkdir(join(root, '03', '4'), { recursive: true });
      await writeFile(join(root, '03', '4', '2.png'), pngBytes());

      expect(await countValidInStore(root, { logger: silentLogger })).toBe(1);
    });

    it('should count zero for a store that does not exist', async () => {
      expect(await countValidInStore(join(root, 'missing'))).toBe(0);
    });
  });

  describe('validationReport', () => {
    it('should report an empty store as 0 %', async () => {
      const report = await validationReport(WORLD_0_1, root, { logger: silentLogger });
      expect(report).toMatchObject({ expected: 5, valid: 0, missingCount: 5, completionRate: 0 });
      expect(report.missing).toHaveLength(5);
    });

    it('should combine the plan walk with the store scan', async () => {
      await writeTile(root, { z: 0, x: 0, y: 0 });
      await writeTile(root, { z: 1, x: 0, y: 0 });
      await writeTile(root, { z: 1, x: 1, y: 1 });
      await writeTile(root, { z: 2, x: 0, y: 0 });

      const report = await validationReport(WORLD_0_1, root, { logger: silentLogger });
      expect(report.expected).toBe(5);
      expect(report.valid).toBe(4);
      expect(report.missingCount).toBe(2);
      expect(report.completionRate).toBe(80);
    });

    it('should exceed 100 % when the store holds tiles outside the plan', async () => {
      const plan = planCoverage({ type: 'full' }, { minZoom: 0, maxZoom: 0 });
      await writeTile(root, { z: 0, x: 0, y: 0 });
      await writeTile(root, { z: 1, x: 0, y: 0 });

      const report = await validationReport(plan, root, { logger: silentLogger });
      expect(report.missingCount).toBe(0);
      expect(report.completionRate).toBe(200);
    });
  });
});
