import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import {
  expandTemplate,
  hasPlaceholders,
  parseTilePath,
  projectRoot,
  sourceTemplate,
  tilePath,
} from '../../src/store/layout.js';

describe('store layout', () => {
  it('should nest project stores under the output root', () => {
    expect(projectRoot('tiles', 'cyprus')).toBe(join('tiles', 'cyprus'));
  });

  it('should place artifacts at z/x/y.png', () => {
    expect(tilePath(join('tiles', 'cyprus'), { z: 3, x: 4, y: 2 })).toBe(join('tiles', 'cyprus', '3', '4', '2.png'));
  });

  describe('expandTemplate', () => {
    it('should substitute z, x and y', () => {
      expect(expandTemplate('http://localhost/tile/{z}/{x}/{y}.png', { z: 3, x: 4, y: 2 }))
        .toBe('http://localhost/tile/3/4/2.png');
    });

    it('should accept the long placeholder names', () => {
      expect(expandTemplate('/cache/{zoom}/{column}/{row}.png', { z: 7, x: 70, y: 50 }))
        .toBe('/cache/7/70/50.png');
    });

    it('should replace repeated placeholders', () => {
      expect(expandTemplate('{z}-{z}', { z: 2, x: 0, y: 0 })).toBe('2-2');
    });
  });

  describe('sourceTemplate', () => {
    it('should append the tile suffix to a base URL', () => {
      expect(sourceTemplate('http://localhost/tile')).toBe('http://localhost/tile/{z}/{x}/{y}.png');
      expect(sourceTemplate('http://localhost/tile//')).toBe('http://localhost/tile/{z}/{x}/{y}.png');
    });

    it('should leave a template unchanged', () => {
      const template = 'https://tiles.example.com/{z}/{x}/{y}@2x.png';
      expect(sourceTemplate(template)).toBe(template);
      expect(hasPlaceholders(template)).toBe(true);
      expect(hasPlaceholders('http://localhost/tile')).toBe(false);
    });
  });

  describe('parseTilePath', () => {
    it('should parse canonical artifact paths', () => {
      expect(parseTilePath(join('3', '4', '2.png'))).toEqual({ z: 3, x: 4, y: 2 });
    });

    it('should reject other files and out-of-grid cells', () => {
      expect(parseTilePath('tilejson.json')).toBeNull();
      expect(parseTilePath(join('3', '4', '2.png.123.1.tmp'))).toBeNull();
      expect(parseTilePath(join('3', '4', '2.jpg'))).toBeNull();
      expect(parseTilePath(join('1', '2', '0.png'))).toBeNull();
      expect(parseTilePath(join('a', '4', '2.png'))).toBeNull();
      expect(parseTilePath(join('extra', '3', '4', '2.png'))).toBeNull();
    });
  });
});
