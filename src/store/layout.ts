/**
 * @module store/layout
 *
 * Addressing for tile artifacts and tile sources.
 *
 * Artifacts live at `{outputRoot}/{project}/{z}/{x}/{y}.png`, one file per
 * tile. Sources (render endpoint, cache location) are addressed through URL
 * or path templates carrying `{z}`, `{x}` and `{y}` placeholders; the
 * aliases `{zoom}`, `{column}` and `{row}` are accepted as well.
 */

import { join, sep } from 'node:path';
import { isInGrid } from '../tiles.js';
import type { TileCoord } from '../types.js';

const PLACEHOLDER = /\{(z|x|y|zoom|column|row)\}/g;

/** Root directory holding every artifact of one project. */
export function projectRoot(outputRoot: string, projectName: string): string {
  return join(outputRoot, projectName);
}

/** Canonical artifact path for `coord` under a project root. */
export function tilePath(storeRoot: string, coord: TileCoord): string {
  return join(storeRoot, String(coord.z), String(coord.x), `${coord.y}.png`);
}

/**
 * Substitute a coordinate into a URL or path template.
 *
 * @example
 * ```typescript
 * expandTemplate('http://localhost/tile/{z}/{x}/{y}.png', { z: 3, x: 4, y: 2 });
 * // => 'http://localhost/tile/3/4/2.png'
 * ```
 */
export function expandTemplate(template: string, coord: TileCoord): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    switch (name) {
      case 'z':
      case 'zoom':
        return String(coord.z);
      case 'x':
      case 'column':
        return String(coord.x);
      default:
        return String(coord.y);
    }
  });
}

export function hasPlaceholders(template: string): boolean {
  return /\{(z|x|y|zoom|column|row)\}/.test(template);
}

/**
 * Turn a tile endpoint into a template.
 *
 * A base URL without placeholders gets the `/{z}/{x}/{y}.png` suffix of the
 * render endpoint convention; a template is returned unchanged.
 *
 * @example
 * ```typescript
 * sourceTemplate('http://localhost/tile/');
 * // => 'http://localhost/tile/{z}/{x}/{y}.png'
 * ```
 */
export function sourceTemplate(baseUrl: string): string {
  if (hasPlaceholders(baseUrl)) return baseUrl;
  return `${baseUrl.replace(/\/+$/, '')}/{z}/{x}/{y}.png`;
}

/**
 * Parse a store-relative artifact path (`"3/4/5.png"`) back into a
 * coordinate. Anything that is not a canonical in-grid tile path yields
 * `null`.
 */
export function parseTilePath(relative: string): TileCoord | null {
  const parts = relative.split(sep === '/' ? '/' : /[\\/]/);
  if (parts.length !== 3) return null;

  const [zs, xs, file] = parts;
  const match = /^(\d+)\.png$/.exec(file);
  if (!match || !/^\d+$/.test(zs) || !/^\d+$/.test(xs)) return null;

  const coord = { z: Number(zs), x: Number(xs), y: Number(match[1]) };
  return isInGrid(coord) ? coord : null;
}
