/**
 * Tile Generator
 *
 * Produces the tiles that cover a circular search area at one zoom level,
 * ordered nearest-to-center first. Stopping early therefore leaves the
 * collected results biased toward the middle of the area.
 *
 * @module geo/tile-generator
 */

import type { GeoPoint } from '../schemas/common.js';
import {
  type Tile,
  groundTileWidthKm,
  haversineKm,
  pointToTile,
  tileCenter,
  tilesPerAxis,
} from './tiles.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A tile annotated with its center and its distance from the search center.
 */
export interface RankedTile extends Tile {
  readonly center: GeoPoint;
  readonly distanceKm: number;
}

/**
 * Summary of how one zoom level covers a search area.
 */
export interface CoverageStats {
  zoom: number;
  /** Tile side length on the ground at the center, in kilometres */
  tileWidthKm: number;
  /** Tiles from the center tile to the edge of the enumerated square */
  reach: number;
  /** Tiles kept after the distance filter */
  tileCount: number;
  /** Ground area of the kept tiles */
  coverageAreaKm2: number;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Largest square of candidate tiles a single zoom level may enumerate.
 */
export const MAX_CANDIDATE_TILES = 1_000_000;

// ============================================================================
// Generation
// ============================================================================

/**
 * Number of tiles needed from the center tile to reach the radius.
 *
 * Measured with the tile's ground width at `latitude`. Never less than one,
 * so the immediate neighbours are always considered, and never more than
 * half the grid, so no column is enumerated twice.
 */
export function tileReach(radiusKm: number, zoom: number, latitude = 0): number {
  const reach = Math.max(1, Math.ceil(radiusKm / groundTileWidthKm(zoom, latitude)));
  return Math.min(reach, Math.floor(tilesPerAxis(zoom) / 2));
}

/**
 * Size of the candidate square `generateTiles` would walk, after dropping
 * rows off the grid.
 */
export function candidateTileCount(center: GeoPoint, radiusKm: number, zoom: number): number {
  const n = tilesPerAxis(zoom);
  const reach = tileReach(radiusKm, zoom, center.latitude);
  const origin = pointToTile(center, zoom);
  const columns = Math.min(2 * reach + 1, n);
  const rows = Math.min(origin.y + reach, n - 1) - Math.max(origin.y - reach, 0) + 1;
  return columns * rows;
}

/**
 * Generate the tiles covering `radiusKm` around `center` at `zoom`.
 *
 * Candidates come from the square of tiles around the center tile. A tile is
 * kept when its center lies within the radius plus one tile width, both
 * measured on the ground at the center's latitude; the tile containing the
 * center is always kept. Output is sorted by distance, then by x, then by y.
 *
 * @example
 * ```typescript
 * const tiles = generateTiles({ latitude: 30.0444, longitude: 31.2357 }, 2, 15);
 * tiles[0]; // the tile containing the center
 * ```
 */
export function generateTiles(center: GeoPoint, radiusKm: number, zoom: number): RankedTile[] {
  const width = groundTileWidthKm(zoom, center.latitude);
  const reach = tileReach(radiusKm, zoom, center.latitude);
  const origin = pointToTile(center, zoom);
  const n = tilesPerAxis(zoom);
  const limitKm = radiusKm + width;
  // A reach of exactly half the grid would visit the opposite column twice
  const lastDx = Math.min(reach, n - 1 - reach);

  const tiles: RankedTile[] = [];

  for (let dx = -reach; dx <= lastDx; dx++) {
    // Longitude wraps around the antimeridian
    const x = (((origin.x + dx) % n) + n) % n;

    for (let dy = -reach; dy <= reach; dy++) {
      const y = origin.y + dy;
      if (y < 0 || y >= n) {
        continue;
      }

      const tile: Tile = { x, y, zoom };
      const point = tileCenter(tile);
      const distanceKm = haversineKm(center, point);
      const isOrigin = x === origin.x && y === origin.y;

      if (distanceKm > limitKm && !isOrigin) {
        continue;
      }

      tiles.push({ ...tile, center: point, distanceKm });
    }
  }

  return tiles.sort(compareRankedTiles);
}

/**
 * Distance ascending, ties broken by x then y.
 */
export function compareRankedTiles(a: RankedTile, b: RankedTile): number {
  return a.distanceKm - b.distanceKm || a.x - b.x || a.y - b.y;
}

/**
 * Describe the coverage a zoom level would give, without issuing queries.
 *
 * Pass the tiles when they have already been generated for the same area.
 */
export function describeCoverage(
  center: GeoPoint,
  radiusKm: number,
  zoom: number,
  tiles: readonly RankedTile[] = generateTiles(center, radiusKm, zoom)
): CoverageStats {
  const width = groundTileWidthKm(zoom, center.latitude);
  return {
    zoom,
    tileWidthKm: width,
    reach: tileReach(radiusKm, zoom, center.latitude),
    tileCount: tiles.length,
    coverageAreaKm2: tiles.length * width * width,
  };
}
