/**
 * Web Mercator Tile Math
 *
 * Conversions between geographic points and slippy-map tile coordinates,
 * plus great-circle distance.
 *
 * @module geo/tiles
 */

import type { GeoPoint } from '../schemas/common.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A cell of the standard web-map tile grid.
 */
export interface Tile {
  readonly x: number;
  readonly y: number;
  readonly zoom: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Equatorial circumference used for tile sizing */
export const EARTH_CIRCUMFERENCE_KM = 40075.017;

/** Mean Earth radius used for haversine distance */
export const EARTH_RADIUS_KM = 6371.0088;

/** Latitude of the top and bottom edges of the tile grid */
export const MAX_TILE_LATITUDE = 85.0511287798;

// ============================================================================
// Conversions
// ============================================================================

/**
 * Number of tiles along one axis at a zoom level.
 */
export function tilesPerAxis(zoom: number): number {
  return 2 ** zoom;
}

/**
 * Side length of one tile in kilometres at the equator.
 *
 * Halves with every zoom increment.
 */
export function tileWidthKm(zoom: number): number {
  return EARTH_CIRCUMFERENCE_KM / tilesPerAxis(zoom);
}

/**
 * Side length of one tile in kilometres on the ground at a latitude.
 *
 * Mercator tiles shrink by the cosine of the latitude away from the equator.
 * Latitudes past the edge of the grid are measured at the edge.
 *
 * @example
 * ```typescript
 * groundTileWidthKm(14, 60); // ≈ 1.223, half the equatorial width
 * ```
 */
export function groundTileWidthKm(zoom: number, latitude: number): number {
  const edge = clamp(latitude, -MAX_TILE_LATITUDE, MAX_TILE_LATITUDE);
  return tileWidthKm(zoom) * Math.cos((edge * Math.PI) / 180);
}

/**
 * Tile containing a point.
 */
export function pointToTile(point: GeoPoint, zoom: number): Tile {
  const n = tilesPerAxis(zoom);
  const latRad = (point.latitude * Math.PI) / 180;
  const x = Math.floor(((point.longitude + 180) / 360) * n);
  const y = Math.floor(((1 - Math.asinh(Math.tan(latRad)) / Math.PI) / 2) * n);

  // The poles and the antimeridian land exactly on the grid's outer edge
  return {
    x: clamp(x, 0, n - 1),
    y: clamp(y, 0, n - 1),
    zoom,
  };
}

/**
 * Point at fractional tile coordinates (integer values give the NW corner).
 */
export function tileCoordinatesToPoint(x: number, y: number, zoom: number): GeoPoint {
  const n = tilesPerAxis(zoom);
  const longitude = (x / n) * 360 - 180;
  const latRad = Math.atan(Math.sinh(Math.PI * (1 - (2 * y) / n)));
  return { latitude: (latRad * 180) / Math.PI, longitude };
}

/**
 * Geographic center of a tile.
 */
export function tileCenter(tile: Tile): GeoPoint {
  return tileCoordinatesToPoint(tile.x + 0.5, tile.y + 0.5, tile.zoom);
}

// ============================================================================
// Distance
// ============================================================================

/**
 * Great-circle distance between two points in kilometres.
 */
export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.latitude - a.latitude);
  const dLng = toRad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
