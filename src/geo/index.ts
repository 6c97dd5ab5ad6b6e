/**
 * Geo Module
 *
 * Tile math, tile generation and zoom planning for the search planner.
 *
 * @module geo
 */

export {
  type Tile,
  EARTH_CIRCUMFERENCE_KM,
  EARTH_RADIUS_KM,
  MAX_TILE_LATITUDE,
  tilesPerAxis,
  tileWidthKm,
  groundTileWidthKm,
  pointToTile,
  tileCoordinatesToPoint,
  tileCenter,
  haversineKm,
} from './tiles.js';

export {
  type RankedTile,
  type CoverageStats,
  MAX_CANDIDATE_TILES,
  tileReach,
  candidateTileCount,
  generateTiles,
  compareRankedTiles,
  describeCoverage,
} from './tile-generator.js';

export {
  PROVIDER_MIN_ZOOM,
  PROVIDER_MAX_ZOOM,
  COARSE_TILE_FACTOR,
  planZoomLevels,
  resolveZoomLevels,
} from './zoom-planner.js';
