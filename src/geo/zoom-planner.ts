/**
 * Zoom Planner
 *
 * Chooses which zoom levels a multi-zoom search visits, coarsest first.
 *
 * @module geo/zoom-planner
 */

import { tileWidthKm } from './tiles.js';

// ============================================================================
// Constants
// ============================================================================

/** Coarsest zoom the provider returns useful listings for */
export const PROVIDER_MIN_ZOOM = 14;

/** Finest zoom the provider returns useful listings for */
export const PROVIDER_MAX_ZOOM = 18;

/**
 * A level is skipped when its tile is wider than this many search diameters.
 */
export const COARSE_TILE_FACTOR = 4;

// ============================================================================
// Planning
// ============================================================================

/**
 * Plan the zoom levels for a search radius.
 *
 * Levels run from `max(minZoom, 14)` up to 18. Levels whose tiles dwarf the
 * search area are dropped; the finest level is always kept, so the plan is
 * never empty.
 *
 * @example
 * ```typescript
 * planZoomLevels(0.5, 14); // [14, 15, 16, 17, 18]
 * planZoomLevels(0.1, 14); // [16, 17, 18]
 * ```
 */
export function planZoomLevels(radiusKm: number, minZoom: number): number[] {
  const start = Math.min(Math.max(minZoom, PROVIDER_MIN_ZOOM), PROVIDER_MAX_ZOOM);
  const maxUsefulWidthKm = COARSE_TILE_FACTOR * 2 * radiusKm;
  const levels: number[] = [];

  for (let zoom = start; zoom <= PROVIDER_MAX_ZOOM; zoom++) {
    if (zoom < PROVIDER_MAX_ZOOM && tileWidthKm(zoom) > maxUsefulWidthKm) {
      continue;
    }
    levels.push(zoom);
  }

  return levels;
}

/**
 * Use caller-supplied zoom levels when given, otherwise plan them.
 *
 * Explicit levels keep their order; repeats are dropped.
 */
export function resolveZoomLevels(
  explicit: readonly number[] | undefined,
  radiusKm: number,
  minZoom: number
): number[] {
  if (explicit && explicit.length > 0) {
    return [...new Set(explicit)];
  }
  return planZoomLevels(radiusKm, minZoom);
}
