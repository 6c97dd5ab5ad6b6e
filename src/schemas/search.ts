/**
 * Search Request Schema
 *
 * Validates the parameters of a search run. Everything the orchestrator
 * needs is checked here, before the first query goes out.
 */

import { z } from 'zod';
import { GeoPointSchema, ZoomLevelSchema, CountryCodeSchema, type GeoPoint } from './common.js';
import { ConfigurationError } from '../search/errors.js';
import { PROVIDER_MAX_ZOOM } from '../geo/zoom-planner.js';

// ============================================
// Defaults
// ============================================

export const SEARCH_DEFAULTS = {
  searchRadiusKm: 10,
  minZoom: 14,
  gl: 'eg',
  delayRange: [1, 3] as [number, number],
} as const;

/** Largest search radius a request may ask for */
export const MAX_SEARCH_RADIUS_KM = 50;

// ============================================
// Search Request Schema
// ============================================

/**
 * Delay bounds in seconds. NaN and negatives are accepted here and clamped
 * by the rate limiter.
 */
const DelaySecondsSchema = z.number().or(z.nan());

export const SearchRequestSchema = z.object({
  center: GeoPointSchema,
  query: z.string().trim().min(1, 'Query must not be empty'),
  targetCount: z.number().int('Target count must be an integer').min(1),
  searchRadiusKm: z
    .number()
    .positive('Search radius must be positive')
    .max(MAX_SEARCH_RADIUS_KM, `Search radius must be at most ${MAX_SEARCH_RADIUS_KM} km`)
    .default(SEARCH_DEFAULTS.searchRadiusKm),
  minZoom: ZoomLevelSchema.max(
    PROVIDER_MAX_ZOOM,
    `Minimum zoom must be at most ${PROVIDER_MAX_ZOOM}`
  ).default(SEARCH_DEFAULTS.minZoom),
  gl: CountryCodeSchema.default(SEARCH_DEFAULTS.gl),
  delayRange: z
    .tuple([DelaySecondsSchema, DelaySecondsSchema])
    .default(SEARCH_DEFAULTS.delayRange),
  zoomLevels: z.array(ZoomLevelSchema).min(1, 'Zoom levels must not be empty').optional(),
});

/** What callers pass in (defaults optional) */
export type SearchRequest = z.input<typeof SearchRequestSchema>;

/** Validated parameters with defaults applied; echoed in results */
export type SearchParameters = z.output<typeof SearchRequestSchema>;

/**
 * Validate a search request.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseSearchRequest(request: SearchRequest): SearchParameters {
  const result = SearchRequestSchema.safeParse(request);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError('Invalid search request', issues);
  }
  return result.data;
}

// ============================================
// Search Target
// ============================================

/**
 * Parameters of one provider query.
 */
export interface SearchTarget {
  readonly point: GeoPoint;
  readonly zoom: number;
  readonly query: string;
  readonly gl: string;
}

// ============================================
// Place Record
// ============================================

/**
 * A discovered place: its identity key and whatever the source extracted.
 */
export interface PlaceRecord<TPayload> {
  readonly identity: string;
  readonly payload: TPayload;
}
