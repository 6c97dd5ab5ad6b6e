/**
 * Search Output Schema
 *
 * The document a finished search is saved or printed as.
 */

import { z } from 'zod';
import { GeoPointSchema, ISO8601TimestampSchema, ZoomLevelSchema } from './common.js';
import { SearchRequestSchema } from './search.js';
import { SCHEMA_VERSIONS } from './versions.js';
import type { SearchResult } from '../search/types.js';

// ============================================
// Place Summary
// ============================================

/**
 * Fields extracted for each discovered place.
 */
export const PlaceSummarySchema = z.object({
  name: z.string(),
  address: z.string().optional(),
  location: GeoPointSchema.optional(),
});

export type PlaceSummary = z.infer<typeof PlaceSummarySchema>;

export const OutputPlaceSchema = PlaceSummarySchema.extend({
  identity: z.string().min(1),
});

export type OutputPlace = z.infer<typeof OutputPlaceSchema>;

// ============================================
// Stats
// ============================================

export const SearchStatsSchema = z.object({
  requests: z.number().int().nonnegative(),
  retries: z.number().int().nonnegative(),
  queriesSucceeded: z.number().int().nonnegative(),
  queriesFailed: z.number().int().nonnegative(),
  tilesSearched: z.number().int().nonnegative(),
  zoomLevelsSearched: z.array(ZoomLevelSchema),
});

// ============================================
// Search Output
// ============================================

export const SearchOutputSchema = z
  .object({
    schemaVersion: z.number().int().positive(),
    generatedAt: ISO8601TimestampSchema,
    searchParameters: SearchRequestSchema,
    strategy: z.enum(['single_query', 'multi_zoom']),
    zoomPlan: z.array(ZoomLevelSchema).min(1),
    outcome: z.enum(['target_reached', 'plan_exhausted', 'cancelled']),
    resultsCount: z.number().int().nonnegative(),
    places: z.array(OutputPlaceSchema),
    stats: SearchStatsSchema,
  })
  .refine((output) => output.resultsCount === output.places.length, {
    message: 'resultsCount must match the number of places',
    path: ['resultsCount'],
  });

export type SearchOutput = z.infer<typeof SearchOutputSchema>;

/**
 * Build the output document for a finished run.
 *
 * Delay bounds that were not finite numbers are written as 0, the value the
 * rate limiter used for them.
 */
export function toSearchOutput(
  result: SearchResult<PlaceSummary>,
  generatedAt: Date = new Date()
): SearchOutput {
  const [minDelay, maxDelay] = result.parameters.delayRange;
  const finite = (value: number): number => (Number.isFinite(value) && value > 0 ? value : 0);

  return {
    schemaVersion: SCHEMA_VERSIONS.searchOutput,
    generatedAt: generatedAt.toISOString(),
    searchParameters: {
      ...result.parameters,
      delayRange: [finite(minDelay), finite(maxDelay)],
    },
    strategy: result.strategy,
    zoomPlan: result.zoomPlan,
    outcome: result.outcome,
    resultsCount: result.resultsCount,
    places: result.results.map((record) => ({ identity: record.identity, ...record.payload })),
    stats: result.stats,
  };
}
