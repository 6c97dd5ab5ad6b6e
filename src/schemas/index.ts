/**
 * Zod Schemas for All Data Types
 *
 * Central export point for the request, output and shared schemas.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  GeoPointSchema,
  ZoomLevelSchema,
  CountryCodeSchema,
  ISO8601TimestampSchema,
  MAX_ZOOM,
  type GeoPoint,
  type ISO8601Timestamp,
} from './common.js';

// ============================================================================
// Search Request
// ============================================================================

export {
  SearchRequestSchema,
  SEARCH_DEFAULTS,
  parseSearchRequest,
  type SearchRequest,
  type SearchParameters,
  type SearchTarget,
  type PlaceRecord,
} from './search.js';

// ============================================================================
// Search Output
// ============================================================================

export {
  PlaceSummarySchema,
  OutputPlaceSchema,
  SearchStatsSchema,
  SearchOutputSchema,
  toSearchOutput,
  type PlaceSummary,
  type OutputPlace,
  type SearchOutput,
} from './output.js';

// ============================================================================
// Migrations
// ============================================================================

export {
  migrateSchema,
  needsMigration,
  registerMigration,
  hasMigration,
  extractSchemaVersion,
  loadAndMigrate,
  type Migration,
} from './migrations/index.js';
