/**
 * Search Module
 *
 * Orchestrates adaptive-coverage searches: strategy selection, rate limiting,
 * retries and deduplication.
 *
 * @module search
 */

export {
  SearchError,
  ConfigurationError,
  TransientFetchError,
  TotalFailureError,
  isTransientFetchError,
  isConfigurationError,
  isTotalFailureError,
} from './errors.js';

export type {
  PlaceSource,
  Logger,
  SearchState,
  SearchStrategy,
  SearchOutcome,
  SearchProgressEvent,
  ProgressListener,
  SearchStats,
  SearchResult,
} from './types.js';

export { RateLimiter, sleep, type RateLimiterOptions, type Sleep } from './rate-limiter.js';
export { Deduplicator } from './deduplicator.js';
export { SearchSession } from './session.js';

export {
  SearchOrchestrator,
  SINGLE_QUERY_THRESHOLD,
  DEFAULT_MAX_ATTEMPTS,
  selectStrategy,
  planSearch,
  type SearchOrchestratorOptions,
  type SearchPlan,
} from './orchestrator.js';
