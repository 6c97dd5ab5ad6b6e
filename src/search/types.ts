/**
 * Search Type Definitions
 *
 * Contracts between the search orchestrator, the place source it queries,
 * and whoever observes a run.
 *
 * @module search/types
 */

import type { PlaceRecord, SearchParameters, SearchTarget } from '../schemas/search.js';
import type { RankedTile } from '../geo/tile-generator.js';

// ============================================================================
// Place Source
// ============================================================================

/**
 * Anything that can answer a single map search query.
 *
 * `fetch` resolves an empty array for "no results" and rejects with a
 * TransientFetchError for a failure worth retrying. Any other rejection is
 * treated as a failure of that one query.
 *
 * @typeParam TRaw - Raw result as returned by the provider
 * @typeParam TPayload - Extracted payload stored on each PlaceRecord
 */
export interface PlaceSource<TRaw, TPayload> {
  /** Run one query */
  fetch(target: SearchTarget, signal?: AbortSignal): Promise<TRaw[]>;

  /**
   * Identity key for a raw result, or undefined when it is not a place.
   * Must not require extracting the full payload.
   */
  extractIdentity(raw: TRaw): string | undefined;

  /** Payload for a raw result whose identity was accepted */
  extractPayload(raw: TRaw): TPayload;
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for the search core.
 * Allows components to log without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// State Machine
// ============================================================================

/**
 * Orchestrator states, in the order a run passes through them.
 */
export type SearchState = 'init' | 'strategy_select' | 'single_query' | 'multi_zoom' | 'done';

/**
 * Top-level search plan.
 */
export type SearchStrategy = 'single_query' | 'multi_zoom';

/**
 * Why a run ended.
 * - target_reached: results hit the target count
 * - plan_exhausted: every planned query ran; results may be under-filled
 * - cancelled: the abort signal fired
 */
export type SearchOutcome = 'target_reached' | 'plan_exhausted' | 'cancelled';

// ============================================================================
// Progress Events
// ============================================================================

/**
 * Events emitted while a run progresses.
 */
export type SearchProgressEvent =
  | { type: 'state'; state: SearchState }
  | { type: 'zoom'; zoom: number; index: number; total: number; tileCount: number }
  | {
      type: 'query';
      target: SearchTarget;
      tile?: RankedTile;
      tileIndex?: number;
      tileTotal?: number;
      found: number;
      added: number;
      resultsCount: number;
    }
  | { type: 'retry'; target: SearchTarget; attempt: number; delayMs: number; error: string }
  | { type: 'skip'; target: SearchTarget; attempts: number; error: string }
  | { type: 'zoom-skip'; skipped: number[] };

export type ProgressListener = (event: SearchProgressEvent) => void;

// ============================================================================
// Results
// ============================================================================

/**
 * Counters collected during a run.
 */
export interface SearchStats {
  /** Outbound requests, including retries */
  requests: number;
  /** Requests that were retries of a failed attempt */
  retries: number;
  /** Queries (tile or single) that returned a response */
  queriesSucceeded: number;
  /** Queries abandoned after their final attempt */
  queriesFailed: number;
  /** Tiles that returned a response */
  tilesSearched: number;
  /** Zoom levels the run entered */
  zoomLevelsSearched: number[];
}

/**
 * What a run hands back to its caller.
 */
export interface SearchResult<TPayload> {
  /** Validated input, echoed for reporting */
  parameters: SearchParameters;
  strategy: SearchStrategy;
  /** Zoom levels planned (single element for a single query) */
  zoomPlan: number[];
  outcome: SearchOutcome;
  resultsCount: number;
  /** Unique places in discovery order */
  results: PlaceRecord<TPayload>[];
  stats: SearchStats;
}
