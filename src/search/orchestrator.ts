/**
 * Search Orchestrator
 *
 * Drives one search run through its states:
 *
 * ```
 * init → strategy_select → single_query | multi_zoom → done
 * ```
 *
 * Small targets are answered with one query at the center. Larger targets
 * walk the zoom plan coarse to fine and, within each zoom, the tiles nearest
 * to the center first, stopping as soon as the target count is reached.
 * Queries run strictly one at a time, each gated by the rate limiter.
 *
 * @module search/orchestrator
 */

import {
  parseSearchRequest,
  type SearchParameters,
  type SearchRequest,
  type SearchTarget,
} from '../schemas/search.js';
import {
  MAX_CANDIDATE_TILES,
  candidateTileCount,
  describeCoverage,
  generateTiles,
  type CoverageStats,
} from '../geo/tile-generator.js';
import { resolveZoomLevels } from '../geo/zoom-planner.js';
import { RateLimiter, type Sleep } from './rate-limiter.js';
import { SearchSession } from './session.js';
import { ConfigurationError, TotalFailureError, isTransientFetchError } from './errors.js';
import type {
  Logger,
  PlaceSource,
  ProgressListener,
  SearchOutcome,
  SearchProgressEvent,
  SearchResult,
  SearchState,
  SearchStats,
  SearchStrategy,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Targets up to this size are served by a single query */
export const SINGLE_QUERY_THRESHOLD = 20;

/** Default attempts per query, including the first */
export const DEFAULT_MAX_ATTEMPTS = 3;

// ============================================================================
// Types
// ============================================================================

export interface SearchOrchestratorOptions<TRaw, TPayload> {
  /** Provider the queries are sent to */
  source: PlaceSource<TRaw, TPayload>;
  /** Attempts per query before it is skipped (default: 3) */
  maxAttempts?: number;
  /** Backoff before the first retry, in seconds (default: 1) */
  backoffBaseSeconds?: number;
  /** Ceiling for a single backoff, in seconds (default: 30) */
  backoffMaxSeconds?: number;
  /**
   * Zoom levels to skip after a level that added no new place.
   * 0 disables skipping (default).
   */
  emptyZoomSkip?: number;
  /** Replaces real sleeping (tests) */
  sleep?: Sleep;
  /** Random source for the pre-request delay */
  random?: () => number;
  logger?: Logger;
  onProgress?: ProgressListener;
}

/**
 * What a run would do, worked out without issuing any query.
 */
export interface SearchPlan {
  parameters: SearchParameters;
  strategy: SearchStrategy;
  /** Zoom levels in the order they would be searched */
  zoomPlan: number[];
  /** Tile coverage per zoom level; empty for a single query */
  coverage: CoverageStats[];
}

type QueryResult<TRaw> =
  | { status: 'ok'; raw: TRaw[] }
  | { status: 'failed' }
  | { status: 'cancelled' };

/**
 * State of one run, threaded through the private steps.
 */
interface RunContext<TPayload> {
  parameters: SearchParameters;
  limiter: RateLimiter;
  session: SearchSession<TPayload>;
  stats: SearchStats;
  signal?: AbortSignal;
  lastError?: unknown;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Pick the strategy for a target count.
 */
export function selectStrategy(targetCount: number): SearchStrategy {
  return targetCount <= SINGLE_QUERY_THRESHOLD ? 'single_query' : 'multi_zoom';
}

/**
 * @throws ConfigurationError if a multi-zoom plan would enumerate more than
 * MAX_CANDIDATE_TILES tiles at one level
 */
function resolveStrategy(parameters: SearchParameters): Pick<SearchPlan, 'strategy' | 'zoomPlan'> {
  const strategy = selectStrategy(parameters.targetCount);
  if (strategy === 'single_query') {
    return { strategy, zoomPlan: [parameters.zoomLevels?.[0] ?? parameters.minZoom] };
  }

  const zoomPlan = resolveZoomLevels(
    parameters.zoomLevels,
    parameters.searchRadiusKm,
    parameters.minZoom
  );
  const oversized = zoomPlan
    .map((zoom) => ({
      zoom,
      count: candidateTileCount(parameters.center, parameters.searchRadiusKm, zoom),
    }))
    .filter(({ count }) => count > MAX_CANDIDATE_TILES);

  if (oversized.length > 0) {
    throw new ConfigurationError(
      `Search area too large for zoom ${oversized.map(({ zoom }) => zoom).join(', ')}`,
      oversized.map(
        ({ zoom, count }) =>
          `zoom ${zoom}: ${count} candidate tiles exceeds ${MAX_CANDIDATE_TILES}; ` +
          'reduce searchRadiusKm or choose coarser zoomLevels'
      )
    );
  }
  return { strategy, zoomPlan };
}

/**
 * Validate a request and describe the run it would produce.
 *
 * @throws ConfigurationError if the request is invalid or its area too large
 */
export function planSearch(request: SearchRequest): SearchPlan {
  const parameters = parseSearchRequest(request);
  const { strategy, zoomPlan } = resolveStrategy(parameters);
  const coverage =
    strategy === 'multi_zoom'
      ? zoomPlan.map((zoom) => describeCoverage(parameters.center, parameters.searchRadiusKm, zoom))
      : [];
  return { parameters, strategy, zoomPlan, coverage };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeTarget(target: SearchTarget): string {
  return `(${target.point.latitude.toFixed(6)}, ${target.point.longitude.toFixed(6)}) @ z${target.zoom}`;
}

// ============================================================================
// SearchOrchestrator Class
// ============================================================================

/**
 * SearchOrchestrator runs searches against a PlaceSource.
 *
 * The orchestrator itself holds no per-run state, so one instance can serve
 * several runs one after another.
 *
 * @example
 * ```typescript
 * const orchestrator = new SearchOrchestrator({ source: new MapsPlaceSource() });
 *
 * const result = await orchestrator.run({
 *   center: { latitude: 30.0444, longitude: 31.2357 },
 *   query: 'restaurants',
 *   targetCount: 50,
 * });
 *
 * console.log(`${result.resultsCount} places (${result.outcome})`);
 * ```
 */
export class SearchOrchestrator<TRaw, TPayload> {
  private readonly source: PlaceSource<TRaw, TPayload>;
  private readonly maxAttempts: number;
  private readonly emptyZoomSkip: number;
  private readonly options: SearchOrchestratorOptions<TRaw, TPayload>;
  private readonly logger?: Logger;

  /**
   * @throws ConfigurationError if maxAttempts or emptyZoomSkip is invalid
   */
  constructor(options: SearchOrchestratorOptions<TRaw, TPayload>) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    const emptyZoomSkip = options.emptyZoomSkip ?? 0;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError('maxAttempts must be a positive integer');
    }
    if (!Number.isInteger(emptyZoomSkip) || emptyZoomSkip < 0) {
      throw new ConfigurationError('emptyZoomSkip must be a non-negative integer');
    }

    this.options = options;
    this.source = options.source;
    this.maxAttempts = maxAttempts;
    this.emptyZoomSkip = emptyZoomSkip;
    this.logger = options.logger;
  }

  /**
   * Run a search.
   *
   * @param request - Search parameters; validated before any query
   * @param signal - Aborts the run between queries; partial results are kept
   * @returns Results in discovery order, at most `targetCount` of them
   * @throws ConfigurationError if the request is invalid
   * @throws TotalFailureError if every query that ran failed
   */
  async run(request: SearchRequest, signal?: AbortSignal): Promise<SearchResult<TPayload>> {
    this.transition('init');
    const parameters = parseSearchRequest(request);
    const [minDelaySeconds, maxDelaySeconds] = parameters.delayRange;

    const context: RunContext<TPayload> = {
      parameters,
      limiter: new RateLimiter({
        minDelaySeconds,
        maxDelaySeconds,
        backoffBaseSeconds: this.options.backoffBaseSeconds,
        backoffMaxSeconds: this.options.backoffMaxSeconds,
        sleep: this.options.sleep,
        random: this.options.random,
      }),
      session: new SearchSession<TPayload>(
        parameters.targetCount,
        parameters.searchRadiusKm,
        parameters.minZoom
      ),
      stats: {
        requests: 0,
        retries: 0,
        queriesSucceeded: 0,
        queriesFailed: 0,
        tilesSearched: 0,
        zoomLevelsSearched: [],
      },
      signal,
    };

    this.transition('strategy_select');
    const { strategy, zoomPlan } = resolveStrategy(parameters);
    let outcome: SearchOutcome;

    if (strategy === 'single_query') {
      this.transition('single_query');
      outcome = await this.runSingleQuery(context, zoomPlan[0]);
    } else {
      this.transition('multi_zoom');
      this.logger?.info(
        `Searching up to ${parameters.targetCount} places over zoom levels ${zoomPlan.join(', ')}`
      );
      outcome = await this.runMultiZoom(context, zoomPlan);
    }

    const { session, stats } = context;
    session.trimToTarget();
    this.transition('done');

    if (outcome !== 'cancelled' && stats.queriesFailed > 0 && stats.queriesSucceeded === 0) {
      throw new TotalFailureError(stats.queriesFailed, context.lastError);
    }

    if (outcome === 'plan_exhausted' && !session.isFilled()) {
      this.logger?.warn(
        `Search plan exhausted with ${session.resultsCount}/${parameters.targetCount} places`
      );
    }

    return {
      parameters,
      strategy,
      zoomPlan,
      outcome,
      resultsCount: session.resultsCount,
      results: [...session.results],
      stats,
    };
  }

  // ==========================================================================
  // Strategies
  // ==========================================================================

  private async runSingleQuery(
    context: RunContext<TPayload>,
    zoom: number
  ): Promise<SearchOutcome> {
    const { parameters, session } = context;
    const target: SearchTarget = {
      point: parameters.center,
      zoom,
      query: parameters.query,
      gl: parameters.gl,
    };

    this.logger?.info(`Searching for '${parameters.query}' at ${describeTarget(target)}`);
    const result = await this.executeQuery(context, target);

    if (result.status === 'cancelled') {
      return 'cancelled';
    }
    if (result.status === 'ok') {
      const added = this.merge(context, result.raw);
      this.emit({
        type: 'query',
        target,
        found: result.raw.length,
        added,
        resultsCount: session.resultsCount,
      });
    }
    return session.isFilled() ? 'target_reached' : 'plan_exhausted';
  }

  private async runMultiZoom(
    context: RunContext<TPayload>,
    zoomPlan: number[]
  ): Promise<SearchOutcome> {
    const { parameters, session, stats } = context;

    for (let index = 0; index < zoomPlan.length; index++) {
      const zoom = zoomPlan[index];
      const tiles = generateTiles(parameters.center, parameters.searchRadiusKm, zoom);
      const resultsBefore = session.resultsCount;

      stats.zoomLevelsSearched.push(zoom);
      this.emit({ type: 'zoom', zoom, index, total: zoomPlan.length, tileCount: tiles.length });
      if (this.logger) {
        const coverage = describeCoverage(
          parameters.center,
          parameters.searchRadiusKm,
          zoom,
          tiles
        );
        this.logger.debug(
          `Zoom ${zoom}: ${coverage.tileCount} tiles, ` +
            `${coverage.coverageAreaKm2.toFixed(2)} km², ` +
            `${(coverage.tileWidthKm * 1000).toFixed(0)}m per tile`
        );
      }

      for (const [tileIndex, tile] of tiles.entries()) {
        const target: SearchTarget = {
          point: tile.center,
          zoom,
          query: parameters.query,
          gl: parameters.gl,
        };

        const result = await this.executeQuery(context, target);
        if (result.status === 'cancelled') {
          return 'cancelled';
        }
        if (result.status === 'failed') {
          continue;
        }

        stats.tilesSearched++;
        const added = this.merge(context, result.raw);
        this.logger?.debug(
          `Tile ${tileIndex + 1}/${tiles.length} (${tile.x}, ${tile.y}): ` +
            `${result.raw.length} found, ${added} new, ${session.resultsCount} total`
        );
        this.emit({
          type: 'query',
          target,
          tile,
          tileIndex,
          tileTotal: tiles.length,
          found: result.raw.length,
          added,
          resultsCount: session.resultsCount,
        });

        if (session.isFilled()) {
          session.trimToTarget();
          return 'target_reached';
        }
      }

      const addedAtZoom = session.resultsCount - resultsBefore;
      this.logger?.debug(`Zoom ${zoom} complete: ${addedAtZoom} new places`);

      if (addedAtZoom === 0 && this.emptyZoomSkip > 0) {
        const skipped = zoomPlan.slice(index + 1, index + 1 + this.emptyZoomSkip);
        if (skipped.length > 0) {
          this.logger?.info(
            `No new places at zoom ${zoom}; skipping zoom levels ${skipped.join(', ')}`
          );
          this.emit({ type: 'zoom-skip', skipped });
          index += skipped.length;
        }
      }
    }

    return 'plan_exhausted';
  }

  // ==========================================================================
  // Query Execution
  // ==========================================================================

  /**
   * Send one query with rate limiting and bounded retries.
   *
   * Transient failures are retried after a backoff; any other failure, or
   * the last transient one, skips the query.
   */
  private async executeQuery(
    context: RunContext<TPayload>,
    target: SearchTarget
  ): Promise<QueryResult<TRaw>> {
    const { limiter, stats, signal } = context;
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { status: 'cancelled' };
      }
      await limiter.wait(signal);
      if (signal?.aborted) {
        return { status: 'cancelled' };
      }

      attempts++;
      stats.requests++;
      if (attempt > 0) {
        stats.retries++;
      }

      try {
        const raw = await this.source.fetch(target, signal);
        stats.queriesSucceeded++;
        return { status: 'ok', raw };
      } catch (error) {
        if (signal?.aborted) {
          return { status: 'cancelled' };
        }
        lastError = error;
        if (!isTransientFetchError(error)) {
          break;
        }
        if (attempt < this.maxAttempts - 1) {
          const delayMs = await limiter.onFailure(attempt, error.retryAfterMs, signal);
          this.logger?.debug(
            `Query ${describeTarget(target)} failed (attempt ${attempt + 1}/${this.maxAttempts}), ` +
              `retried after ${(delayMs / 1000).toFixed(2)}s: ${error.message}`
          );
          this.emit({ type: 'retry', target, attempt, delayMs, error: error.message });
        }
      }
    }

    stats.queriesFailed++;
    context.lastError = lastError;
    this.logger?.warn(
      `Skipping query ${describeTarget(target)} after ${attempts} attempt(s): ${errorMessage(lastError)}`
    );
    this.emit({ type: 'skip', target, attempts, error: errorMessage(lastError) });
    return { status: 'failed' };
  }

  /**
   * Feed a batch through the session's deduplicator.
   *
   * Identity is checked before the payload is extracted.
   *
   * @returns Number of new places accepted
   */
  private merge(context: RunContext<TPayload>, batch: TRaw[]): number {
    const { session } = context;
    let added = 0;

    for (const raw of batch) {
      const identity = this.source.extractIdentity(raw);
      if (identity === undefined || session.hasSeen(identity)) {
        continue;
      }
      if (session.offer({ identity, payload: this.source.extractPayload(raw) })) {
        added++;
      }
    }

    return added;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  private transition(state: SearchState): void {
    this.logger?.debug(`Search state: ${state}`);
    this.emit({ type: 'state', state });
  }

  private emit(event: SearchProgressEvent): void {
    this.options.onProgress?.(event);
  }
}
