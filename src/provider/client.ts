/**
 * Map Search Client
 *
 * Low-level client for the public map search endpoint. Builds the viewport
 * URL for a search target, enforces a per-request timeout, and classifies
 * HTTP failures as retryable or not.
 *
 * @module provider/client
 */

import type { SearchTarget } from '../schemas/search.js';
import { extractRawPlaces, type RawPlace } from './parser.js';

// ============================================================================
// Types
// ============================================================================

export interface MapsSearchClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Interface language, sent as `hl` (default: 'en') */
  language?: string;
  /** Endpoint override (tests) */
  baseUrl?: string;
}

/**
 * Map search error with additional context
 */
export class MapsApiError extends Error {
  /** Pause the server asked for, from Retry-After */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly status: string,
    public readonly isRetryable: boolean,
    options: ErrorOptions & { retryAfterMs?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'MapsApiError';
    this.retryAfterMs = options.retryAfterMs;
  }
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  baseUrl: 'https://www.google.com/search',
  language: 'en',
  timeoutMs: 30000,
  retryAfterMs: 60000,
} as const;

/** Meters per pixel at zoom 0 on the equator */
const METERS_PER_PIXEL_Z0 = 156543.03392;

/** Results per page requested from the endpoint */
const PAGE_SIZE = 20;

/**
 * Fixed tail of the `pb` parameter: viewport size, result layout and the
 * sections the endpoint should include.
 */
const PB_SUFFIX = [
  '!10b1',
  '!12m15!1m2!18b1!30b1!17m4!1e1!1e0!3e1!3e0!20m5!1e0!2e3!3b0!5e2!6b1!26b1',
  '!19m4!2m3!1i320!2i120!4i8',
  '!20m32!3m1!2i9!6m3!1m2!1i360!2i256',
  '!7m24!1m3!1e1!2b0!3e3!1m3!1e2!2b1!3e2!1m3!1e2!2b0!3e3',
  '!1m3!1e8!2b0!3e3!1m3!1e10!2b0!3e3!1m3!1e10!2b1!3e2',
  '!9b0',
].join('');

// ============================================================================
// URL Building
// ============================================================================

/**
 * Viewport span in meters for a zoom level.
 */
export function viewportDistance(zoom: number): number {
  return (METERS_PER_PIXEL_Z0 * 2) / 2 ** zoom;
}

/**
 * Encode the viewport of a search target as the endpoint's `pb` parameter.
 */
export function buildViewportParam(target: SearchTarget): string {
  const { latitude, longitude } = target.point;
  return (
    `!4m8!1m3!1d${viewportDistance(target.zoom)}!2d${longitude}!3d${latitude}` +
    `!3m2!1i415!2i608!4f${target.zoom}!7i${PAGE_SIZE}` +
    PB_SUFFIX
  );
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number {
  if (value === null || value.trim() === '') {
    return DEFAULTS.retryAfterMs;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return DEFAULTS.retryAfterMs;
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * MapsSearchClient issues one map search per call.
 *
 * @example
 * ```typescript
 * const client = new MapsSearchClient({ timeoutMs: 10000 });
 *
 * const places = await client.search({
 *   point: { latitude: 30.0444, longitude: 31.2357 },
 *   zoom: 15,
 *   query: 'bakery',
 *   gl: 'eg',
 * });
 *
 * console.log(`${places.length} places, ${client.getCallCount()} calls`);
 * ```
 */
export class MapsSearchClient {
  private readonly baseUrl: string;
  private readonly language: string;
  private readonly timeoutMs: number;
  private callCount = 0;

  constructor(options: MapsSearchClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl;
    this.language = options.language ?? DEFAULTS.language;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
  }

  /**
   * Build the search URL for a target.
   */
  buildSearchUrl(target: SearchTarget): string {
    const params = new URLSearchParams({
      gl: target.gl,
      hl: this.language,
      tbm: 'map',
      q: target.query,
      pb: buildViewportParam(target),
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  /**
   * Run one search.
   *
   * @param target - Point, zoom and query to search
   * @param signal - Cancels the request; the abort error propagates unchanged
   * @returns Raw place entries, empty when the endpoint found nothing
   * @throws MapsApiError on HTTP errors, timeouts and network failures,
   * including a body that fails mid-read
   */
  async search(target: SearchTarget, signal?: AbortSignal): Promise<RawPlace[]> {
    const url = this.buildSearchUrl(target);
    const text = await this.fetchWithTimeout(
      url,
      { headers: { 'Accept-Language': this.language } },
      signal,
      async (response) => {
        if (!response.ok) {
          await this.handleHttpError(response);
        }
        return response.text();
      }
    );
    this.callCount++;

    return extractRawPlaces(text);
  }

  /**
   * Get the number of successful calls made by this client.
   */
  getCallCount(): number {
    return this.callCount;
  }

  /**
   * Execute fetch with timeout, following the caller's abort signal.
   *
   * The timeout also bounds `read`, which consumes the response body.
   */
  private async fetchWithTimeout<T>(
    url: string,
    options: RequestInit,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(url, { ...options, signal: controller.signal });
      return await read(response);
    } catch (error) {
      if (signal?.aborted || isMapsApiError(error)) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new MapsApiError(
          `Request timed out after ${this.timeoutMs}ms`,
          408,
          'TIMEOUT',
          true, // Timeouts are retryable
          { cause: error }
        );
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new MapsApiError(`Network error: ${message}`, 0, 'NETWORK_ERROR', true, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Handle HTTP-level errors.
   *
   * @throws MapsApiError with appropriate message and retryable flag
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');
    const detail = text.slice(0, 200);

    if (response.status === 429) {
      throw new MapsApiError(`Rate limited: ${detail}`, 429, 'RATE_LIMITED', true, {
        retryAfterMs: parseRetryAfter(response.headers.get('Retry-After')),
      });
    }

    if (response.status >= 500) {
      throw new MapsApiError(
        `Server error (${response.status}): ${detail}`,
        response.status,
        'HTTP_ERROR',
        true
      );
    }

    throw new MapsApiError(
      `Search failed (${response.status}): ${detail}`,
      response.status,
      'HTTP_ERROR',
      false
    );
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a map search error
 */
export function isMapsApiError(error: unknown): error is MapsApiError {
  return error instanceof MapsApiError;
}

/**
 * Check if an error is retryable
 *
 * Only the client's own classification counts; any other error is a
 * permanent failure of the query.
 */
export function isRetryableError(error: unknown): error is MapsApiError {
  return isMapsApiError(error) && error.isRetryable;
}
