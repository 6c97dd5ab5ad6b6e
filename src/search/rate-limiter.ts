/**
 * Rate Limiter
 *
 * Paces outbound provider queries: a random delay before every request and
 * an exponential backoff before every retry.
 *
 * @module search/rate-limiter
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Pauses for `ms`; resolves early once `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Rate limiter settings. All durations are in seconds.
 */
export interface RateLimiterOptions {
  /** Lower bound of the pre-request delay (default: 1) */
  minDelaySeconds?: number;
  /** Upper bound of the pre-request delay (default: 3) */
  maxDelaySeconds?: number;
  /** Backoff for the first retry; doubles per attempt (default: 1) */
  backoffBaseSeconds?: number;
  /** Ceiling for a single backoff (default: 30) */
  backoffMaxSeconds?: number;
  /** Replaces setTimeout-based sleeping (tests) */
  sleep?: Sleep;
  /** Uniform random source in [0, 1) (default: Math.random) */
  random?: () => number;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  minDelaySeconds: 1,
  maxDelaySeconds: 3,
  backoffBaseSeconds: 1,
  backoffMaxSeconds: 30,
} as const;

/**
 * Sleep for a specified duration, or until the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Negative, NaN and infinite values become zero.
 */
function clampDuration(value: number | undefined, fallback: number): number {
  const duration = value ?? fallback;
  return Number.isFinite(duration) && duration > 0 ? duration : 0;
}

// ============================================================================
// RateLimiter Class
// ============================================================================

/**
 * RateLimiter suspends the single search flow between queries.
 *
 * Malformed settings are clamped rather than rejected, so construction and
 * both methods never throw.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ minDelaySeconds: 1, maxDelaySeconds: 3 });
 *
 * for (let attempt = 0; attempt < 3; attempt++) {
 *   await limiter.wait();
 *   try {
 *     return await fetchTile();
 *   } catch {
 *     await limiter.onFailure(attempt);
 *   }
 * }
 * ```
 */
export class RateLimiter {
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly sleepFn: Sleep;
  private readonly random: () => number;
  private requests = 0;

  constructor(options: RateLimiterOptions = {}) {
    const min = clampDuration(options.minDelaySeconds, DEFAULTS.minDelaySeconds);
    const max = clampDuration(options.maxDelaySeconds, DEFAULTS.maxDelaySeconds);

    this.minDelayMs = min * 1000;
    this.maxDelayMs = Math.max(min, max) * 1000;
    this.backoffBaseMs = clampDuration(options.backoffBaseSeconds, DEFAULTS.backoffBaseSeconds) * 1000;
    this.backoffMaxMs = clampDuration(options.backoffMaxSeconds, DEFAULTS.backoffMaxSeconds) * 1000;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Pause before an outbound query.
   *
   * @param signal - Ends the pause early when aborted
   * @returns The delay drawn, in milliseconds
   */
  async wait(signal?: AbortSignal): Promise<number> {
    const delayMs = this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
    this.requests++;
    if (delayMs > 0) {
      await this.sleepFn(delayMs, signal);
    }
    return delayMs;
  }

  /**
   * Pause before retrying a failed query.
   *
   * @param attempt - Zero-based index of the attempt that failed
   * @param retryAfterMs - Pause requested by the provider, if any
   * @param signal - Ends the pause early when aborted
   * @returns The delay drawn, in milliseconds
   */
  async onFailure(attempt: number, retryAfterMs?: number, signal?: AbortSignal): Promise<number> {
    const delayMs = Math.max(this.backoffDelay(attempt), clampDuration(retryAfterMs, 0));
    if (delayMs > 0) {
      await this.sleepFn(delayMs, signal);
    }
    return delayMs;
  }

  /**
   * Backoff for an attempt: base × 2^attempt, capped.
   */
  backoffDelay(attempt: number): number {
    const exponent = Number.isFinite(attempt) && attempt > 0 ? Math.floor(attempt) : 0;
    return Math.min(this.backoffMaxMs, this.backoffBaseMs * 2 ** exponent);
  }

  /**
   * Number of queries gated by wait() so far.
   */
  get requestCount(): number {
    return this.requests;
  }
}
