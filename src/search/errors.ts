/**
 * Search Errors
 *
 * Error taxonomy for a search run. Only ConfigurationError and
 * TotalFailureError ever leave SearchOrchestrator.run(); transient fetch
 * failures are retried and then absorbed, and an exhausted plan is reported
 * through the result's outcome.
 *
 * @module search/errors
 */

/**
 * Base class for every error raised by the search core.
 */
export class SearchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SearchError';
  }
}

/**
 * Invalid input rejected before any query is issued.
 */
export class ConfigurationError extends SearchError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A single provider query failed in a way worth retrying.
 */
export class TransientFetchError extends SearchError {
  /** Pause the provider asked for before the next attempt */
  readonly retryAfterMs?: number;

  constructor(message: string, options: ErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientFetchError';
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Every query in the executed plan failed.
 *
 * Distinct from a run that succeeded but found nothing.
 */
export class TotalFailureError extends SearchError {
  constructor(
    public readonly attempts: number,
    lastError?: unknown
  ) {
    const reason = lastError instanceof Error ? `: ${lastError.message}` : '';
    super(`All ${attempts} search queries failed${reason}`, { cause: lastError });
    this.name = 'TotalFailureError';
  }
}

export function isTransientFetchError(error: unknown): error is TransientFetchError {
  return error instanceof TransientFetchError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTotalFailureError(error: unknown): error is TotalFailureError {
  return error instanceof TotalFailureError;
}
