/**
 * Progress Display
 *
 * Spinner shown on stderr while a search runs. Falls back to plain
 * status lines when stderr is not a terminal.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';
import type { SearchProgressEvent } from '../../search/types.js';

type Ora = ReturnType<typeof ora>;

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Force the animated spinner on or off */
  enabled?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Searching...');
 * spinner.start();
 *
 * try {
 *   await orchestrator.run(request);
 *   spinner.succeed('Search complete');
 * } catch (err) {
 *   spinner.fail('Search failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? process.stderr.isTTY === true,
      stream: process.stderr,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Spinner text for a progress event, or undefined when the event does not
 * change what is shown.
 */
export function describeProgress(event: SearchProgressEvent): string | undefined {
  switch (event.type) {
    case 'state':
      return event.state === 'done' ? undefined : `Search: ${event.state.replace('_', ' ')}`;
    case 'zoom':
      return `Zoom ${event.zoom} (${event.index + 1}/${event.total}): ${event.tileCount} tiles`;
    case 'query': {
      const where =
        event.tileIndex !== undefined && event.tileTotal !== undefined
          ? `tile ${event.tileIndex + 1}/${event.tileTotal} at zoom ${event.target.zoom}`
          : `zoom ${event.target.zoom}`;
      return `${where}: +${event.added} new, ${event.resultsCount} total`;
    }
    case 'retry':
      return `Retrying in ${formatDuration(event.delayMs)} (attempt ${event.attempt}): ${event.error}`;
    case 'skip':
      return `Skipped query at zoom ${event.target.zoom} after ${event.attempts} attempts`;
    case 'zoom-skip':
      return `Skipping empty zoom levels: ${event.skipped.join(', ')}`;
  }
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
