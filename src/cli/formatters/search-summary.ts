/**
 * Search Summary Formatters
 *
 * Terminal summaries of a finished search and of a search plan.
 *
 * @module cli/formatters/search-summary
 */

import chalk from 'chalk';
import type { SearchOutput } from '../../schemas/output.js';
import type { SearchPlan } from '../../search/orchestrator.js';
import type { SearchOutcome } from '../../search/types.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

export interface SearchSummaryOptions {
  /** Wall-clock time of the run */
  durationMs?: number;
  /** Where the output document was written */
  savedTo?: string;
}

// ============================================================================
// Helpers
// ============================================================================

const OUTCOME_LABELS: Record<SearchOutcome, string> = {
  target_reached: 'TARGET REACHED',
  plan_exhausted: 'PLAN EXHAUSTED',
  cancelled: 'CANCELLED',
};

function formatOutcome(outcome: SearchOutcome): string {
  const label = OUTCOME_LABELS[outcome];
  switch (outcome) {
    case 'target_reached':
      return chalk.green(label);
    case 'plan_exhausted':
      return chalk.yellow(label);
    case 'cancelled':
      return chalk.red(label);
  }
}

function formatPoint(latitude: number, longitude: number): string {
  return `${latitude.toFixed(6)}, ${longitude.toFixed(6)}`;
}

function formatArea(km2: number): string {
  return km2 >= 10 ? `${Math.round(km2)} km²` : `${km2.toFixed(2)} km²`;
}

// ============================================================================
// Formatters
// ============================================================================

/**
 * Format the summary of a finished search.
 *
 * @example
 * ```
 * === Search Complete ===
 * Query:    restaurants
 * Center:   31.145465, 30.115724
 * Strategy: multi_zoom (zoom 14, 15, 16)
 *
 * Outcome:  TARGET REACHED
 * Places:   50/50
 * Requests: 7 (1 retries)
 * Queries:  6 succeeded, 0 failed
 * ```
 */
export function formatSearchSummary(
  output: SearchOutput,
  options: SearchSummaryOptions = {}
): string {
  const { searchParameters: params, stats } = output;
  const lines: string[] = [];

  lines.push(chalk.bold('=== Search Complete ==='));
  lines.push(`Query:    ${chalk.cyan(params.query)}`);
  lines.push(`Center:   ${formatPoint(params.center.latitude, params.center.longitude)}`);
  lines.push(`Strategy: ${output.strategy} (zoom ${output.zoomPlan.join(', ')})`);
  lines.push('');

  lines.push(`Outcome:  ${formatOutcome(output.outcome)}`);
  lines.push(`Places:   ${output.resultsCount}/${params.targetCount}`);
  lines.push(`Requests: ${stats.requests} (${stats.retries} retries)`);
  lines.push(`Queries:  ${stats.queriesSucceeded} succeeded, ${stats.queriesFailed} failed`);

  if (output.strategy === 'multi_zoom') {
    const zooms = stats.zoomLevelsSearched.length > 0 ? stats.zoomLevelsSearched.join(', ') : '-';
    lines.push(`Tiles:    ${stats.tilesSearched} searched (zoom ${zooms})`);
  }

  if (options.durationMs !== undefined) {
    lines.push(`Duration: ${formatDuration(options.durationMs)}`);
  }

  if (options.savedTo) {
    lines.push('');
    lines.push(`Saved to: ${options.savedTo}`);
  }

  return lines.join('\n');
}

/**
 * Format a search plan: strategy, zoom levels and per-zoom coverage.
 */
export function formatSearchPlan(plan: SearchPlan): string {
  const { parameters: params } = plan;
  const lines: string[] = [];

  lines.push(chalk.bold('=== Search Plan ==='));
  lines.push(`Center:   ${formatPoint(params.center.latitude, params.center.longitude)}`);
  lines.push(`Radius:   ${params.searchRadiusKm} km`);
  lines.push(`Target:   ${params.targetCount} places`);
  lines.push(`Strategy: ${plan.strategy}`);
  lines.push(`Zoom:     ${plan.zoomPlan.join(', ')}`);

  if (plan.strategy === 'single_query') {
    lines.push('');
    lines.push(`1 query at the center, zoom ${plan.zoomPlan[0]}`);
    return lines.join('\n');
  }

  lines.push('');
  lines.push(chalk.dim('ZOOM  TILE WIDTH   TILES  COVERAGE'));
  let totalTiles = 0;
  for (const level of plan.coverage) {
    totalTiles += level.tileCount;
    lines.push(
      `${String(level.zoom).padEnd(6)}` +
        `${`${level.tileWidthKm.toFixed(3)} km`.padEnd(13)}` +
        `${String(level.tileCount).padEnd(7)}` +
        formatArea(level.coverageAreaKm2)
    );
  }
  lines.push('');
  lines.push(`At most ${totalTiles} queries`);

  return lines.join('\n');
}

/**
 * One-line status for quiet mode.
 */
export function formatQuickSummary(output: SearchOutput): string {
  return `${output.resultsCount} places (${output.outcome.replace('_', ' ')}) in ${output.stats.requests} requests`;
}
