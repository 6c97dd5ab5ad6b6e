/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  describeProgress,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Search summary formatters
export {
  formatSearchSummary,
  formatSearchPlan,
  formatQuickSummary,
  type SearchSummaryOptions,
} from './search-summary.js';
