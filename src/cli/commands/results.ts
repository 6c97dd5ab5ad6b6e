/**
 * Results Commands
 *
 * Browse search outputs written with `search --save`:
 * - results list - saved results, newest first
 * - results show - one saved result as JSON
 *
 * @module cli/commands/results
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { parseCountFlag } from './options.js';
import { fileExists } from '../../storage/atomic.js';
import { getResultsDir } from '../../storage/paths.js';
import { listResults, loadSearchOutput, resolveResultPath } from '../../storage/results.js';
import { isConfigurationError } from '../../search/errors.js';
import type { SearchOutput } from '../../schemas/output.js';

// ============================================================================
// Types
// ============================================================================

export interface ListResultsOptions {
  /** Maximum number of results to display */
  limit?: string;
  /** Print the listing as JSON */
  json?: boolean;
}

/**
 * One row of the listing.
 */
export interface ResultEntry {
  id: string;
  query: string;
  generatedAt: string;
  outcome: SearchOutput['outcome'];
  resultsCount: number;
}

const DEFAULT_LIMIT = 20;

// ============================================================================
// Helper Functions
// ============================================================================

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width, ignoring ANSI codes.
 */
function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

/**
 * Format the listing as a table.
 */
export function formatResultsTable(entries: readonly ResultEntry[]): string {
  const header =
    padRight('RESULT ID', 42) + padRight('QUERY', 26) + padRight('PLACES', 8) + 'OUTCOME';
  const divider = chalk.dim('-'.repeat(90));
  const rows = entries.map(
    (entry) =>
      padRight(truncate(entry.id, 40), 42) +
      padRight(truncate(entry.query, 24), 26) +
      padRight(String(entry.resultsCount), 8) +
      entry.outcome.replace('_', ' ')
  );

  return [chalk.bold(header), divider, ...rows, divider].join('\n');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the results command and its subcommands.
 */
export function registerResultsCommand(program: Command): void {
  const results = program.command('results').description('Browse saved search results');

  results
    .command('list')
    .description('List saved search results, newest first')
    .option('-n, --limit <count>', 'Maximum number of results to show', String(DEFAULT_LIMIT))
    .option('--json', 'Print the listing as JSON')
    .action(async (options: ListResultsOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent?.parent ?? cmd);
      const code = await handleResultsList(options, base);
      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });

  results
    .command('show')
    .description('Print a saved search result as JSON')
    .argument('<id-or-path>', 'Result ID from `results list`, or a path to a saved file')
    .action(async (idOrPath: string, _options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd.parent?.parent ?? cmd);
      const code = await handleResultsShow(idOrPath, base);
      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Run `results list`.
 *
 * Saved files that no longer load are reported and left out.
 *
 * @returns Exit code for the process
 */
export async function handleResultsList(
  options: ListResultsOptions,
  base: BaseCommand
): Promise<ExitCode> {
  let limit: number;
  try {
    limit = parseCountFlag('limit', options.limit) ?? DEFAULT_LIMIT;
  } catch (error) {
    if (isConfigurationError(error)) {
      base.error(error.message);
      return EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }
  if (!Number.isInteger(limit) || limit < 1) {
    base.error(`Invalid options: --limit: expected a positive integer, got '${options.limit}'`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const ids = await listResults();
  base.debug(`Found ${ids.length} saved results in ${getResultsDir()}`);

  const entries: ResultEntry[] = [];
  for (const id of ids.slice(0, limit)) {
    try {
      const output = await loadSearchOutput(id);
      entries.push({
        id,
        query: output.searchParameters.query,
        generatedAt: output.generatedAt,
        outcome: output.outcome,
        resultsCount: output.resultsCount,
      });
    } catch (error) {
      base.warn(`Skipping ${id}: ${errorMessage(error)}`);
    }
  }

  if (options.json) {
    base.json(entries);
    return EXIT_CODES.SUCCESS;
  }

  if (ids.length === 0) {
    base.info('No saved results. Save one with: placesweep search ... --save');
    return EXIT_CODES.SUCCESS;
  }

  base.print(formatResultsTable(entries));
  if (ids.length > limit) {
    base.info(`Showing ${limit} of ${ids.length} results (use --limit to show more)`);
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Run `results show`.
 *
 * @returns Exit code for the process
 */
export async function handleResultsShow(idOrPath: string, base: BaseCommand): Promise<ExitCode> {
  let filePath: string;
  try {
    filePath = resolveResultPath(idOrPath);
  } catch (error) {
    base.error(errorMessage(error));
    return EXIT_CODES.USAGE_ERROR;
  }

  if (!(await fileExists(filePath))) {
    base.error(`Result not found: ${idOrPath}`);
    return EXIT_CODES.NOT_FOUND;
  }

  try {
    base.json(await loadSearchOutput(filePath));
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    base.error(errorMessage(error));
    return EXIT_CODES.ERROR;
  }
}

export default registerResultsCommand;
