/**
 * Search Command
 *
 * Runs a search against the maps provider and writes the output document
 * to stdout, to `--output <file>`, or to the results directory (`--save`).
 *
 * @module cli/commands/search
 */

import * as path from 'node:path';
import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { buildSearchRequest, parseCountFlag, type SearchFlags } from './options.js';
import {
  createSpinner,
  describeProgress,
  formatSearchSummary,
  formatQuickSummary,
  type ProgressSpinner,
} from '../formatters/index.js';
import { config, type Config } from '../../config/index.js';
import { SearchOrchestrator } from '../../search/orchestrator.js';
import { isConfigurationError, isTotalFailureError } from '../../search/errors.js';
import type { Sleep } from '../../search/rate-limiter.js';
import type { PlaceSource, SearchResult } from '../../search/types.js';
import { MapsSearchClient } from '../../provider/client.js';
import { MapsPlaceSource } from '../../provider/source.js';
import type { RawPlace } from '../../provider/parser.js';
import { toSearchOutput, type PlaceSummary } from '../../schemas/output.js';
import { saveSearchOutput } from '../../storage/results.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the search command.
 */
export interface SearchCommandOptions extends SearchFlags {
  /** Attempts per query */
  maxRetries?: string;
  /** Zoom levels to skip after one that added nothing */
  skipEmptyZooms?: string;
  /** Write the output document to this file */
  output?: string;
  /** Write the output document to the results directory */
  save?: boolean;
}

/**
 * Where the interrupt signal is listened for.
 */
export interface InterruptSource {
  once(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Collaborators the command builds by default; replaced in tests.
 */
export interface SearchCommandDeps {
  config?: Config;
  createSource?: (settings: Config) => PlaceSource<RawPlace, PlaceSummary>;
  sleep?: Sleep;
  now?: () => Date;
  signals?: InterruptSource;
}

function createMapsSource(settings: Config): PlaceSource<RawPlace, PlaceSummary> {
  return new MapsPlaceSource(
    new MapsSearchClient({
      timeoutMs: settings.requestTimeoutMs,
      language: settings.language,
    })
  );
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the search command.
 */
export function registerSearchCommand(program: Command, deps: SearchCommandDeps = {}): void {
  program
    .command('search')
    .description('Search for places around a point')
    .option('--lat <degrees>', 'Latitude of the search center')
    .option('--lng <degrees>', 'Longitude of the search center')
    .option('--query <text>', 'What to search for')
    .option('-n, --max-results <count>', 'Number of places wanted', '20')
    .option('--zoom <level>', 'Coarsest zoom level (14-18)')
    .option('--zoom-levels <list>', 'Explicit zoom levels, comma separated')
    .option('--radius <km>', 'Search radius in kilometres')
    .option('--gl <code>', 'Two-letter country code')
    .option('--min-delay <seconds>', 'Minimum pause before each request')
    .option('--max-delay <seconds>', 'Maximum pause before each request')
    .option('--max-retries <count>', 'Attempts per query')
    .option('--skip-empty-zooms <count>', 'Zoom levels to skip after one that found nothing', '0')
    .option('-o, --output <file>', 'Write results to a file')
    .option('-s, --save', 'Save results to the data directory')
    .action(async (options: SearchCommandOptions, cmd: Command) => {
      const base: BaseCommand = getBaseCommand(cmd.parent ?? cmd);

      let code: ExitCode;
      try {
        code = await handleSearch(options, base, deps);
      } catch (error) {
        base.fatal(error instanceof Error ? error.message : String(error), error);
      }
      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Run the search command.
 *
 * @returns Exit code for the process
 */
export async function handleSearch(
  options: SearchCommandOptions,
  base: BaseCommand,
  deps: SearchCommandDeps = {}
): Promise<ExitCode> {
  const settings = deps.config ?? config;
  const signals: InterruptSource = deps.signals ?? process;
  const controller = new AbortController();
  const onInterrupt = (): void => {
    base.warn('Interrupted, keeping the places found so far');
    controller.abort();
  };

  let spinner: ProgressSpinner | undefined;
  let result: SearchResult<PlaceSummary>;
  const startedAt = Date.now();
  signals.once('SIGINT', onInterrupt);

  try {
    const request = buildSearchRequest(options, settings);
    const maxAttempts = parseCountFlag('max-retries', options.maxRetries) ?? settings.rateLimit.maxRetries;
    const emptyZoomSkip = parseCountFlag('skip-empty-zooms', options.skipEmptyZooms) ?? 0;

    const createSource = deps.createSource ?? createMapsSource;
    if (!base.isQuiet()) {
      spinner = createSpinner(`Searching for '${request.query}'`);
    }

    const orchestrator = new SearchOrchestrator({
      source: createSource(settings),
      maxAttempts,
      emptyZoomSkip,
      backoffBaseSeconds: settings.rateLimit.backoffBase,
      backoffMaxSeconds: settings.rateLimit.backoffMax,
      sleep: deps.sleep,
      logger: base,
      onProgress: (event) => {
        const text = describeProgress(event);
        if (text) {
          spinner?.update(text);
          base.debug(text);
        }
      },
    });

    spinner?.start();
    result = await orchestrator.run(request, controller.signal);
  } catch (error) {
    signals.removeListener('SIGINT', onInterrupt);
    spinner?.fail('Search failed');
    if (isConfigurationError(error)) {
      base.error(error.message);
      return EXIT_CODES.USAGE_ERROR;
    }
    if (isTotalFailureError(error)) {
      base.error(error.message);
      return EXIT_CODES.API_ERROR;
    }
    throw error;
  }
  signals.removeListener('SIGINT', onInterrupt);

  if (result.outcome === 'cancelled' && result.resultsCount === 0) {
    spinner?.warn('Search cancelled');
    base.warn('Search cancelled before any place was found');
    return EXIT_CODES.CANCELLED;
  }

  const output = toSearchOutput(result, (deps.now ?? (() => new Date()))());
  if (result.outcome === 'target_reached') {
    spinner?.succeed(formatQuickSummary(output));
  } else {
    spinner?.warn(formatQuickSummary(output));
  }

  let savedTo: string | undefined;
  if (options.output) {
    savedTo = await saveSearchOutput(output, path.resolve(options.output));
  } else if (options.save) {
    savedTo = await saveSearchOutput(output);
  } else {
    base.json(output);
  }

  base.blank();
  base.info(formatSearchSummary(output, { durationMs: Date.now() - startedAt, savedTo }));

  return EXIT_CODES.SUCCESS;
}

export default registerSearchCommand;
