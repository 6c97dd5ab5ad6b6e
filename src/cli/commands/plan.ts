/**
 * Plan Command
 *
 * Shows the strategy, zoom plan and tile coverage a search would use,
 * without sending any request.
 *
 * @module cli/commands/plan
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { buildSearchRequest, type SearchFlags } from './options.js';
import { formatSearchPlan } from '../formatters/index.js';
import { config, type Config } from '../../config/index.js';
import { planSearch } from '../../search/orchestrator.js';
import { isConfigurationError } from '../../search/errors.js';

export interface PlanCommandOptions extends SearchFlags {
  /** Print the plan as JSON */
  json?: boolean;
}

/**
 * Register the plan command.
 */
export function registerPlanCommand(program: Command, settings: Config = config): void {
  program
    .command('plan')
    .description('Show how a search would cover an area, without searching')
    .option('--lat <degrees>', 'Latitude of the search center')
    .option('--lng <degrees>', 'Longitude of the search center')
    .option('--query <text>', 'What would be searched for', 'places')
    .option('-n, --max-results <count>', 'Number of places wanted', '20')
    .option('--zoom <level>', 'Coarsest zoom level (14-18)')
    .option('--zoom-levels <list>', 'Explicit zoom levels, comma separated')
    .option('--radius <km>', 'Search radius in kilometres')
    .option('--gl <code>', 'Two-letter country code')
    .option('--json', 'Print the plan as JSON')
    .action((options: PlanCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      const code = handlePlan(options, base, settings);
      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

/**
 * Run the plan command.
 *
 * @returns Exit code for the process
 */
export function handlePlan(
  options: PlanCommandOptions,
  base: BaseCommand,
  settings: Config = config
): ExitCode {
  try {
    const plan = planSearch(buildSearchRequest(options, settings));
    base.debug(`Planned ${plan.strategy} over zoom ${plan.zoomPlan.join(', ')}`);

    if (options.json) {
      base.json({
        strategy: plan.strategy,
        zoomPlan: plan.zoomPlan,
        coverage: plan.coverage,
        searchParameters: plan.parameters,
      });
    } else {
      base.print(formatSearchPlan(plan));
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (isConfigurationError(error)) {
      base.error(error.message);
      return EXIT_CODES.USAGE_ERROR;
    }
    throw error;
  }
}

export default registerPlanCommand;
