/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - search: Search for places around a point
 * - plan: Show the zoom plan and tile coverage of a search
 * - results: List and show saved search results
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSearchCommand, type SearchCommandDeps } from './search.js';
import { registerPlanCommand } from './plan.js';
import { registerResultsCommand } from './results.js';

/**
 * Register all CLI commands with the program.
 *
 * @param deps - Collaborators for the search command (tests)
 */
export function registerCommands(program: Command, deps: SearchCommandDeps = {}): void {
  registerSearchCommand(program, deps);
  registerPlanCommand(program, deps.config);
  registerResultsCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'search', description: 'Search for places around a point' },
    { name: 'plan', description: 'Show how a search would cover an area, without searching' },
    { name: 'results', description: 'Browse saved search results' },
  ];
}
