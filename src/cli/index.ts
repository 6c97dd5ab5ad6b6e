#!/usr/bin/env node
/**
 * placesweep CLI
 *
 * Main entry point for the placesweep command.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   placesweep --help
 *   placesweep search --lat 30.0444 --lng 31.2357 --query "restaurants" -n 50
 *   placesweep plan --lat 30.0444 --lng 31.2357 --radius 2 -n 100
 *   placesweep results list
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import type { SearchCommandDeps } from './commands/search.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @param deps - Collaborators for the search command (tests)
 */
export function createProgram(deps: SearchCommandDeps = {}): Command {
  const program = new Command();

  // Program metadata
  program
    .name('placesweep')
    .description('Find places around a point with a tiled, multi-zoom map search')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.placesweep)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();

    if (opts.dataDir) {
      process.env.PLACESWEEP_DATA_DIR = opts.dataDir;
    }

    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.fatal('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  registerCommands(program, deps);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
