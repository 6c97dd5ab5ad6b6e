/**
 * CLI Smoke Tests
 *
 * Basic tests to verify the CLI framework is set up correctly.
 * Tests cover:
 * - Program creation and configuration
 * - Global options parsing
 * - Command registration
 * - Base command functionality
 * - Formatter utilities
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, getBaseCommand } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import {
  ProgressSpinner,
  formatDuration,
  createSpinner,
  describeProgress,
} from './formatters/progress.js';
import {
  formatSearchSummary,
  formatSearchPlan,
  formatQuickSummary,
} from './formatters/search-summary.js';
import { getCommandHelp } from './commands/index.js';
import { planSearch } from '../search/orchestrator.js';
import type { SearchOutput } from '../schemas/output.js';

beforeAll(() => {
  chalk.level = 0;
});

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('placesweep');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const program = createProgram();
    const optionNames = program.options.map((o) => o.long);

    expect(optionNames).toContain('--verbose');
    expect(optionNames).toContain('--quiet');
    expect(optionNames).toContain('--no-color');
    expect(optionNames).toContain('--data-dir');
  });

  it('should have subcommands registered', () => {
    const program = createProgram();
    const commandNames = program.commands.map((c) => c.name());

    expect(commandNames).toEqual(['search', 'plan', 'results']);
  });

  it('should describe every registered command', () => {
    const program = createProgram();
    const helpNames = getCommandHelp().map((entry) => entry.name);

    expect(helpNames).toEqual(program.commands.map((c) => c.name()));
  });

  it('should expose the search flags', () => {
    const program = createProgram();
    const search = program.commands.find((c) => c.name() === 'search');
    const flags = search?.options.map((o) => o.long) ?? [];

    expect(flags).toEqual(
      expect.arrayContaining([
        '--lat',
        '--lng',
        '--query',
        '--max-results',
        '--zoom',
        '--zoom-levels',
        '--radius',
        '--gl',
        '--min-delay',
        '--max-delay',
        '--max-retries',
        '--skip-empty-zooms',
        '--output',
        '--save',
      ])
    );
  });

  describe('running commands', () => {
    let consoleLog: jest.SpiedFunction<typeof console.log>;
    const originalDataDir = process.env.PLACESWEEP_DATA_DIR;

    beforeEach(() => {
      consoleLog = jest.spyOn(console, 'log').mockImplementation(() => {});
      jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      jest.restoreAllMocks();
      if (originalDataDir === undefined) {
        delete process.env.PLACESWEEP_DATA_DIR;
      } else {
        process.env.PLACESWEEP_DATA_DIR = originalDataDir;
      }
    });

    it('should run the plan command', async () => {
      const program = createProgram();

      await program.parseAsync(
        ['--no-color', 'plan', '--lat', '30.0444', '--lng', '31.2357', '-n', '5', '--json'],
        { from: 'user' }
      );

      expect(consoleLog).toHaveBeenCalledTimes(1);
      const plan: unknown = JSON.parse(String(consoleLog.mock.calls[0][0]));
      expect(plan).toMatchObject({ strategy: 'single_query', zoomPlan: [14] });
    });

    it('should point storage at --data-dir', async () => {
      const program = createProgram();

      await program.parseAsync(
        ['--data-dir', '/tmp/placesweep-cli-test', 'plan', '--lat', '1', '--lng', '2'],
        { from: 'user' }
      );

      expect(process.env.PLACESWEEP_DATA_DIR).toBe('/tmp/placesweep-cli-test');
    });

    it('should store the base command for subcommands', async () => {
      const program = createProgram();

      await program.parseAsync(['-q', 'plan', '--lat', '1', '--lng', '2'], { from: 'user' });

      expect(getBaseCommand(program).isQuiet()).toBe(true);
    });
  });
});

// ============================================================================
// Version Tests
// ============================================================================

describe('Version', () => {
  it('should export VERSION constant', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('should return formatted version info', () => {
    expect(getVersionInfo()).toBe('placesweep v0.1.0');
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: {
    log: jest.SpiedFunction<typeof console.log>;
    error: jest.SpiedFunction<typeof console.error>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(() => {}),
      error: jest.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create with default options', () => {
    const cmd = new BaseCommand({ color: false });

    expect(cmd.isVerbose()).toBe(false);
    expect(cmd.isQuiet()).toBe(false);
    expect(cmd.hasColor()).toBe(false);
  });

  it('should respect verbose option', () => {
    const cmd = new BaseCommand({ verbose: true, color: false });

    cmd.debug('test message');
    expect(consoleSpy.error).toHaveBeenCalledWith('[DEBUG] test message');
  });

  it('should hide debug messages when not verbose', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.debug('test message');
    expect(consoleSpy.error).not.toHaveBeenCalled();
  });

  it('should respect quiet option', () => {
    const cmd = new BaseCommand({ quiet: true, color: false });

    cmd.info('test message');
    cmd.success('done');
    expect(consoleSpy.error).not.toHaveBeenCalled();
  });

  it('should log info messages to stderr', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.info('test message');
    expect(consoleSpy.error).toHaveBeenCalledWith('test message');
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should always log warnings and errors', () => {
    const cmd = new BaseCommand({ quiet: true, color: false });

    cmd.warn('warning message');
    cmd.error('error message');
    expect(consoleSpy.error).toHaveBeenCalledWith('Warning: warning message');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: error message');
  });

  it('should use plain markers without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('saved');
    cmd.fail('lost');
    expect(consoleSpy.error).toHaveBeenCalledWith('[OK] saved');
    expect(consoleSpy.error).toHaveBeenCalledWith('[FAIL] lost');
  });

  it('should write JSON and printed lines to stdout', () => {
    const cmd = new BaseCommand({ quiet: true, color: false });

    cmd.json({ places: 2 });
    cmd.print('plan line');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(1, '{\n  "places": 2\n}');
    expect(consoleSpy.log).toHaveBeenNthCalledWith(2, 'plan line');
  });

  it('should exit with the given code on fatal errors', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const cmd = new BaseCommand({ color: false });

    expect(() => cmd.fatal('bad flag', EXIT_CODES.USAGE_ERROR)).toThrow('exit 2');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: bad flag');
    expect(exit).toHaveBeenCalledWith(2);
  });

  it('should get base command from commander opts', () => {
    const mockCmd = {
      opts: () => ({ _baseCommand: new BaseCommand({ verbose: true, color: false }) }),
    };

    const base = getBaseCommand(mockCmd);
    expect(base).toBeInstanceOf(BaseCommand);
    expect(base.isVerbose()).toBe(true);
  });

  it('should create default base command if not found', () => {
    const base = getBaseCommand({ opts: () => ({}) });

    expect(base).toBeInstanceOf(BaseCommand);
    expect(base.isVerbose()).toBe(false);
  });
});

// ============================================================================
// Exit Codes Tests
// ============================================================================

describe('Exit Codes', () => {
  it('should define standard exit codes', () => {
    expect(EXIT_CODES.SUCCESS).toBe(0);
    expect(EXIT_CODES.ERROR).toBe(1);
    expect(EXIT_CODES.USAGE_ERROR).toBe(2);
    expect(EXIT_CODES.NOT_FOUND).toBe(3);
    expect(EXIT_CODES.API_ERROR).toBe(4);
    expect(EXIT_CODES.CANCELLED).toBe(130);
  });
});

// ============================================================================
// Progress Formatter Tests
// ============================================================================

describe('Progress Formatters', () => {
  describe('formatDuration', () => {
    it('should format milliseconds', () => {
      expect(formatDuration(500)).toBe('500ms');
      expect(formatDuration(999)).toBe('999ms');
    });

    it('should format seconds', () => {
      expect(formatDuration(1000)).toBe('1.0s');
      expect(formatDuration(5500)).toBe('5.5s');
    });

    it('should format minutes and seconds', () => {
      expect(formatDuration(60000)).toBe('1m 0s');
      expect(formatDuration(90000)).toBe('1m 30s');
    });
  });

  describe('describeProgress', () => {
    const target = { point: { latitude: 30, longitude: 31 }, zoom: 15, query: 'cafes', gl: 'eg' };

    it('should describe zoom levels', () => {
      expect(describeProgress({ type: 'zoom', zoom: 15, index: 1, total: 4, tileCount: 9 })).toBe(
        'Zoom 15 (2/4): 9 tiles'
      );
    });

    it('should describe tile queries', () => {
      expect(
        describeProgress({
          type: 'query',
          target,
          tileIndex: 2,
          tileTotal: 9,
          found: 20,
          added: 7,
          resultsCount: 27,
        })
      ).toBe('tile 3/9 at zoom 15: +7 new, 27 total');
    });

    it('should describe retries', () => {
      expect(
        describeProgress({ type: 'retry', target, attempt: 0, delayMs: 2000, error: 'HTTP 503' })
      ).toBe('Retrying in 2.0s (attempt 0): HTTP 503');
    });

    it('should ignore the final state', () => {
      expect(describeProgress({ type: 'state', state: 'done' })).toBeUndefined();
      expect(describeProgress({ type: 'state', state: 'multi_zoom' })).toBe('Search: multi zoom');
    });
  });

  describe('ProgressSpinner', () => {
    it('should support method chaining', () => {
      const spinner = new ProgressSpinner('Loading...', { enabled: false });
      const result = spinner.update('Processing...').stop();
      expect(result).toBe(spinner);
      expect(spinner.isSpinning()).toBe(false);
    });

    it('should create with factory function', () => {
      expect(createSpinner('Loading...', { enabled: false })).toBeInstanceOf(ProgressSpinner);
    });
  });
});

// ============================================================================
// Search Summary Formatter Tests
// ============================================================================

function createOutput(overrides: Partial<SearchOutput> = {}): SearchOutput {
  return {
    schemaVersion: 1,
    generatedAt: '2026-01-15T10:30:05.000Z',
    searchParameters: {
      center: { latitude: 31.2, longitude: 29.9 },
      query: 'restaurants',
      targetCount: 50,
      searchRadiusKm: 10,
      minZoom: 14,
      gl: 'eg',
      delayRange: [1, 3],
    },
    strategy: 'multi_zoom',
    zoomPlan: [14, 15, 16],
    outcome: 'target_reached',
    resultsCount: 0,
    places: [],
    stats: {
      requests: 7,
      retries: 1,
      queriesSucceeded: 6,
      queriesFailed: 0,
      tilesSearched: 6,
      zoomLevelsSearched: [14, 15],
    },
    ...overrides,
  };
}

describe('Search Summary Formatters', () => {
  it('should format a finished search', () => {
    expect(formatSearchSummary(createOutput(), { durationMs: 5500, savedTo: '/data/out.json' })).toBe(
      [
        '=== Search Complete ===',
        'Query:    restaurants',
        'Center:   31.200000, 29.900000',
        'Strategy: multi_zoom (zoom 14, 15, 16)',
        '',
        'Outcome:  TARGET REACHED',
        'Places:   0/50',
        'Requests: 7 (1 retries)',
        'Queries:  6 succeeded, 0 failed',
        'Tiles:    6 searched (zoom 14, 15)',
        'Duration: 5.5s',
        '',
        'Saved to: /data/out.json',
      ].join('\n')
    );
  });

  it('should leave out tiles for a single query', () => {
    const summary = formatSearchSummary(createOutput({ strategy: 'single_query', zoomPlan: [14] }));

    expect(summary.split('\n')).not.toContain('Tiles:    6 searched (zoom 14, 15)');
    expect(summary.split('\n').at(-1)).toBe('Queries:  6 succeeded, 0 failed');
  });

  it('should format a quick summary', () => {
    expect(formatQuickSummary(createOutput({ outcome: 'plan_exhausted' }))).toBe(
      '0 places (plan exhausted) in 7 requests'
    );
  });

  it('should format a multi-zoom plan table', () => {
    const plan = planSearch({
      center: { latitude: 0, longitude: 0 },
      query: 'places',
      targetCount: 100,
      searchRadiusKm: 0.01,
    });
    const lines = formatSearchPlan(plan).split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '=== Search Plan ===',
      'Center:   0.000000, 0.000000',
      'Radius:   0.01 km',
      'Target:   100 places',
      'Strategy: multi_zoom',
      'Zoom:     18',
    ]);
    expect(lines[7]).toBe('ZOOM  TILE WIDTH   TILES  COVERAGE');
    expect(lines[8].startsWith('18    0.153 km     ')).toBe(true);
    expect(lines.at(-1)).toBe(`At most ${plan.coverage[0].tileCount} queries`);
  });
});
