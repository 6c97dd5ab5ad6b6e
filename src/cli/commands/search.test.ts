/**
 * Search and Plan Command Tests
 *
 * Runs the command handlers against an in-process place source.
 *
 * @module cli/commands/search.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { handleSearch, type SearchCommandDeps, type SearchCommandOptions } from './search.js';
import { handlePlan } from './plan.js';
import { BaseCommand, EXIT_CODES } from '../base-command.js';
import { loadConfig } from '../../config/index.js';
import { TransientFetchError } from '../../search/errors.js';
import type { PlaceSource } from '../../search/types.js';
import type { Sleep } from '../../search/rate-limiter.js';
import type { RawPlace } from '../../provider/parser.js';
import { loadSearchOutput, listResults } from '../../storage/results.js';
import { SearchOutputSchema, type PlaceSummary } from '../../schemas/output.js';

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Source whose raw places are `[name]` tuples.
 */
class FakeSource implements PlaceSource<RawPlace, PlaceSummary> {
  calls = 0;

  constructor(private readonly respond: (call: number) => Promise<RawPlace[]>) {}

  async fetch(): Promise<RawPlace[]> {
    const call = this.calls;
    this.calls++;
    return this.respond(call);
  }

  extractIdentity(raw: RawPlace): string | undefined {
    const name = raw[0];
    return typeof name === 'string' ? name : undefined;
  }

  extractPayload(raw: RawPlace): PlaceSummary {
    const name = raw[0];
    return { name: typeof name === 'string' ? name : '' };
  }
}

const GENERATED_AT = new Date('2026-01-15T10:30:05.000Z');

function searchOptions(overrides: Partial<SearchCommandOptions> = {}): SearchCommandOptions {
  return {
    lat: '30.0444',
    lng: '31.2357',
    query: 'bakery',
    maxResults: '2',
    minDelay: '0',
    maxDelay: '0',
    ...overrides,
  };
}

function createDeps(source: FakeSource, overrides: Partial<SearchCommandDeps> = {}): SearchCommandDeps {
  return {
    config: loadConfig({}),
    createSource: () => source,
    sleep: jest.fn<Sleep>().mockResolvedValue(undefined),
    now: () => GENERATED_AT,
    signals: new EventEmitter(),
    ...overrides,
  };
}

/** Parse what the command printed on stdout */
function printedDocument(spy: jest.SpiedFunction<typeof console.log>) {
  expect(spy).toHaveBeenCalledTimes(1);
  const [text] = spy.mock.calls[0];
  expect(typeof text).toBe('string');
  return SearchOutputSchema.parse(JSON.parse(String(text)));
}

// ============================================================================
// Setup
// ============================================================================

let consoleLog: jest.SpiedFunction<typeof console.log>;
let consoleError: jest.SpiedFunction<typeof console.error>;
let base: BaseCommand;

beforeEach(() => {
  consoleLog = jest.spyOn(console, 'log').mockImplementation(() => {});
  consoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
  base = new BaseCommand({ quiet: true, color: false });
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ============================================================================
// search
// ============================================================================

describe('search command', () => {
  it('prints the output document on stdout', async () => {
    const source = new FakeSource(async () => [['Alpha'], ['Beta'], ['Gamma']]);

    const code = await handleSearch(searchOptions(), base, createDeps(source));

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(source.calls).toBe(1);
    const output = printedDocument(consoleLog);
    expect(output.generatedAt).toBe('2026-01-15T10:30:05.000Z');
    expect(output.strategy).toBe('single_query');
    expect(output.outcome).toBe('target_reached');
    expect(output.places).toEqual([
      { identity: 'Alpha', name: 'Alpha' },
      { identity: 'Beta', name: 'Beta' },
    ]);
    expect(output.searchParameters.delayRange).toEqual([0, 0]);
  });

  it('takes unset flags from configuration', async () => {
    const source = new FakeSource(async () => [['Alpha']]);
    const settings = loadConfig({ PLACESWEEP_GL: 'fr', PLACESWEEP_SEARCH_RADIUS_KM: '3' });

    await handleSearch(searchOptions(), base, createDeps(source, { config: settings }));

    const output = printedDocument(consoleLog);
    expect(output.searchParameters.gl).toBe('fr');
    expect(output.searchParameters.searchRadiusKm).toBe(3);
  });

  it('lets flags override configuration', async () => {
    const source = new FakeSource(async () => [['Alpha']]);
    const settings = loadConfig({ PLACESWEEP_GL: 'fr' });

    await handleSearch(searchOptions({ gl: 'de' }), base, createDeps(source, { config: settings }));

    expect(printedDocument(consoleLog).searchParameters.gl).toBe('de');
  });

  describe('writing results', () => {
    let tempDir: string;
    const originalDataDir = process.env.PLACESWEEP_DATA_DIR;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'search-command-test-'));
      process.env.PLACESWEEP_DATA_DIR = tempDir;
    });

    afterEach(async () => {
      if (originalDataDir === undefined) {
        delete process.env.PLACESWEEP_DATA_DIR;
      } else {
        process.env.PLACESWEEP_DATA_DIR = originalDataDir;
      }
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('writes to --output instead of stdout', async () => {
      const source = new FakeSource(async () => [['Alpha'], ['Beta']]);
      const target = path.join(tempDir, 'out', 'bakeries.json');

      const code = await handleSearch(searchOptions({ output: target }), base, createDeps(source));

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(consoleLog).not.toHaveBeenCalled();
      const saved = await loadSearchOutput(target);
      expect(saved.resultsCount).toBe(2);
    });

    it('saves to the results directory with --save', async () => {
      const source = new FakeSource(async () => [['Alpha']]);
      const now = new Date(2026, 0, 15, 10, 30, 5);

      await handleSearch(searchOptions({ save: true }), base, createDeps(source, { now: () => now }));

      expect(await listResults()).toEqual(['20260115-103005-bakery']);
      expect(consoleLog).not.toHaveBeenCalled();
    });
  });

  describe('failures', () => {
    it('reports malformed flags as a usage error', async () => {
      const source = new FakeSource(async () => []);

      const code = await handleSearch(searchOptions({ lat: 'north' }), base, createDeps(source));

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(source.calls).toBe(0);
      expect(consoleError).toHaveBeenCalledWith(
        "Error: Invalid options: --lat: expected a number, got 'north'"
      );
    });

    it('reports missing flags together', async () => {
      const source = new FakeSource(async () => []);

      const code = await handleSearch(
        searchOptions({ lat: undefined, query: undefined }),
        base,
        createDeps(source)
      );

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(consoleError).toHaveBeenCalledWith(
        'Error: Invalid options: --lat is required; --query is required'
      );
    });

    it('reports an out-of-range request as a usage error', async () => {
      const source = new FakeSource(async () => []);

      const code = await handleSearch(searchOptions({ radius: '0' }), base, createDeps(source));

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(source.calls).toBe(0);
    });

    it('reports an invalid retry count as a usage error', async () => {
      const source = new FakeSource(async () => []);

      const code = await handleSearch(searchOptions({ maxRetries: '0' }), base, createDeps(source));

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(consoleError).toHaveBeenCalledWith('Error: maxAttempts must be a positive integer');
    });

    it('reports total provider failure', async () => {
      const source = new FakeSource(async () => {
        throw new TransientFetchError('HTTP 503');
      });

      const code = await handleSearch(searchOptions({ maxRetries: '1' }), base, createDeps(source));

      expect(code).toBe(EXIT_CODES.API_ERROR);
      expect(consoleLog).not.toHaveBeenCalled();
      expect(consoleError).toHaveBeenCalledWith('Error: All 1 search queries failed: HTTP 503');
    });
  });

  describe('interrupts', () => {
    it('exits as cancelled when interrupted before any place was found', async () => {
      const signals = new EventEmitter();
      const source = new FakeSource(async () => {
        signals.emit('SIGINT');
        throw new Error('The operation was aborted');
      });

      const code = await handleSearch(searchOptions(), base, createDeps(source, { signals }));

      expect(code).toBe(EXIT_CODES.CANCELLED);
      expect(consoleLog).not.toHaveBeenCalled();
      expect(signals.listenerCount('SIGINT')).toBe(0);
    });

    it('keeps the places found before the interrupt', async () => {
      const signals = new EventEmitter();
      const source = new FakeSource(async () => {
        signals.emit('SIGINT');
        return [['Alpha'], ['Beta'], ['Gamma']];
      });

      const code = await handleSearch(
        searchOptions({ maxResults: '50' }),
        base,
        createDeps(source, { signals })
      );

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(source.calls).toBe(1);
      const output = printedDocument(consoleLog);
      expect(output.outcome).toBe('cancelled');
      expect(output.resultsCount).toBe(3);
    });

    it('stops listening for interrupts once done', async () => {
      const signals = new EventEmitter();
      const source = new FakeSource(async () => [['Alpha']]);

      await handleSearch(searchOptions(), base, createDeps(source, { signals }));

      expect(signals.listenerCount('SIGINT')).toBe(0);
    });
  });
});

// ============================================================================
// plan
// ============================================================================

describe('plan command', () => {
  const settings = loadConfig({});

  it('prints a single-query plan', () => {
    const code = handlePlan(
      { lat: '30.0444', lng: '31.2357', query: 'places', maxResults: '10' },
      base,
      settings
    );

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(consoleLog).toHaveBeenCalledWith(
      [
        '=== Search Plan ===',
        'Center:   30.044400, 31.235700',
        'Radius:   10 km',
        'Target:   10 places',
        'Strategy: single_query',
        'Zoom:     14',
        '',
        '1 query at the center, zoom 14',
      ].join('\n')
    );
  });

  it('prints a multi-zoom plan as JSON', () => {
    handlePlan(
      { lat: '30.0444', lng: '31.2357', query: 'places', maxResults: '100', radius: '0.5', json: true },
      base,
      settings
    );

    expect(consoleLog).toHaveBeenCalledTimes(1);
    const plan: unknown = JSON.parse(String(consoleLog.mock.calls[0][0]));
    expect(plan).toMatchObject({ strategy: 'multi_zoom', zoomPlan: [14, 15, 16, 17, 18] });
  });

  it('reports missing coordinates as a usage error', () => {
    const code = handlePlan({ lng: '31.2357', query: 'places' }, base, settings);

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(consoleLog).not.toHaveBeenCalled();
    expect(consoleError).toHaveBeenCalledWith('Error: Invalid options: --lat is required');
  });
});
