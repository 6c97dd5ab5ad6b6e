/**
 * Search Option Parsing
 *
 * Turns the string flags shared by `search` and `plan` into a search
 * request. Flags that are not given fall back to configuration.
 *
 * @module cli/commands/options
 */

import { ConfigurationError } from '../../search/errors.js';
import type { SearchRequest } from '../../schemas/search.js';
import type { Config } from '../../config/index.js';

/**
 * Flags accepted by both `search` and `plan`.
 */
export interface SearchFlags {
  lat?: string;
  lng?: string;
  query?: string;
  maxResults?: string;
  zoom?: string;
  zoomLevels?: string;
  radius?: string;
  gl?: string;
  minDelay?: string;
  maxDelay?: string;
}

/**
 * Collects flag problems so they are reported together.
 */
class FlagParser {
  readonly issues: string[] = [];

  number(flag: string, value: string | undefined): number | undefined {
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
      this.issues.push(`--${flag}: expected a number, got '${value}'`);
      return undefined;
    }
    return parsed;
  }

  numberList(flag: string, value: string | undefined): number[] | undefined {
    if (value === undefined) {
      return undefined;
    }
    const parts = value.split(',').map((part) => part.trim());
    const numbers: number[] = [];
    for (const part of parts) {
      const parsed = this.number(flag, part);
      if (parsed !== undefined) {
        numbers.push(parsed);
      }
    }
    return numbers.length === parts.length ? numbers : undefined;
  }

  required<T>(flag: string, value: T | undefined): T | undefined {
    if (value === undefined) {
      this.issues.push(`--${flag} is required`);
    }
    return value;
  }
}

/**
 * Build a search request from command flags and configuration.
 *
 * Only flag syntax is checked here; ranges are validated with the request.
 *
 * @throws ConfigurationError listing every malformed flag
 */
export function buildSearchRequest(flags: SearchFlags, settings: Config): SearchRequest {
  const parser = new FlagParser();

  const latitude = parser.required('lat', parser.number('lat', flags.lat));
  const longitude = parser.required('lng', parser.number('lng', flags.lng));
  const query = parser.required('query', flags.query);
  const targetCount = parser.number('max-results', flags.maxResults) ?? 20;
  const minZoom = parser.number('zoom', flags.zoom);
  const zoomLevels = parser.numberList('zoom-levels', flags.zoomLevels);
  const searchRadiusKm = parser.number('radius', flags.radius) ?? settings.search.radiusKm;
  const minDelay = parser.number('min-delay', flags.minDelay) ?? settings.rateLimit.minDelay;
  const maxDelay = parser.number('max-delay', flags.maxDelay) ?? settings.rateLimit.maxDelay;

  if (
    latitude === undefined ||
    longitude === undefined ||
    query === undefined ||
    parser.issues.length > 0
  ) {
    throw new ConfigurationError('Invalid options', parser.issues);
  }

  return {
    center: { latitude, longitude },
    query,
    targetCount,
    searchRadiusKm,
    minZoom,
    gl: flags.gl ?? settings.search.gl,
    delayRange: [minDelay, maxDelay],
    zoomLevels,
  };
}

/**
 * Parse an optional integer flag.
 *
 * @throws ConfigurationError when the value is not a number
 */
export function parseCountFlag(flag: string, value: string | undefined): number | undefined {
  const parser = new FlagParser();
  const parsed = parser.number(flag, value);
  if (parser.issues.length > 0) {
    throw new ConfigurationError('Invalid options', parser.issues);
  }
  return parsed;
}
