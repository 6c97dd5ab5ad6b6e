/**
 * Map Search Response Parser
 *
 * The map search endpoint answers with a JSON array behind an anti-hijacking
 * guard. Places are positional arrays; everything here addresses them by
 * index and tolerates missing or mistyped slots.
 *
 * @module provider/parser
 */

import type { GeoPoint } from '../schemas/common.js';
import type { PlaceSummary } from '../schemas/output.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One place entry as returned by the provider.
 */
export type RawPlace = readonly unknown[];

/** Slot holding the place details block */
const DETAILS_INDEX = 14;

/** Maximum length of a plausible place name */
const MAX_NAME_LENGTH = 100;

/** Words that mark a string as an address component rather than a name */
const ADDRESS_WORDS = ['شارع', 'طريق', 'محافظة', 'street', 'road'];

/** The fallback scan also rejects district names */
const FALLBACK_ADDRESS_WORDS = [...ADDRESS_WORDS, 'قسم'];

/** Coordinate slots inside the details block, in order of preference */
const COORDINATE_PATHS: ReadonlyArray<readonly [number, number]> = [
  [9, 2],
  [1, 2],
  [0, 2],
];

// ============================================================================
// Generic Access
// ============================================================================

/**
 * Read a nested slot, or undefined when any step is missing.
 */
export function getPath(data: unknown, path: readonly number[]): unknown {
  let current: unknown = data;
  for (const index of path) {
    if (!Array.isArray(current) || index < 0 || index >= current.length) {
      return undefined;
    }
    current = current[index];
  }
  return current;
}

/**
 * Parse a guarded JSON response.
 *
 * @returns The parsed value, or undefined when the body holds no JSON array
 */
export function parseResponseJson(text: string): unknown {
  let body = text;
  if (body.startsWith(")]}'\n")) {
    body = body.slice(5);
  } else if (body.startsWith(')]}')) {
    body = body.slice(3);
  }

  const start = body.indexOf('[');
  if (start === -1) {
    return undefined;
  }

  try {
    return JSON.parse(body.slice(start));
  } catch {
    return undefined;
  }
}

/**
 * Extract the place entries from a response body.
 *
 * Only entries that carry a details block are returned.
 */
export function extractRawPlaces(text: string): RawPlace[] {
  const entries = getPath(parseResponseJson(text), [0, 1]);
  if (!Array.isArray(entries)) {
    return [];
  }

  const places: RawPlace[] = [];
  for (const entry of entries) {
    if (Array.isArray(entry) && Array.isArray(entry[DETAILS_INDEX])) {
      places.push(entry);
    }
  }
  return places;
}

// ============================================================================
// Field Extraction
// ============================================================================

function details(raw: RawPlace): readonly unknown[] {
  const block = raw[DETAILS_INDEX];
  return Array.isArray(block) ? block : [];
}

function isShortText(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && value.length < MAX_NAME_LENGTH;
}

function containsAny(value: string, words: readonly string[]): boolean {
  return words.some((word) => value.includes(word));
}

/**
 * Identifiers and slugs are a single run of letters and digits.
 */
function looksLikeIdentifier(value: string): boolean {
  return /^[\p{L}\p{N}]+$/u.test(value.replace(/[_-]/g, ''));
}

/**
 * Place name: slot 11 of the details block, or the first string elsewhere
 * in the block that reads like a name.
 */
export function extractName(raw: RawPlace): string | undefined {
  const block = details(raw);

  const primary = block[11];
  if (
    isShortText(primary) &&
    !primary.includes('0x') &&
    !primary.includes(':') &&
    !containsAny(primary, ADDRESS_WORDS)
  ) {
    return primary;
  }

  for (const value of block) {
    if (
      isShortText(value) &&
      !value.includes('0x') &&
      !(value.includes(':') && value.length > 20) &&
      !value.includes('http') &&
      !containsAny(value, FALLBACK_ADDRESS_WORDS) &&
      !looksLikeIdentifier(value)
    ) {
      return value;
    }
  }

  return undefined;
}

/**
 * Address components joined with ", ".
 */
export function extractAddress(raw: RawPlace): string | undefined {
  const parts = details(raw)[2];
  if (!Array.isArray(parts)) {
    return undefined;
  }

  const address = parts
    .filter((part) => part !== null && part !== undefined && part !== '' && part !== 0 && part !== false)
    .map((part) => String(part))
    .join(', ');
  return address.length > 0 ? address : undefined;
}

export function extractLocation(raw: RawPlace): GeoPoint | undefined {
  const block = details(raw);
  let latitude: number | undefined;
  let longitude: number | undefined;

  for (const [group, slot] of COORDINATE_PATHS) {
    const lat = getPath(block, [group, slot]);
    if (latitude === undefined && typeof lat === 'number' && lat >= -90 && lat <= 90) {
      latitude = lat;
    }
    const lng = getPath(block, [group, slot + 1]);
    if (longitude === undefined && typeof lng === 'number' && lng >= -180 && lng <= 180) {
      longitude = lng;
    }
  }

  return latitude !== undefined && longitude !== undefined ? { latitude, longitude } : undefined;
}

/**
 * Identity key: `<name>_<address>`, with an empty address when unknown.
 *
 * @returns undefined when the entry has no recognisable name
 */
export function extractIdentity(raw: RawPlace): string | undefined {
  const name = extractName(raw);
  if (name === undefined) {
    return undefined;
  }
  return `${name}_${extractAddress(raw) ?? ''}`;
}

export function extractPlaceSummary(raw: RawPlace): PlaceSummary {
  const summary: PlaceSummary = { name: extractName(raw) ?? '' };

  const address = extractAddress(raw);
  if (address !== undefined) {
    summary.address = address;
  }
  const location = extractLocation(raw);
  if (location !== undefined) {
    summary.location = location;
  }

  return summary;
}
