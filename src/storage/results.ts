/**
 * Saved Search Results
 *
 * Result ID Format: YYYYMMDD-HHMMSS-<slug>
 *
 * @module storage/results
 */

import * as fs from 'node:fs/promises';
import { SearchOutputSchema, type SearchOutput } from '../schemas/output.js';
import { migrateSchema } from '../schemas/migrations/index.js';
import { atomicWriteJson, readJson } from './atomic.js';
import { getResultFilePath, getResultsDir } from './paths.js';

/**
 * Stopwords to remove from slugs
 */
const STOPWORDS = new Set(['the', 'a', 'an', 'in', 'near', 'of', 'for', 'me']);

/**
 * Maximum slug length in characters
 */
const MAX_SLUG_LENGTH = 40;

/**
 * Generate a file-name-friendly slug from a search query.
 *
 * @example
 * ```typescript
 * generateSlug('Best Cafes in Alexandria!');
 * // Returns: 'best-cafes-alexandria'
 * ```
 */
export function generateSlug(text: string): string {
  let slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .split('-')
    .filter((word) => word.length > 0 && !STOPWORDS.has(word))
    .join('-');

  // Don't cut mid-word
  if (slug.length > MAX_SLUG_LENGTH) {
    slug = slug.substring(0, MAX_SLUG_LENGTH);
    const lastHyphen = slug.lastIndexOf('-');
    if (lastHyphen > 0) {
      slug = slug.substring(0, lastHyphen);
    }
  }

  return slug || 'search';
}

/**
 * Format a date as YYYYMMDD-HHMMSS in local time.
 */
export function formatTimestamp(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  return `${year}${month}${day}-${hours}${minutes}${seconds}`;
}

export function generateResultId(query: string, date: Date = new Date()): string {
  return `${formatTimestamp(date)}-${generateSlug(query)}`;
}

/**
 * Validate and atomically write a search output document.
 *
 * @param output - Document to write
 * @param filePath - Target path; defaults to the results directory under an
 *   ID derived from the query and generation time
 * @returns The path written
 */
export async function saveSearchOutput(output: SearchOutput, filePath?: string): Promise<string> {
  const validated = SearchOutputSchema.parse(output);
  const target =
    filePath ??
    getResultFilePath(
      generateResultId(validated.searchParameters.query, new Date(validated.generatedAt))
    );

  await atomicWriteJson(target, validated);
  return target;
}

/**
 * File path of a saved result.
 *
 * @param idOrPath - A result ID from listResults(), or a path to a JSON file
 * @throws Error if an ID contains path traversal characters
 */
export function resolveResultPath(idOrPath: string): string {
  const isPath = idOrPath.includes('/') || idOrPath.includes('\\');
  return isPath ? idOrPath : getResultFilePath(idOrPath);
}

/**
 * Load a saved search output document.
 *
 * Documents written under an older schema version are migrated first.
 *
 * @param idOrPath - A result ID from listResults(), or a path to a JSON file
 * @throws Error if the file is missing or not a valid search output
 */
export async function loadSearchOutput(idOrPath: string): Promise<SearchOutput> {
  const filePath = resolveResultPath(idOrPath);

  const data = migrateSchema(await readJson(filePath), 'searchOutput');
  const result = SearchOutputSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid search output in ${filePath}: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * List saved result IDs, newest first.
 */
export async function listResults(): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(getResultsDir());
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return names
    .filter((name) => name.endsWith('.json'))
    .map((name) => name.slice(0, -'.json'.length))
    .sort()
    .reverse();
}
