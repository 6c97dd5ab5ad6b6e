/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.placesweep/                                   # Default data directory
 * └── results/
 *     └── <result_id>.json                         # e.g., 20260102-143512-cafes-alexandria
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * @throws {Error} If the ID contains `..`, `/` or `\`
 */
function validateIdSecurity(id: string, idName: string): void {
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `PLACESWEEP_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.placesweep/`.
 *
 * @example
 * ```typescript
 * process.env.PLACESWEEP_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.PLACESWEEP_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.placesweep');
}

/**
 * Gets the directory holding saved search results.
 */
export function getResultsDir(): string {
  return path.join(getDataDir(), 'results');
}

/**
 * Gets the file path for a saved search result.
 *
 * @param resultId - The result ID (format: YYYYMMDD-HHMMSS-slug)
 * @throws {Error} If resultId is empty or contains path separators
 */
export function getResultFilePath(resultId: string): string {
  if (!resultId || resultId.trim() === '') {
    throw new Error('resultId is required');
  }
  validateIdSecurity(resultId, 'resultId');

  const fileName = resultId.endsWith('.json') ? resultId : `${resultId}.json`;
  return path.join(getResultsDir(), fileName);
}
