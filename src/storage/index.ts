/**
 * Storage Layer
 *
 * File-based persistence for search results.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export { getDataDir, getResultsDir, getResultFilePath } from './paths.js';

// Atomic operations
export { atomicWriteJson, readJson, fileExists } from './atomic.js';

// Result operations
export {
  generateSlug,
  formatTimestamp,
  generateResultId,
  saveSearchOutput,
  resolveResultPath,
  loadSearchOutput,
  listResults,
} from './results.js';
