/**
 * placesweep
 *
 * Library entry point: the search orchestrator, the maps provider adapter,
 * tile planning, output schemas and result storage.
 *
 * @module placesweep
 */

export * from './search/index.js';
export * from './geo/index.js';
export * from './provider/index.js';
export * from './schemas/index.js';
export * from './storage/index.js';
