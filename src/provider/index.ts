/**
 * Provider Module
 *
 * Map search client, response parser and the PlaceSource adapter.
 *
 * @module provider
 */

export {
  MapsSearchClient,
  MapsApiError,
  isMapsApiError,
  isRetryableError,
  buildViewportParam,
  viewportDistance,
  parseRetryAfter,
  type MapsSearchClientOptions,
} from './client.js';

export {
  type RawPlace,
  getPath,
  parseResponseJson,
  extractRawPlaces,
  extractName,
  extractAddress,
  extractLocation,
  extractIdentity,
  extractPlaceSummary,
} from './parser.js';

export { MapsPlaceSource } from './source.js';
