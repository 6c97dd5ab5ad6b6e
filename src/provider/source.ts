/**
 * Map Place Source
 *
 * Adapts MapsSearchClient to the PlaceSource contract the orchestrator
 * queries through.
 *
 * @module provider/source
 */

import type { PlaceSource } from '../search/types.js';
import { TransientFetchError } from '../search/errors.js';
import type { SearchTarget } from '../schemas/search.js';
import type { PlaceSummary } from '../schemas/output.js';
import { MapsSearchClient, isRetryableError } from './client.js';
import { extractIdentity, extractPlaceSummary, type RawPlace } from './parser.js';

export class MapsPlaceSource implements PlaceSource<RawPlace, PlaceSummary> {
  constructor(private readonly client: MapsSearchClient = new MapsSearchClient()) {}

  /**
   * Run one query. Retryable client failures become TransientFetchError;
   * anything else, including caller aborts, propagates unchanged.
   */
  async fetch(target: SearchTarget, signal?: AbortSignal): Promise<RawPlace[]> {
    try {
      return await this.client.search(target, signal);
    } catch (error) {
      if (!signal?.aborted && isRetryableError(error)) {
        throw new TransientFetchError(error.message, {
          cause: error,
          retryAfterMs: error.retryAfterMs,
        });
      }
      throw error;
    }
  }

  extractIdentity(raw: RawPlace): string | undefined {
    return extractIdentity(raw);
  }

  extractPayload(raw: RawPlace): PlaceSummary {
    return extractPlaceSummary(raw);
  }
}
