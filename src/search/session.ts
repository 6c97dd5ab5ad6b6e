/**
 * Search Session
 *
 * Per-run state: the target, the area being searched and the deduplicated
 * results collected so far. One instance per run; nothing is process-wide.
 *
 * @module search/session
 */

import type { PlaceRecord } from '../schemas/search.js';
import { Deduplicator } from './deduplicator.js';

export class SearchSession<TPayload> {
  private readonly deduplicator = new Deduplicator<TPayload>();

  constructor(
    readonly targetCount: number,
    readonly radiusKm: number,
    readonly minZoom: number
  ) {}

  /**
   * Offer a record for inclusion. See Deduplicator.offer.
   */
  offer(record: PlaceRecord<TPayload>): boolean {
    return this.deduplicator.offer(record);
  }

  hasSeen(identity: string): boolean {
    return this.deduplicator.has(identity);
  }

  get resultsCount(): number {
    return this.deduplicator.size;
  }

  get results(): readonly PlaceRecord<TPayload>[] {
    return this.deduplicator.results;
  }

  /**
   * Whether the target count has been reached.
   */
  isFilled(): boolean {
    return this.deduplicator.size >= this.targetCount;
  }

  /**
   * Trim the results to the target count.
   */
  trimToTarget(): void {
    this.deduplicator.truncate(this.targetCount);
  }
}
