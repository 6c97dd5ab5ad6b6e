/**
 * Deduplicator
 *
 * Tracks which place identities a session has already seen and keeps the
 * accepted records in discovery order. Matching is exact on the identity key.
 *
 * @module search/deduplicator
 */

import type { PlaceRecord } from '../schemas/search.js';

export class Deduplicator<TPayload> {
  private readonly seen = new Set<string>();
  private readonly accepted: PlaceRecord<TPayload>[] = [];

  /**
   * Accept a record unless its identity was already seen.
   *
   * @returns true when the record was appended, false when it was a duplicate
   */
  offer(record: PlaceRecord<TPayload>): boolean {
    if (this.seen.has(record.identity)) {
      return false;
    }
    this.seen.add(record.identity);
    this.accepted.push(record);
    return true;
  }

  has(identity: string): boolean {
    return this.seen.has(identity);
  }

  get size(): number {
    return this.accepted.length;
  }

  get results(): readonly PlaceRecord<TPayload>[] {
    return this.accepted;
  }

  /**
   * Drop records beyond `count`. Their identities stay seen.
   */
  truncate(count: number): void {
    if (this.accepted.length > count) {
      this.accepted.length = Math.max(0, count);
    }
  }
}
