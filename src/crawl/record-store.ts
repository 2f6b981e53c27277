/**
 * Record Store
 *
 * Single owner of the crawl's place_id -> record map. Concurrent query
 * iterations reserve an id with claim() before fetching its detail, so
 * two candidates resolving to the same place never both reach the provider.
 *
 * @module crawl/record-store
 */

import { IntegrityError } from '../errors/index.js';
import type { PlaceRecord } from '../schemas/record.js';

export class RecordStore {
  private readonly records: Map<string, PlaceRecord>;
  private readonly claims = new Set<string>();

  constructor(initial: Iterable<PlaceRecord> = []) {
    this.records = new Map();
    for (const record of initial) {
      this.insert(record);
    }
  }

  /**
   * True if the id has a record or an outstanding claim.
   */
  has(placeId: string): boolean {
    return this.records.has(placeId) || this.claims.has(placeId);
  }

  /**
   * Reserve an id for a detail fetch.
   *
   * @returns false if the id is already stored or claimed
   */
  claim(placeId: string): boolean {
    if (this.has(placeId)) {
      return false;
    }
    this.claims.add(placeId);
    return true;
  }

  /**
   * Drop a claim without inserting (detail fetch failed).
   */
  release(placeId: string): void {
    this.claims.delete(placeId);
  }

  /**
   * Insert a record, consuming its claim if there is one.
   *
   * @throws IntegrityError if a record with the same place_id exists
   */
  insert(record: PlaceRecord): void {
    if (this.records.has(record.placeId)) {
      throw new IntegrityError(`Duplicate place_id ${record.placeId}`, [record.placeId]);
    }
    this.claims.delete(record.placeId);
    this.records.set(record.placeId, record);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Records in insertion order
   */
  values(): PlaceRecord[] {
    return [...this.records.values()];
  }

  /**
   * Copy of the map, for checkpointing
   */
  snapshot(): Map<string, PlaceRecord> {
    return new Map(this.records);
  }
}
