/**
 * Result storage interface.
 * Persists scored tier lists and reads them back as stored rankings
 * for re-scoring.
 */

import type { AlbumPayload, RankedEntry, ScoredResult } from '../types/models.js';

export interface IResultRepository {
  /** Store a scored list under a name. Returns the location to load it from. */
  save(name: string, results: readonly ScoredResult<AlbumPayload>[]): Promise<string>;

  /**
   * Read a stored list back in stored order.
   * Rank positions are returned as stored; checking that they form 1..n is
   * left to the scorer.
   */
  load(location: string): Promise<RankedEntry<AlbumPayload>[]>;

  /** Locations of every stored list. */
  list(): Promise<string[]>;
}
