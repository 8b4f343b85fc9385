/**
 * Domain models — the entities the ranking engine works with.
 * Decoupled from both the playlist export shape and stored row shapes.
 */

// ── Items ──

/**
 * A comparison-only unit. `key` identifies it within a session; `payload`
 * is only ever shown to an oracle, never used for ordering.
 */
export interface Item<P = unknown> {
  readonly key: string;
  readonly label: string;
  readonly payload: P;
}

export interface AlbumPayload {
  albumId: string;
  title: string;
  artists: string;
  url: string;
  /** Titles of the playlist tracks that belong to this album. */
  trackTitles: readonly string[];
}

export type AlbumItem = Item<AlbumPayload>;

// ── Comparisons ──

/** Oracle answer for `compare(first, second)`. */
export type Preference = 'first' | 'second' | 'abort';

export interface Comparison<P = unknown> {
  first: Item<P>;
  second: Item<P>;
  preferred: 'first' | 'second';
}

// ── Rankings ──

/** Best-first total order over items. */
export type Ranking<P = unknown> = readonly Item<P>[];

/** A stored ranking position, as handed back for re-scoring. */
export interface RankedEntry<P = unknown> {
  position: number;
  item: Item<P>;
}

// ── Scoring ──

export interface ThresholdBand {
  /** Cumulative percentile upper bound in (0, 1]. */
  upperBound: number;
  score: number;
}

export interface ScoreClamp {
  min: number;
  max: number;
}

export interface ScoredResult<P = unknown> {
  item: Item<P>;
  /** 1-based, best first. */
  position: number;
  /** position / total; smaller is better. */
  percentile: number;
  score: number;
}

// ── Sessions ──

export type SessionState =
  | 'COLLECTING_ITEMS'
  | 'RANKING'
  | 'SCORING'
  | 'DONE'
  | 'ABORTED';

export type SessionKind = 'fresh' | 'rescore';
