/**
 * Stored row types — mirror the CSV export columns and the Supabase table.
 * Column names use snake_case to match both the CSV header and PostgreSQL.
 */

/** One row of an exported tier-list CSV file. */
export interface TierListCsvRow {
  rank: number;
  score: number;
  album: string;
  artists: string;
  tracks_in_playlist: number;
  album_url: string;
  album_id: string;
}

/** One row of the `tier_list_entries` table. */
export interface TierListEntryRow {
  id: string;
  list_id: string;
  list_name: string;
  rank: number;
  score: number;
  item_key: string;
  album: string;
  artists: string;
  track_count: number;
  album_url: string;
  created_at: string;
}

export type TierListEntryInsert = Omit<TierListEntryRow, 'id' | 'created_at'>;

/** One row of the `tier_lists` view. */
export interface TierListRow {
  list_id: string;
  list_name: string;
  created_at: string;
  entries: number;
}
