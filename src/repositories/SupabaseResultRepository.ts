/**
 * Supabase implementation of IResultRepository.
 * Every saved list is a set of `tier_list_entries` rows sharing a list_id;
 * the `tier_lists` view has one row per list.
 */

import { randomUUID } from 'node:crypto';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { AlbumPayload, RankedEntry, ScoredResult } from '../types/models.js';
import type { TierListEntryInsert, TierListEntryRow, TierListRow } from '../types/database.js';
import type { IResultRepository } from './IResultRepository.js';
import { NotFoundError } from '../errors.js';
import { toItem } from './CsvResultRepository.js';

const TABLE = 'tier_list_entries';
const LIST_VIEW = 'tier_lists';

/** Stays under PostgREST's default max-rows. */
export const LIST_PAGE_SIZE = 1000;

export class SupabaseResultRepository implements IResultRepository {
  constructor(private readonly db: SupabaseClient) {}

  async save(name: string, results: readonly ScoredResult<AlbumPayload>[]): Promise<string> {
    const listId = randomUUID();
    const rows: TierListEntryInsert[] = results.map((result) => ({
      list_id: listId,
      list_name: name,
      rank: result.position,
      score: result.score,
      item_key: result.item.key,
      album: result.item.payload.title,
      artists: result.item.payload.artists,
      track_count: result.item.payload.trackTitles.length,
      album_url: result.item.payload.url,
    }));

    const { error } = await this.db.from(TABLE).insert(rows);

    if (error) throw new Error(`Failed to save tier list: ${error.message}`);
    return listId;
  }

  async load(listId: string): Promise<RankedEntry<AlbumPayload>[]> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('*')
      .eq('list_id', listId)
      .order('rank', { ascending: true });

    if (error) throw new Error(`Failed to load tier list: ${error.message}`);

    const rows = (data ?? []) as TierListEntryRow[];
    if (rows.length === 0) {
      throw new NotFoundError(`Tier list "${listId}" not found`);
    }

    return rows.map((row) => {
      const item = toItem({
        albumId: row.item_key,
        title: row.album,
        artists: row.artists,
        url: row.album_url,
        trackCount: row.track_count,
      });
      return { position: row.rank, item };
    });
  }

  async list(): Promise<string[]> {
    const ids: string[] = [];

    for (let from = 0; ; from += LIST_PAGE_SIZE) {
      const { data, error } = await this.db
        .from(LIST_VIEW)
        .select('list_id')
        .order('created_at', { ascending: false })
        .order('list_id', { ascending: true })
        .range(from, from + LIST_PAGE_SIZE - 1);

      if (error) throw new Error(`Failed to list tier lists: ${error.message}`);

      const rows = (data ?? []) as Pick<TierListRow, 'list_id'>[];
      ids.push(...rows.map((row) => row.list_id));
      if (rows.length < LIST_PAGE_SIZE) return ids;
    }
  }
}
