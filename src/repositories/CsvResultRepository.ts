/**
 * CSV implementation of IResultRepository.
 * One file per tier list, written to a results directory.
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { AlbumItem, AlbumPayload, RankedEntry, ScoredResult } from '../types/models.js';
import type { TierListCsvRow } from '../types/database.js';
import type { IResultRepository } from './IResultRepository.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { parseCsv, toCsvLine } from './csv.js';

export const CSV_COLUMNS: ReadonlyArray<keyof TierListCsvRow> = [
  'rank',
  'score',
  'album',
  'artists',
  'tracks_in_playlist',
  'album_url',
  'album_id',
];

export class CsvResultRepository implements IResultRepository {
  constructor(private readonly directory: string) {}

  async save(name: string, results: readonly ScoredResult<AlbumPayload>[]): Promise<string> {
    const fileName = name.toLowerCase().endsWith('.csv') ? name : `${name}.csv`;
    const location = join(this.directory, fileName);

    const lines = [toCsvLine(CSV_COLUMNS)];
    for (const result of results) {
      const row = toRow(result);
      lines.push(toCsvLine(CSV_COLUMNS.map((column) => row[column])));
    }

    await mkdir(this.directory, { recursive: true });
    await writeFile(location, `${lines.join('\n')}\n`, 'utf-8');
    return location;
  }

  async load(location: string): Promise<RankedEntry<AlbumPayload>[]> {
    let text: string;
    try {
      text = await readFile(location, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(`Results file "${location}" not found`);
      }
      throw err;
    }

    const [header, ...rows] = parseCsv(text);
    if (!header) {
      throw new ValidationError(`Results file "${location}" is empty`);
    }

    const index = new Map<string, number>(header.map((column, i): [string, number] => [column.trim(), i]));
    for (const required of ['rank', 'album'] as const) {
      if (!index.has(required)) {
        throw new ValidationError(`Results file "${location}" has no "${required}" column`);
      }
    }

    const cell = (row: string[], column: keyof TierListCsvRow): string => {
      const i = index.get(column);
      return i === undefined ? '' : (row[i] ?? '').trim();
    };

    return rows.map((row, i) => {
      const line = i + 2;
      const rank = Number(cell(row, 'rank'));
      if (!Number.isInteger(rank)) {
        throw new ValidationError(`Line ${line}: rank "${cell(row, 'rank')}" is not an integer`, { line });
      }

      const trackCountText = cell(row, 'tracks_in_playlist');
      const trackCount = trackCountText === '' ? 0 : Number(trackCountText);
      if (!Number.isInteger(trackCount) || trackCount < 0) {
        throw new ValidationError(`Line ${line}: tracks_in_playlist "${trackCountText}" is not a count`, { line });
      }

      return {
        position: rank,
        item: toItem({
          albumId: cell(row, 'album_id'),
          title: cell(row, 'album') || 'Unknown Album',
          artists: cell(row, 'artists') || 'Unknown Artist',
          url: cell(row, 'album_url'),
          trackCount,
        }),
      };
    });
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
    return names
      .filter((name) => name.toLowerCase().endsWith('.csv'))
      .sort()
      .map((name) => join(this.directory, name));
  }
}

function toRow(result: ScoredResult<AlbumPayload>): TierListCsvRow {
  const { payload } = result.item;
  return {
    rank: result.position,
    score: result.score,
    album: payload.title,
    artists: payload.artists,
    tracks_in_playlist: payload.trackTitles.length,
    album_url: payload.url,
    album_id: payload.albumId,
  };
}

interface StoredAlbum {
  albumId: string;
  title: string;
  artists: string;
  url: string;
  trackCount: number;
}

/**
 * Rebuild an item from stored columns. Track titles are not stored, so the
 * payload carries numbered placeholders of the stored count.
 */
export function toItem(stored: StoredAlbum): AlbumItem {
  return {
    // Older exports may lack album ids; title + artists is the fallback identity
    key: stored.albumId || `${stored.title} — ${stored.artists}`,
    label: `${stored.title} — ${stored.artists}`,
    payload: {
      albumId: stored.albumId,
      title: stored.title,
      artists: stored.artists,
      url: stored.url,
      trackTitles: Array.from({ length: stored.trackCount }, (_, i) => `Track ${i + 1}`),
    },
  };
}
