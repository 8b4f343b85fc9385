/**
 * Playlist export item source.
 * Reads a JSON playlist export from disk and groups its tracks into albums.
 *
 * Expected shape:
 *   { "name": "...", "tracks": [{ "name": "...", "album": { "id", "name", "artists", "url" } }] }
 * `artists` may be a list of names or of { name } objects.
 */

import { readFile } from 'node:fs/promises';
import type { AlbumItem, AlbumPayload } from '../types/models.js';
import type { IItemSource, ItemCollection } from './IItemSource.js';
import { DEFAULT_MIN_TRACKS_PER_ALBUM } from '../constants.js';
import { NotFoundError, ValidationError } from '../errors.js';

export interface PlaylistTrack {
  name: string;
  album: {
    id: string | null;
    name: string;
    artists: string[];
    url: string | null;
  } | null;
}

export interface PlaylistExport {
  name: string | null;
  tracks: PlaylistTrack[];
}

const ALBUM_URL_PREFIX = 'https://open.spotify.com/album/';

type AlbumDraft = Omit<AlbumPayload, 'trackTitles'> & { trackTitles: string[] };

export class PlaylistFileSource implements IItemSource<AlbumPayload> {
  constructor(private readonly minTracksPerAlbum: number = DEFAULT_MIN_TRACKS_PER_ALBUM) {}

  async load(path: string): Promise<ItemCollection<AlbumPayload>> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw new NotFoundError(`Playlist file "${path}" not found`);
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ValidationError(`Playlist file "${path}" is not valid JSON`);
    }

    const playlist = parsePlaylistExport(data);
    return {
      name: playlist.name,
      items: groupTracksIntoAlbums(playlist, this.minTracksPerAlbum),
    };
  }
}

/**
 * Group tracks by album id, keep albums with at least `minTracks` tracks,
 * most represented first, then by artists and title.
 */
export function groupTracksIntoAlbums(playlist: PlaylistExport, minTracks: number): AlbumItem[] {
  const albums = new Map<string, AlbumDraft>();

  for (const track of playlist.tracks) {
    const album = track.album;
    // Local files carry no album id
    if (!album?.id) continue;

    let payload = albums.get(album.id);
    if (!payload) {
      payload = {
        albumId: album.id,
        title: album.name,
        artists: album.artists.join(', '),
        url: album.url ?? `${ALBUM_URL_PREFIX}${album.id}`,
        trackTitles: [],
      };
      albums.set(album.id, payload);
    }
    payload.trackTitles.push(track.name);
  }

  return [...albums.values()]
    .filter((a) => a.trackTitles.length >= minTracks)
    .sort(
      (a, b) =>
        b.trackTitles.length - a.trackTitles.length ||
        compareText(a.artists.toLowerCase(), b.artists.toLowerCase()) ||
        compareText(a.title.toLowerCase(), b.title.toLowerCase())
    )
    .map((payload) => ({
      key: payload.albumId,
      label: `${payload.title} — ${payload.artists}`,
      payload,
    }));
}

export function parsePlaylistExport(data: unknown): PlaylistExport {
  if (!isRecord(data) || !Array.isArray(data.tracks)) {
    throw new ValidationError('Playlist export must be an object with a "tracks" array');
  }

  const tracks = data.tracks.map((raw: unknown, index: number): PlaylistTrack => {
    if (!isRecord(raw)) {
      throw new ValidationError(`tracks[${index}] must be an object`);
    }
    return {
      name: typeof raw.name === 'string' ? raw.name : 'Unknown Track',
      album: parseAlbum(raw.album, index),
    };
  });

  return {
    name: typeof data.name === 'string' ? data.name : null,
    tracks,
  };
}

function parseAlbum(raw: unknown, index: number): PlaylistTrack['album'] {
  if (raw === undefined || raw === null) return null;
  if (!isRecord(raw)) {
    throw new ValidationError(`tracks[${index}].album must be an object`);
  }

  const artists = Array.isArray(raw.artists) ? raw.artists : [];
  return {
    id: typeof raw.id === 'string' && raw.id !== '' ? raw.id : null,
    name: typeof raw.name === 'string' ? raw.name : 'Unknown Album',
    artists: artists.map((artist: unknown) => {
      if (typeof artist === 'string') return artist;
      if (isRecord(artist) && typeof artist.name === 'string') return artist.name;
      throw new ValidationError(`tracks[${index}].album.artists must hold names`);
    }),
    url: typeof raw.url === 'string' && raw.url !== '' ? raw.url : null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
