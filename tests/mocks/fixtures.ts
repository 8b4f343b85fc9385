import type { AlbumItem, Item, RankedEntry } from '../../src/types/models.js';

/** Album item with `tracks` numbered track titles. */
export function album(key: string, tracks = 4, artists = 'Test Artist'): AlbumItem {
  return {
    key,
    label: `${key} — ${artists}`,
    payload: {
      albumId: key,
      title: key,
      artists,
      url: `https://example.test/album/${key}`,
      trackTitles: Array.from({ length: tracks }, (_, i) => `${key} track ${i + 1}`),
    },
  };
}

export function plainItems(keys: readonly string[]): Item<null>[] {
  return keys.map((key) => ({ key, label: key, payload: null }));
}

export function entries<P>(items: readonly Item<P>[]): RankedEntry<P>[] {
  return items.map((item, i) => ({ position: i + 1, item }));
}
