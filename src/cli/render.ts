import type { AlbumPayload, Item, RankedEntry, ScoredResult } from '../types/models.js';

export function renderTierList(results: readonly ScoredResult<AlbumPayload>[]): string[] {
  const lines: string[] = [];
  for (const { item, position, score } of results) {
    const { title, artists, url, trackTitles } = item.payload;
    lines.push(
      `${String(position).padStart(2)}. ${title} — ${artists}  |  Score: ${formatScore(score)}  |  In-playlist tracks: ${trackTitles.length}`
    );
    if (url) lines.push(`    ${url}`);
  }
  return lines;
}

/** Stored order preview, before re-scoring. */
export function renderStoredRanking(entries: readonly RankedEntry<AlbumPayload>[]): string[] {
  return [...entries]
    .sort((a, b) => a.position - b.position)
    .map(({ position, item }) => `${String(position).padStart(2)}. ${albumLine(item)}`);
}

export function renderAlbumList(items: readonly Item<AlbumPayload>[]): string[] {
  return items.map((item) => `- ${albumLine(item)}`);
}

function albumLine(item: Item<AlbumPayload>): string {
  const { title, artists, trackTitles } = item.payload;
  return `${title} — ${artists} (tracks in playlist: ${trackTitles.length})`;
}

export function formatScore(score: number): string {
  return String(score).padStart(5);
}
