/**
 * Interactive terminal oracle.
 * Shows two albums, asks which one is preferred, and lets the user peek at
 * the playlist tracks of both before answering. Quitting (or Ctrl+C) answers
 * 'abort'.
 */

import { select } from '@inquirer/prompts';
import type { AlbumItem, AlbumPayload, Preference } from '../types/models.js';
import type { IComparatorOracle } from './IComparatorOracle.js';

type Choice = 'first' | 'second' | 'inspect' | 'quit';

const TRACK_PREVIEW_LIMIT = 10;

export interface TerminalOracleOptions {
  /** Worst-case number of comparisons, shown in the prompt header. */
  estimatedTotal: number;
  /** Line writer. Default: console.log. */
  write?: (line: string) => void;
}

export class TerminalOracle implements IComparatorOracle<AlbumPayload> {
  private answered = 0;
  private readonly estimatedTotal: number;
  private readonly write: (line: string) => void;

  constructor(options: TerminalOracleOptions) {
    this.estimatedTotal = options.estimatedTotal;
    this.write = options.write ?? ((line) => console.log(line));
  }

  /** Comparisons answered so far. */
  get comparisons(): number {
    return this.answered;
  }

  async compare(first: AlbumItem, second: AlbumItem): Promise<Preference> {
    for (;;) {
      const remaining = Math.max(0, this.estimatedTotal - this.answered);
      this.write('');
      this.write(
        `=== Comparison ${this.answered + 1}/${this.estimatedTotal} (${remaining} remaining) ===`
      );
      this.write(' [1]');
      this.writeAlbum(first);
      this.write(' [2]');
      this.writeAlbum(second);

      let choice: Choice;
      try {
        choice = await select<Choice>({
          message: 'Which album do you prefer?',
          choices: [
            { name: '1', value: 'first' },
            { name: '2', value: 'second' },
            { name: 'i  show track lists', value: 'inspect' },
            { name: 'q  quit', value: 'quit' },
          ],
        });
      } catch (err) {
        if (err instanceof Error && err.name === 'ExitPromptError') return 'abort';
        throw err;
      }

      if (choice === 'quit') return 'abort';

      if (choice === 'inspect') {
        this.write('');
        this.write('--- Track snippets from this playlist ---');
        for (const line of [...this.describe(first), '', ...this.describe(second)]) {
          this.write(line);
        }
        this.write('-----------------------------------------');
        continue;
      }

      this.answered++;
      return choice;
    }
  }

  describe(item: AlbumItem): string[] {
    const { title, trackTitles } = item.payload;
    const lines = [`${title}:`];
    for (const track of trackTitles.slice(0, TRACK_PREVIEW_LIMIT)) {
      lines.push(`   - ${track}`);
    }
    if (trackTitles.length > TRACK_PREVIEW_LIMIT) {
      lines.push(`   ...(+${trackTitles.length - TRACK_PREVIEW_LIMIT} more)`);
    }
    return lines;
  }

  private writeAlbum(item: AlbumItem): void {
    const { title, artists, url, trackTitles } = item.payload;
    this.write(`  ${title} — ${artists}  (tracks in playlist: ${trackTitles.length})`);
    if (url) this.write(`  ${url}`);
  }
}
