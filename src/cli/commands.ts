/**
 * CLI commands: fresh ranking, re-scoring a stored list, listing stored lists.
 * Anything not given on the command line is asked for interactively.
 */

import { confirm, input, select } from '@inquirer/prompts';
import type { Container } from '../container.js';
import type { AppConfig } from '../config.js';
import type { IComparatorOracle } from '../oracle/IComparatorOracle.js';
import type { AlbumPayload, ScoredResult, ThresholdBand } from '../types/models.js';
import { estimateComparisons } from '../services/RankingService.js';
import type { ScoringOptions } from '../services/ScoringService.js';
import { EmptyInputError, ValidationError } from '../errors.js';
import type { CliArgs } from './args.js';
import { renderAlbumList, renderStoredRanking, renderTierList } from './render.js';

export interface CommandContext {
  container: Container;
  config: AppConfig;
  write: (line: string) => void;
  createOracle: (estimatedTotal: number) => IComparatorOracle<AlbumPayload>;
}

const DEFAULT_OUTPUT_NAME = 'album_tiers';

export async function runRank(ctx: CommandContext, args: CliArgs): Promise<void> {
  const { container, write } = ctx;

  const source = args.target ?? (await input({ message: 'Path to the playlist export (JSON):', required: true }));
  const { name: playlistName, items } = await container.itemSource.load(source);
  if (playlistName !== null) {
    write(`Playlist: ${playlistName}`);
  }
  if (items.length === 0) {
    write(`No albums found with at least ${ctx.config.minTracksPerAlbum} tracks in this playlist.`);
    return;
  }

  write(`Found ${items.length} album(s) meeting the threshold.`);
  write('');
  renderAlbumList(items).forEach(write);

  const bands = await resolveBands(ctx, args);
  const increment = args.increment ?? ctx.config.increment;
  const estimatedTotal = estimateComparisons(items.length);

  write('');
  write(`Estimated comparisons needed: ~${estimatedTotal}`);
  write("Tip: choose 'i' during any comparison to see track lists.");

  let completed = 0;
  const results = await container.sessionService.run(
    items,
    ctx.createOracle(estimatedTotal),
    bands,
    increment,
    {
      onProgress: (progress) => {
        completed = progress.completed;
      },
      onInsert: ({ item, position, size }) => {
        const percent = estimatedTotal > 0 ? (completed / estimatedTotal) * 100 : 100;
        write(`Inserted: ${item.label} — position ${position} of ${size} | Progress: ${percent.toFixed(1)}%`);
      },
      ...scoringOptions(ctx, args),
    }
  );

  write('');
  write(`Ranking complete! Used ${completed} comparisons.`);
  await finish(ctx, args, results, 'Final Album Tier List');
}

export async function runRescore(ctx: CommandContext, args: CliArgs): Promise<void> {
  const { container, write } = ctx;

  const location = args.target ?? (await pickStoredList(ctx));
  const entries = await container.resultRepo.load(location);
  if (entries.length === 0) {
    throw new EmptyInputError(`Tier list "${location}" holds no albums`);
  }
  write(`Loaded ${entries.length} albums from ${location}`);
  write('');
  write('Current ranking:');
  renderStoredRanking(entries).forEach(write);

  const bands = await resolveBands(ctx, args);
  const increment = args.increment ?? ctx.config.increment;
  const results = container.sessionService.rescore(entries, bands, increment, scoringOptions(ctx, args));

  await finish(ctx, args, results, 'Final Album Tier List (Rescored)');
}

export async function runList(ctx: CommandContext): Promise<void> {
  const locations = await ctx.container.resultRepo.list();
  if (locations.length === 0) {
    ctx.write('No stored tier lists.');
    return;
  }
  locations.forEach(ctx.write);
}

/** Command-line flags win over configuration. */
function scoringOptions(ctx: CommandContext, args: CliArgs): ScoringOptions {
  const clamp = args.clamp ?? ctx.config.clamp;
  return {
    ...(clamp && { clamp }),
    interpolate: args.interpolate ?? ctx.config.interpolate,
  };
}

async function resolveBands(ctx: CommandContext, args: CliArgs): Promise<ThresholdBand[]> {
  const { thresholdService } = ctx.container;
  if (args.bands !== undefined) {
    return thresholdService.parse(args.bands);
  }

  const answer = await input({
    message: 'Thresholds (cumulative percentile → score):',
    default: thresholdService.format(ctx.config.bands),
  });
  return thresholdService.parse(answer);
}

async function pickStoredList(ctx: CommandContext): Promise<string> {
  const locations = await ctx.container.resultRepo.list();
  if (locations.length === 0) {
    throw new ValidationError('No stored tier lists to rescore');
  }
  if (locations.length === 1) {
    ctx.write(`Using: ${locations[0]}`);
    return locations[0];
  }
  return select({
    message: 'Select a stored tier list:',
    choices: locations.map((location) => ({ name: location, value: location })),
  });
}

async function finish(
  ctx: CommandContext,
  args: CliArgs,
  results: ScoredResult<AlbumPayload>[],
  title: string
): Promise<void> {
  const { write } = ctx;
  write('');
  write(`=== ${title} ===`);
  renderTierList(results).forEach(write);

  const name = args.out ?? (await askOutputName());
  if (name === null) return;

  const location = await ctx.container.resultRepo.save(name, results);
  ctx.container.logProvider.info('Tier list saved', { location, items: results.length });
  write(`Wrote ${location}`);
}

async function askOutputName(): Promise<string | null> {
  const save = await confirm({ message: 'Save results?', default: false });
  if (!save) return null;
  return input({ message: 'Name:', default: DEFAULT_OUTPUT_NAME });
}
