import { describe, it, expect, vi, beforeEach } from 'vitest';
import { confirm, input, select } from '@inquirer/prompts';
import { runList, runRank, runRescore, type CommandContext } from '../../src/cli/commands.js';
import { createContainer } from '../../src/container.js';
import { loadConfig } from '../../src/config.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { EmptyInputError, IndeterminateComparisonError, ValidationError } from '../../src/errors.js';
import { MockItemSource } from '../mocks/MockItemSource.js';
import { MockResultRepository } from '../mocks/MockResultRepository.js';
import { MockComparatorOracle, abortingOn } from '../mocks/MockComparatorOracle.js';
import { album, entries } from '../mocks/fixtures.js';
import type { AlbumPayload } from '../../src/types/models.js';

vi.mock('@inquirer/prompts', () => ({
  confirm: vi.fn(),
  input: vi.fn(),
  select: vi.fn(),
}));

const mockConfirm = vi.mocked(confirm);
const mockInput = vi.mocked(input);
const mockSelect = vi.mocked(select);

describe('CLI commands', () => {
  let itemSource: MockItemSource;
  let resultRepo: MockResultRepository;
  let logProvider: ConsoleLogProvider;
  let oracle: MockComparatorOracle<AlbumPayload>;
  let lines: string[];
  let ctx: CommandContext;

  beforeEach(() => {
    mockConfirm.mockReset();
    mockInput.mockReset();
    mockSelect.mockReset();

    itemSource = new MockItemSource();
    resultRepo = new MockResultRepository();
    logProvider = new ConsoleLogProvider();
    oracle = MockComparatorOracle.alphabetical<AlbumPayload>();
    lines = [];
    ctx = {
      container: createContainer({ itemSource, resultRepo, logProvider }),
      config: loadConfig({}),
      write: (line) => lines.push(line),
      createOracle: () => oracle,
    };
  });

  describe('runRank', () => {
    it('should rank, score and save without prompting when everything is given', async () => {
      itemSource.collections.set('p.json', [album('b'), album('a'), album('c')]);

      await runRank(ctx, {
        command: 'rank',
        target: 'p.json',
        bands: '{"50%":10,"100%":5}',
        increment: 0.5,
        out: 'mine',
      });

      expect(mockInput).not.toHaveBeenCalled();
      expect(mockConfirm).not.toHaveBeenCalled();
      expect(resultRepo.saved).toHaveLength(1);
      const { name, results } = resultRepo.saved[0];
      expect(name).toBe('mine');
      expect(results.map((r) => [r.item.key, r.position, r.score])).toEqual([
        ['a', 1, 10],
        ['b', 2, 5],
        ['c', 3, 5],
      ]);
      expect(lines).toContain('Found 3 album(s) meeting the threshold.');
      expect(lines).toContain('Estimated comparisons needed: ~3');
      expect(lines).toContain('=== Final Album Tier List ===');
      expect(lines.at(-1)).toBe('Wrote mem://mine');
      expect(logProvider.events.some((e) => e.message === 'Tier list saved')).toBe(true);
    });

    it('should ask for the playlist, thresholds and whether to save', async () => {
      itemSource.collections.set('asked.json', [album('x'), album('y')]);
      mockInput.mockResolvedValueOnce('asked.json').mockResolvedValueOnce('');
      mockConfirm.mockResolvedValueOnce(false);

      await runRank(ctx, { command: 'rank' });

      expect(itemSource.requested).toEqual(['asked.json']);
      expect(mockInput).toHaveBeenCalledTimes(2);
      expect(mockInput.mock.calls[1][0]).toMatchObject({
        default: '{"1%":10,"10%":9.5,"25%":8.75,"75%":7.5,"100%":6}',
      });
      expect(resultRepo.saved).toHaveLength(0);
    });

    it('should save under the default name when confirmed', async () => {
      itemSource.collections.set('p.json', [album('x')]);
      mockConfirm.mockResolvedValueOnce(true);
      mockInput.mockResolvedValueOnce('album_tiers');

      await runRank(ctx, { command: 'rank', target: 'p.json', bands: '{"100%":6}' });

      expect(mockInput.mock.calls[0][0]).toMatchObject({ default: 'album_tiers' });
      expect(resultRepo.saved[0].name).toBe('album_tiers');
      expect(resultRepo.saved[0].results[0].score).toBe(6);
    });

    it('should show the playlist name before the albums', async () => {
      itemSource.collections.set('p.json', [album('a')]);
      itemSource.names.set('p.json', 'Test Mix');

      await runRank(ctx, { command: 'rank', target: 'p.json', bands: '{"100%":6}', out: 'mine' });

      expect(lines.slice(0, 2)).toEqual(['Playlist: Test Mix', 'Found 1 album(s) meeting the threshold.']);
    });

    it('should clamp scores given on the command line', async () => {
      itemSource.collections.set('p.json', [album('b'), album('a'), album('c')]);

      await runRank(ctx, {
        command: 'rank',
        target: 'p.json',
        bands: '{"50%":10,"100%":5}',
        increment: 0.5,
        clamp: { min: 6, max: 9 },
        out: 'clamped',
      });

      expect(resultRepo.saved[0].results.map((r) => [r.item.key, r.score])).toEqual([
        ['a', 9],
        ['b', 6],
        ['c', 6],
      ]);
    });

    it('should interpolate scores when asked', async () => {
      itemSource.collections.set('p.json', [album('d'), album('c'), album('b'), album('a')]);

      await runRank(ctx, {
        command: 'rank',
        target: 'p.json',
        bands: '{"50%":10,"100%":6}',
        interpolate: true,
        out: 'smooth',
      });

      expect(resultRepo.saved[0].results.map((r) => r.score)).toEqual([10, 10, 8, 6]);
    });

    it('should stop when no album meets the track threshold', async () => {
      itemSource.collections.set('thin.json', []);

      await runRank(ctx, { command: 'rank', target: 'thin.json' });

      expect(lines).toEqual(['No albums found with at least 4 tracks in this playlist.']);
      expect(oracle.callCount).toBe(0);
    });

    it('should save nothing when the user aborts a comparison', async () => {
      itemSource.collections.set('p.json', [album('a'), album('b'), album('c')]);
      const aborting = abortingOn(MockComparatorOracle.alphabetical<AlbumPayload>(), 2);
      ctx.createOracle = () => aborting;

      await expect(
        runRank(ctx, { command: 'rank', target: 'p.json', bands: '{"100%":6}', out: 'never' })
      ).rejects.toThrow(IndeterminateComparisonError);
      expect(resultRepo.saved).toHaveLength(0);
    });
  });

  describe('runRescore', () => {
    it('should re-score the only stored list with new bands', async () => {
      resultRepo.seed('mem://old', entries([album('x'), album('y')]));

      await runRescore(ctx, { command: 'rescore', bands: '{"100%":7}', out: 'new' });

      expect(lines[0]).toBe('Using: mem://old');
      expect(lines).toContain('Loaded 2 albums from mem://old');
      expect(lines).toContain('=== Final Album Tier List (Rescored) ===');
      expect(mockSelect).not.toHaveBeenCalled();
      expect(resultRepo.saved[0].results.map((r) => [r.item.key, r.score])).toEqual([
        ['x', 7],
        ['y', 7],
      ]);
    });

    it('should apply the configured clamp unless the command line overrides it', async () => {
      resultRepo.seed('mem://old', entries([album('x'), album('y')]));
      ctx.config = { ...ctx.config, clamp: { min: 7, max: 8 } };

      await runRescore(ctx, { command: 'rescore', target: 'mem://old', bands: '{"100%":10}', out: 'conf' });
      await runRescore(ctx, {
        command: 'rescore',
        target: 'mem://old',
        bands: '{"100%":10}',
        clamp: { min: 6, max: 9.5 },
        out: 'flag',
      });

      expect(resultRepo.saved.map((s) => s.results[0].score)).toEqual([8, 9.5]);
    });

    it('should let the user pick among several stored lists', async () => {
      resultRepo.seed('mem://one', entries([album('a')]));
      resultRepo.seed('mem://two', entries([album('b'), album('c')]));
      mockSelect.mockResolvedValueOnce('mem://two');

      await runRescore(ctx, { command: 'rescore', bands: '{"100%":7}', out: 'picked' });

      expect(lines).toContain('Loaded 2 albums from mem://two');
    });

    it('should refuse a stored list without albums', async () => {
      resultRepo.seed('mem://empty', []);
      await expect(runRescore(ctx, { command: 'rescore', target: 'mem://empty' })).rejects.toThrow(
        EmptyInputError
      );
      expect(resultRepo.saved).toHaveLength(0);
    });

    it('should refuse when nothing is stored', async () => {
      await expect(runRescore(ctx, { command: 'rescore' })).rejects.toThrow(ValidationError);
      await expect(runRescore(ctx, { command: 'rescore' })).rejects.toThrow('No stored tier lists to rescore');
    });
  });

  describe('runList', () => {
    it('should print each stored location', async () => {
      resultRepo.seed('mem://a', []);
      resultRepo.seed('mem://b', []);
      await runList(ctx);
      expect(lines).toEqual(['mem://a', 'mem://b']);
    });

    it('should say when nothing is stored', async () => {
      await runList(ctx);
      expect(lines).toEqual(['No stored tier lists.']);
    });
  });
});
