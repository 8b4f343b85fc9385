import { describe, it, expect, vi, beforeEach } from 'vitest';
import { select } from '@inquirer/prompts';
import { TerminalOracle } from '../../src/oracle/TerminalOracle.js';
import { album } from '../mocks/fixtures.js';

vi.mock('@inquirer/prompts', () => ({ select: vi.fn() }));

const mockSelect = vi.mocked(select);

describe('TerminalOracle', () => {
  let lines: string[];
  let oracle: TerminalOracle;

  beforeEach(() => {
    mockSelect.mockReset();
    lines = [];
    oracle = new TerminalOracle({ estimatedTotal: 3, write: (line) => lines.push(line) });
  });

  it('should show both albums and return the chosen side', async () => {
    mockSelect.mockResolvedValueOnce('second');

    await expect(oracle.compare(album('a'), album('b', 5))).resolves.toBe('second');
    expect(lines).toEqual([
      '',
      '=== Comparison 1/3 (3 remaining) ===',
      ' [1]',
      '  a — Test Artist  (tracks in playlist: 4)',
      '  https://example.test/album/a',
      ' [2]',
      '  b — Test Artist  (tracks in playlist: 5)',
      '  https://example.test/album/b',
    ]);
    expect(oracle.comparisons).toBe(1);
  });

  it('should advance the header counter after each answer', async () => {
    mockSelect.mockResolvedValueOnce('first').mockResolvedValueOnce('first');

    await oracle.compare(album('a'), album('b'));
    lines.length = 0;
    await oracle.compare(album('a'), album('c'));

    expect(lines[1]).toBe('=== Comparison 2/3 (2 remaining) ===');
  });

  it('should show track lists on inspect and ask again', async () => {
    mockSelect.mockResolvedValueOnce('inspect').mockResolvedValueOnce('first');

    await expect(oracle.compare(album('a', 2), album('b', 1))).resolves.toBe('first');

    expect(mockSelect).toHaveBeenCalledTimes(2);
    const start = lines.indexOf('--- Track snippets from this playlist ---');
    expect(lines.slice(start, start + 8)).toEqual([
      '--- Track snippets from this playlist ---',
      'a:',
      '   - a track 1',
      '   - a track 2',
      '',
      'b:',
      '   - b track 1',
      '-----------------------------------------',
    ]);
    // Inspecting does not count as a comparison
    expect(oracle.comparisons).toBe(1);
  });

  it('should answer abort when the user quits', async () => {
    mockSelect.mockResolvedValueOnce('quit');
    await expect(oracle.compare(album('a'), album('b'))).resolves.toBe('abort');
    expect(oracle.comparisons).toBe(0);
  });

  it('should answer abort when the prompt is interrupted', async () => {
    const interrupted = new Error('User force closed the prompt');
    interrupted.name = 'ExitPromptError';
    mockSelect.mockRejectedValueOnce(interrupted);

    await expect(oracle.compare(album('a'), album('b'))).resolves.toBe('abort');
  });

  it('should rethrow other prompt failures', async () => {
    mockSelect.mockRejectedValueOnce(new Error('stdin closed'));
    await expect(oracle.compare(album('a'), album('b'))).rejects.toThrow('stdin closed');
  });

  describe('describe', () => {
    it('should list at most ten tracks and count the rest', () => {
      const described = oracle.describe(album('big', 12));
      expect(described).toHaveLength(12);
      expect(described[0]).toBe('big:');
      expect(described[10]).toBe('   - big track 10');
      expect(described[11]).toBe('   ...(+2 more)');
    });
  });
});
