import { describe, it, expect } from 'vitest';
import { parseArgs, USAGE } from '../../src/cli/args.js';
import { InvalidBandsError, ValidationError } from '../../src/errors.js';

describe('parseArgs', () => {
  it('should default to help with no arguments', () => {
    expect(parseArgs([])).toEqual({ command: 'help' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
    expect(parseArgs(['-h'])).toEqual({ command: 'help' });
  });

  it('should parse rank with a playlist and every option', () => {
    expect(
      parseArgs(['rank', 'playlist.json', '--min-tracks', '3', '--bands={"100%":6}', '--increment', '0.5', '--out', 'mine'])
    ).toEqual({
      command: 'rank',
      target: 'playlist.json',
      minTracks: 3,
      bands: '{"100%":6}',
      increment: 0.5,
      out: 'mine',
    });
  });

  it('should parse rescore with a location', () => {
    expect(parseArgs(['rescore', 'old.csv'])).toEqual({ command: 'rescore', target: 'old.csv' });
  });

  it('should reject an unknown command', () => {
    expect(() => parseArgs(['shuffle'])).toThrow(ValidationError);
    expect(() => parseArgs(['shuffle'])).toThrow('Unknown command "shuffle"');
  });

  it('should reject options the command does not take', () => {
    expect(() => parseArgs(['rescore', '--min-tracks', '2'])).toThrow('Unknown option "--min-tracks" for rescore');
    expect(() => parseArgs(['list', '--out', 'x'])).toThrow('Unknown option "--out" for list');
  });

  it('should reject an option without a value', () => {
    expect(() => parseArgs(['rank', '--out'])).toThrow('Option "--out" needs a value');
    expect(() => parseArgs(['rank', '--bands', '--out', 'x'])).toThrow('Option "--bands" needs a value');
  });

  it('should reject a second positional argument', () => {
    expect(() => parseArgs(['rank', 'a.json', 'b.json'])).toThrow('Unexpected argument "b.json"');
    expect(() => parseArgs(['list', 'extra'])).toThrow('Unexpected argument "extra"');
  });

  it('should validate numeric options', () => {
    expect(() => parseArgs(['rank', '--min-tracks', '0'])).toThrow('--min-tracks must be a positive integer, got "0"');
    expect(() => parseArgs(['rank', '--min-tracks', '2.5'])).toThrow('--min-tracks must be a positive integer, got "2.5"');
    expect(() => parseArgs(['rank', '--increment', '-1'])).toThrow('--increment must be a positive number, got "-1"');
    expect(() => parseArgs(['rank', '--increment=abc'])).toThrow('--increment must be a positive number, got "abc"');
  });

  it('should parse scoring options for rescore', () => {
    expect(parseArgs(['rescore', 'old.csv', '--clamp', '6:10', '--interpolate'])).toEqual({
      command: 'rescore',
      target: 'old.csv',
      clamp: { min: 6, max: 10 },
      interpolate: true,
    });
    expect(parseArgs(['rank', '--interpolate', 'p.json', '--clamp=-1:4.5'])).toEqual({
      command: 'rank',
      target: 'p.json',
      clamp: { min: -1, max: 4.5 },
      interpolate: true,
    });
  });

  it('should reject a malformed or inverted clamp', () => {
    expect(() => parseArgs(['rank', '--clamp', '6..10'])).toThrow('Clamp must be written MIN:MAX, got "6..10"');
    expect(() => parseArgs(['rank', '--clamp', '10:6'])).toThrow(InvalidBandsError);
  });

  it('should reject a value given to a switch', () => {
    expect(() => parseArgs(['rank', '--interpolate=yes'])).toThrow('Option "--interpolate" takes no value');
  });
});

describe('USAGE', () => {
  it('should explain how threshold keys are read', () => {
    expect(USAGE).toContain('keys ending in % or bare numbers above 1 are percentages ("10%", "10");');
    expect(USAGE).toContain('bare numbers up to 1 are fractions ("0.1"), so "1" means 100%, not 1%');
  });

  it('should list every scoring option', () => {
    for (const flag of ['--bands', '--increment', '--clamp MIN:MAX', '--interpolate']) {
      expect(USAGE).toContain(flag);
    }
  });
});
