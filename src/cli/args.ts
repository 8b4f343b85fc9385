/**
 * Command-line argument parsing.
 *
 *   album-tiers rank [playlist.json] [--min-tracks N] [scoring options] [--out NAME]
 *   album-tiers rescore [location] [scoring options] [--out NAME]
 *   album-tiers list
 *   album-tiers help
 */

import type { ScoreClamp } from '../types/models.js';
import { parseClamp } from '../services/ScoringService.js';
import { ValidationError } from '../errors.js';

export type CommandName = 'rank' | 'rescore' | 'list' | 'help';

export interface CliArgs {
  command: CommandName;
  /** Playlist file for rank, stored list location for rescore. */
  target?: string;
  minTracks?: number;
  bands?: string;
  increment?: number;
  clamp?: ScoreClamp;
  interpolate?: boolean;
  out?: string;
}

type FlagName = 'min-tracks' | 'bands' | 'increment' | 'clamp' | 'interpolate' | 'out';

const SCORING_FLAGS: readonly FlagName[] = ['bands', 'increment', 'clamp', 'interpolate'];

const COMMAND_FLAGS: Record<CommandName, readonly FlagName[]> = {
  rank: ['min-tracks', ...SCORING_FLAGS, 'out'],
  rescore: [...SCORING_FLAGS, 'out'],
  list: [],
  help: [],
};

/** Flags that are switches and take no value. */
const SWITCHES: readonly FlagName[] = ['interpolate'];

export const USAGE = [
  'Usage:',
  '  album-tiers rank [playlist.json] [--min-tracks N] [scoring options] [--out NAME]',
  '  album-tiers rescore [location] [scoring options] [--out NAME]',
  '  album-tiers list',
  '',
  'Scoring options:',
  '  --bands JSON      cumulative percentile -> score, e.g. \'{"1%":10,"10%":9.5,"25%":8.75,"75%":7.5,"100%":6}\'',
  '                    keys ending in % or bare numbers above 1 are percentages ("10%", "10");',
  '                    bare numbers up to 1 are fractions ("0.1"), so "1" means 100%, not 1%',
  '  --increment X     round scores half up to multiples of X (default 0.25)',
  '  --clamp MIN:MAX   keep band scores within MIN..MAX before rounding, e.g. 6:10',
  '  --interpolate     blend linearly between adjacent band scores instead of stepping',
].join('\n');

const COMMANDS: readonly CommandName[] = ['rank', 'rescore', 'list', 'help'];

function isCommand(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === '--help' || first === '-h') {
    return { command: 'help' };
  }
  if (!isCommand(first)) {
    throw new ValidationError(`Unknown command "${first}"`, { command: first });
  }

  const args: CliArgs = { command: first };
  const allowed = COMMAND_FLAGS[first];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (!arg.startsWith('--')) {
      if (args.target !== undefined || first === 'list' || first === 'help') {
        throw new ValidationError(`Unexpected argument "${arg}"`);
      }
      args.target = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = arg.slice(2, eq === -1 ? undefined : eq);
    const flag = allowed.find((f) => f === name);
    if (!flag) {
      throw new ValidationError(`Unknown option "--${name}" for ${first}`);
    }

    if (SWITCHES.includes(flag)) {
      if (eq !== -1) {
        throw new ValidationError(`Option "--${flag}" takes no value`);
      }
      applyFlag(args, flag, '');
      continue;
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ValidationError(`Option "--${flag}" needs a value`);
      }
      value = next;
      i++;
    }

    applyFlag(args, flag, value);
  }

  return args;
}

function applyFlag(args: CliArgs, flag: FlagName, value: string): void {
  switch (flag) {
    case 'min-tracks': {
      const n = Number(value);
      if (!Number.isInteger(n) || n < 1) {
        throw new ValidationError(`--min-tracks must be a positive integer, got "${value}"`);
      }
      args.minTracks = n;
      break;
    }
    case 'increment': {
      const x = Number(value);
      if (!Number.isFinite(x) || x <= 0) {
        throw new ValidationError(`--increment must be a positive number, got "${value}"`);
      }
      args.increment = x;
      break;
    }
    case 'clamp':
      args.clamp = parseClamp(value);
      break;
    case 'interpolate':
      args.interpolate = true;
      break;
    case 'bands':
      args.bands = value;
      break;
    case 'out':
      args.out = value;
      break;
  }
}
