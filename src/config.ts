/**
 * Runtime configuration, read from environment variables.
 *
 *   ALBUM_TIERS_RESULTS_DIR     where CSV tier lists are written (default ".")
 *   ALBUM_TIERS_MIN_TRACKS      minimum playlist tracks per album (default 4)
 *   ALBUM_TIERS_INCREMENT       score rounding increment (default 0.25)
 *   ALBUM_TIERS_BANDS           threshold JSON, e.g. {"10%": 9.5, "100%": 6}
 *   ALBUM_TIERS_CLAMP           keep band scores within MIN:MAX, e.g. 6:10 (default: none)
 *   ALBUM_TIERS_INTERPOLATE     true to blend between band scores (default false)
 *   ALBUM_TIERS_LOG_LEVEL       debug | info | warn | error (default warn)
 *   SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY   store results in Supabase instead of CSV
 *   AXIOM_API_KEY, AXIOM_DATASET              ship logs to Axiom
 */

import type { ScoreClamp, ThresholdBand } from './types/models.js';
import type { SupabaseSettings } from './db.js';
import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import { DEFAULT_INCREMENT, DEFAULT_MIN_TRACKS_PER_ALBUM } from './constants.js';
import { ThresholdService } from './services/ThresholdService.js';
import { parseClamp } from './services/ScoringService.js';
import { AppError, ConfigError } from './errors.js';

export interface AxiomSettings {
  apiKey: string;
  dataset: string;
}

export interface AppConfig {
  resultsDir: string;
  minTracksPerAlbum: number;
  increment: number;
  bands: ThresholdBand[];
  clamp: ScoreClamp | null;
  interpolate: boolean;
  logLevel: LogLevel;
  supabase: SupabaseSettings | null;
  axiom: AxiomSettings | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const minTracksPerAlbum = readNumber(env, 'ALBUM_TIERS_MIN_TRACKS', DEFAULT_MIN_TRACKS_PER_ALBUM);
  if (!Number.isInteger(minTracksPerAlbum) || minTracksPerAlbum < 1) {
    throw new ConfigError('ALBUM_TIERS_MIN_TRACKS must be a positive integer', {
      variable: 'ALBUM_TIERS_MIN_TRACKS',
    });
  }

  const increment = readNumber(env, 'ALBUM_TIERS_INCREMENT', DEFAULT_INCREMENT);
  if (increment <= 0) {
    throw new ConfigError('ALBUM_TIERS_INCREMENT must be greater than 0', {
      variable: 'ALBUM_TIERS_INCREMENT',
    });
  }

  const logLevel = env.ALBUM_TIERS_LOG_LEVEL?.trim().toLowerCase() || 'warn';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`ALBUM_TIERS_LOG_LEVEL "${logLevel}" is not one of debug, info, warn, error`, {
      variable: 'ALBUM_TIERS_LOG_LEVEL',
    });
  }

  return {
    resultsDir: env.ALBUM_TIERS_RESULTS_DIR?.trim() || '.',
    minTracksPerAlbum,
    increment,
    bands: readBands(env),
    clamp: readClamp(env),
    interpolate: readFlag(env, 'ALBUM_TIERS_INTERPOLATE'),
    logLevel,
    supabase: readPair(env, 'SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', (url, serviceRoleKey) => ({
      url,
      serviceRoleKey,
    })),
    axiom: readPair(env, 'AXIOM_API_KEY', 'AXIOM_DATASET', (apiKey, dataset) => ({ apiKey, dataset })),
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`, { variable: name });
  }
  return value;
}

function readBands(env: NodeJS.ProcessEnv): ThresholdBand[] {
  try {
    return new ThresholdService().parse(env.ALBUM_TIERS_BANDS ?? '');
  } catch (err) {
    if (err instanceof AppError) {
      throw new ConfigError(`ALBUM_TIERS_BANDS: ${err.message}`, { variable: 'ALBUM_TIERS_BANDS' });
    }
    throw err;
  }
}

function readClamp(env: NodeJS.ProcessEnv): ScoreClamp | null {
  const raw = env.ALBUM_TIERS_CLAMP?.trim();
  if (!raw) return null;
  try {
    return parseClamp(raw);
  } catch (err) {
    if (err instanceof AppError) {
      throw new ConfigError(`ALBUM_TIERS_CLAMP: ${err.message}`, { variable: 'ALBUM_TIERS_CLAMP' });
    }
    throw err;
  }
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return false;
  if (TRUE_VALUES.includes(raw)) return true;
  if (FALSE_VALUES.includes(raw)) return false;
  throw new ConfigError(`${name} must be true or false, got "${raw}"`, { variable: name });
}

/** Both variables set → settings; neither → null; only one → error. */
function readPair<T>(
  env: NodeJS.ProcessEnv,
  first: string,
  second: string,
  build: (a: string, b: string) => T
): T | null {
  const a = env[first]?.trim();
  const b = env[second]?.trim();
  if (a && b) return build(a, b);
  if (!a && !b) return null;
  throw new ConfigError(`${first} and ${second} must be set together`, {
    missing: a ? second : first,
  });
}
