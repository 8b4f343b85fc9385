/**
 * Percentile scoring service.
 * Maps each position of a ranking to the score of its percentile band,
 * then quantizes the score to a fixed increment.
 *
 * Percentile of position r out of n is r / n, so the best item has the
 * smallest percentile. A position takes the score of the first band whose
 * upper bound is >= its percentile. With `interpolate`, the score instead
 * moves linearly from the previous band's score to this band's score across
 * the band. Quantization rounds half up.
 */

import type {
  Item,
  RankedEntry,
  Ranking,
  ScoreClamp,
  ScoredResult,
  ThresholdBand,
} from '../types/models.js';
import { InvalidBandsError, InvalidRankingError, ValidationError } from '../errors.js';

export interface ScoringOptions {
  /** Clamp band scores into [min, max] before quantizing. */
  clamp?: ScoreClamp;
  /** Blend linearly between adjacent band scores instead of stepping. */
  interpolate?: boolean;
}

// Absorbs binary error in value / increment (e.g. 0.35 / 0.1 = 3.4999999999999996)
const QUANTIZE_EPSILON = 1e-9;
const OUTPUT_DECIMALS = 10;

export function validateBands(bands: readonly ThresholdBand[]): void {
  if (bands.length === 0) {
    throw new InvalidBandsError('At least one threshold band is required');
  }

  let previous = 0;
  for (const [index, band] of bands.entries()) {
    if (!Number.isFinite(band.upperBound) || band.upperBound <= 0 || band.upperBound > 1) {
      throw new InvalidBandsError(
        `Band ${index + 1} upper bound must be in (0, 1], got ${band.upperBound}`,
        { index }
      );
    }
    if (!Number.isFinite(band.score)) {
      throw new InvalidBandsError(`Band ${index + 1} score must be a finite number`, { index });
    }
    // Strictly ascending bounds rule out both unsorted and overlapping bands
    if (band.upperBound <= previous) {
      throw new InvalidBandsError(
        `Band upper bounds must be strictly ascending (band ${index + 1}: ${band.upperBound} <= ${previous})`,
        { index }
      );
    }
    previous = band.upperBound;
  }

  if (previous !== 1) {
    throw new InvalidBandsError(
      `The last band must end at 1.0 so every position is covered, got ${previous}`,
      { lastUpperBound: previous }
    );
  }
}

export function validateIncrement(increment: number): void {
  if (!Number.isFinite(increment) || increment <= 0) {
    throw new InvalidBandsError(`Rounding increment must be a positive number, got ${increment}`);
  }
}

function validateClamp(clamp: ScoreClamp | undefined): void {
  if (!clamp) return;
  if (!Number.isFinite(clamp.min) || !Number.isFinite(clamp.max) || clamp.min >= clamp.max) {
    throw new InvalidBandsError(`Clamp min must be below max, got ${clamp.min}..${clamp.max}`);
  }
}

const CLAMP_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s*:\s*(-?\d+(?:\.\d+)?)\s*$/;

/** Parse operator clamp text such as "6:10". */
export function parseClamp(text: string): ScoreClamp {
  const match = CLAMP_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`Clamp must be written MIN:MAX, got "${text}"`);
  }
  const clamp = { min: Number(match[1]), max: Number(match[2]) };
  validateClamp(clamp);
  return clamp;
}

/** Round half up to the nearest multiple of `increment`. */
export function quantize(value: number, increment: number): number {
  const steps = Math.floor(value / increment + 0.5 + QUANTIZE_EPSILON);
  return Number((steps * increment).toFixed(OUTPUT_DECIMALS));
}

/**
 * Check that stored entries form a ranking: positions exactly 1..n,
 * keys unique. Returns the items ordered by position.
 */
export function validateRanking<P>(entries: readonly RankedEntry<P>[]): Ranking<P> {
  const n = entries.length;
  const slots: Array<Item<P> | undefined> = new Array(n);
  const keys = new Set<string>();

  for (const entry of entries) {
    const { position, item } = entry;
    if (!Number.isInteger(position) || position < 1 || position > n) {
      throw new InvalidRankingError(`Rank position ${position} is outside 1..${n}`, { position });
    }
    if (slots[position - 1] !== undefined) {
      throw new InvalidRankingError(`Rank position ${position} appears more than once`, { position });
    }
    if (keys.has(item.key)) {
      throw new InvalidRankingError(`Item "${item.key}" appears more than once`, { key: item.key });
    }
    slots[position - 1] = item;
    keys.add(item.key);
  }

  // n entries with distinct in-range positions fill every slot
  return slots.filter((item): item is Item<P> => item !== undefined);
}

export class ScoringService {
  score<P>(
    ranking: Ranking<P>,
    bands: readonly ThresholdBand[],
    increment: number,
    options: ScoringOptions = {}
  ): ScoredResult<P>[] {
    this.validate(bands, increment, options);

    const total = ranking.length;
    return ranking.map((item, index) => {
      const position = index + 1;
      const percentile = position / total;
      const banded = options.interpolate
        ? interpolatedScore(bands, percentile)
        : bands[bandIndexFor(bands, percentile)].score;
      const raw = options.clamp
        ? Math.max(options.clamp.min, Math.min(options.clamp.max, banded))
        : banded;

      return {
        item,
        position,
        percentile,
        score: quantize(raw, increment),
      };
    });
  }

  /** Fail fast on bad configuration before any work starts. */
  validate(bands: readonly ThresholdBand[], increment: number, options: ScoringOptions = {}): void {
    validateBands(bands);
    validateIncrement(increment);
    validateClamp(options.clamp);
  }
}

function bandIndexFor(bands: readonly ThresholdBand[], percentile: number): number {
  const index = bands.findIndex((b) => b.upperBound >= percentile);
  if (index === -1) {
    // Unreachable for validated bands: the last bound is 1.0 and percentile <= 1
    throw new InvalidBandsError(`No band covers percentile ${percentile}`);
  }
  return index;
}

/**
 * Piecewise-linear score: from the previous band's (upperBound, score)
 * to this band's. The first band has no predecessor and stays flat.
 */
function interpolatedScore(bands: readonly ThresholdBand[], percentile: number): number {
  const index = bandIndexFor(bands, percentile);
  const band = bands[index];
  if (index === 0) return band.score;

  const previous = bands[index - 1];
  const t = (percentile - previous.upperBound) / (band.upperBound - previous.upperBound);
  return previous.score + t * (band.score - previous.score);
}
