/**
 * Threshold band parsing.
 * Turns operator input such as {"1%": 10, "10%": 9.5, "100%": 6} into
 * validated bands, and renders bands back into the same notation.
 */

import type { ThresholdBand } from '../types/models.js';
import { DEFAULT_BANDS } from '../constants.js';
import { ValidationError } from '../errors.js';
import { validateBands } from './ScoringService.js';

const PERCENTILE_KEY = /^\s*(\d+(?:\.\d+)?)\s*(%?)\s*$/;

export class ThresholdService {
  /**
   * Parse a JSON object mapping cumulative percentile -> score.
   * Keys may be fractions ("0.1"), percentages ("10") or suffixed ("10%");
   * a bare number above 1 is read as a percentage. Empty input yields the
   * default bands.
   */
  parse(text: string): ThresholdBand[] {
    if (text.trim() === '') {
      return DEFAULT_BANDS.map((band) => ({ ...band }));
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ValidationError('Thresholds must be a JSON object such as {"10%": 9.5, "100%": 6}');
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new ValidationError('Thresholds must be a JSON object mapping percentile to score');
    }

    const bands = Object.entries(data).map(([key, value]) => ({
      upperBound: this.parseKey(key),
      score: this.parseScore(key, value),
    }));

    bands.sort((a, b) => a.upperBound - b.upperBound);
    validateBands(bands);
    return bands;
  }

  /** Render bands as a JSON object keyed by percentage. */
  format(bands: readonly ThresholdBand[]): string {
    const entries = bands.map((band) => {
      const percent = Number((band.upperBound * 100).toFixed(6));
      return `"${percent}%":${band.score}`;
    });
    return `{${entries.join(',')}}`;
  }

  private parseKey(key: string): number {
    const match = PERCENTILE_KEY.exec(key);
    if (!match) {
      throw new ValidationError(`Invalid percentile "${key}"`, { key });
    }
    const value = Number(match[1]);
    return match[2] === '%' || value > 1 ? value / 100 : value;
  }

  private parseScore(key: string, value: unknown): number {
    const score = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof score !== 'number' || !Number.isFinite(score)) {
      throw new ValidationError(`Score for "${key}" must be a number`, { key });
    }
    return score;
  }
}
