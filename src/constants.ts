import type { ThresholdBand } from './types/models.js';

/** Default bands: top 1% → 10, top 10% → 9.5, top 25% → 8.75, top 75% → 7.5, rest → 6. */
export const DEFAULT_BANDS: readonly ThresholdBand[] = [
  { upperBound: 0.01, score: 10.0 },
  { upperBound: 0.1, score: 9.5 },
  { upperBound: 0.25, score: 8.75 },
  { upperBound: 0.75, score: 7.5 },
  { upperBound: 1.0, score: 6.0 },
];

export const DEFAULT_INCREMENT = 0.25;

/** Albums with fewer playlist tracks than this are left out of a session. */
export const DEFAULT_MIN_TRACKS_PER_ALBUM = 4;

export const SERVICE_NAME = 'album-tiers';
