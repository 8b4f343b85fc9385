/**
 * Session coordinator.
 * Runs a fresh session (rank, then score) or re-scores a stored ranking
 * without asking the oracle anything. Errors propagate unchanged; the
 * coordinator only records them on the session and in the log.
 */

import type { IComparatorOracle } from '../oracle/IComparatorOracle.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Item, RankedEntry, Ranking, ScoredResult, ThresholdBand } from '../types/models.js';
import { Session } from '../session/Session.js';
import type { RankingOptions, RankingService } from './RankingService.js';
import { validateRanking, type ScoringOptions, type ScoringService } from './ScoringService.js';

export interface SessionOptions<P = unknown> extends RankingOptions<P>, ScoringOptions {
  /** Receives the session before any work starts. */
  onSession?: (session: Session) => void;
}

export class SessionService {
  constructor(
    private readonly rankingService: RankingService,
    private readonly scoringService: ScoringService,
    private readonly logProvider: ILogProvider
  ) {}

  async run<P>(
    items: readonly Item<P>[],
    oracle: IComparatorOracle<P>,
    bands: readonly ThresholdBand[],
    increment: number,
    options: SessionOptions<P> = {}
  ): Promise<ScoredResult<P>[]> {
    const session = new Session('fresh');
    options.onSession?.(session);
    this.logProvider.info('Ranking session started', {
      sessionId: session.id,
      items: items.length,
    });

    // Validate before the first comparison
    this.scoringService.validate(bands, increment, options);

    const frozen = items.map((item) => Object.freeze({ ...item }));

    session.transition('RANKING');
    let ranking: Ranking<P>;
    try {
      ranking = await this.rankingService.rank(frozen, oracle, {
        onProgress: (progress) => {
          session.recordComparison();
          options.onProgress?.(progress);
        },
        onInsert: options.onInsert,
      });
    } catch (err) {
      session.transition('ABORTED');
      this.logProvider.warn('Ranking session aborted', {
        sessionId: session.id,
        comparisons: session.comparisons,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    const results = this.score(session, ranking, bands, increment, options);
    this.logProvider.info('Ranking session completed', {
      sessionId: session.id,
      items: results.length,
      comparisons: session.comparisons,
    });
    return results;
  }

  rescore<P>(
    entries: readonly RankedEntry<P>[],
    bands: readonly ThresholdBand[],
    increment: number,
    options: Pick<SessionOptions<P>, 'clamp' | 'interpolate' | 'onSession'> = {}
  ): ScoredResult<P>[] {
    const session = new Session('rescore');
    options.onSession?.(session);

    this.scoringService.validate(bands, increment, options);
    const ranking = validateRanking(entries);

    const results = this.score(session, ranking, bands, increment, options);
    this.logProvider.info('Ranking re-scored', {
      sessionId: session.id,
      items: results.length,
    });
    return results;
  }

  private score<P>(
    session: Session,
    ranking: Ranking<P>,
    bands: readonly ThresholdBand[],
    increment: number,
    options: ScoringOptions
  ): ScoredResult<P>[] {
    session.transition('SCORING');
    const results = this.scoringService.score(ranking, bands, increment, {
      clamp: options.clamp,
      interpolate: options.interpolate,
    });
    session.transition('DONE');
    return results;
  }
}
