/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * The CLI passes real collaborators; tests swap in mocks.
 */

import type { AlbumPayload } from './types/models.js';
import type { IResultRepository } from './repositories/IResultRepository.js';
import type { IItemSource } from './sources/IItemSource.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { RankingService } from './services/RankingService.js';
import { ScoringService } from './services/ScoringService.js';
import { SessionService } from './services/SessionService.js';
import { ThresholdService } from './services/ThresholdService.js';

export interface Container {
  rankingService: RankingService;
  scoringService: ScoringService;
  sessionService: SessionService;
  thresholdService: ThresholdService;
  itemSource: IItemSource<AlbumPayload>;
  resultRepo: IResultRepository;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  itemSource: IItemSource<AlbumPayload>;
  resultRepo: IResultRepository;
  logProvider: ILogProvider;
}): Container {
  const rankingService = new RankingService();
  const scoringService = new ScoringService();
  const sessionService = new SessionService(rankingService, scoringService, deps.logProvider);
  const thresholdService = new ThresholdService();

  return {
    rankingService,
    scoringService,
    sessionService,
    thresholdService,
    itemSource: deps.itemSource,
    resultRepo: deps.resultRepo,
    logProvider: deps.logProvider,
  };
}
