/**
 * Production container — CSV files or Supabase for results, stderr or Axiom
 * for logs, depending on what the configuration provides.
 */

import { createContainer, type Container } from './container.js';
import type { AppConfig } from './config.js';
import { SERVICE_NAME } from './constants.js';
import { getSupabaseClient } from './db.js';
import { AxiomLogProvider, ConsoleLogProvider } from './providers/index.js';
import { CsvResultRepository } from './repositories/CsvResultRepository.js';
import { SupabaseResultRepository } from './repositories/SupabaseResultRepository.js';
import { PlaylistFileSource } from './sources/PlaylistFileSource.js';

export function getProductionContainer(config: AppConfig): Container {
  const logProvider = config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiKey,
        dataset: config.axiom.dataset,
        defaultFields: { service: SERVICE_NAME },
        minLevel: config.logLevel,
      })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel });

  const resultRepo = config.supabase
    ? new SupabaseResultRepository(getSupabaseClient(config.supabase))
    : new CsvResultRepository(config.resultsDir);

  return createContainer({
    itemSource: new PlaylistFileSource(config.minTracksPerAlbum),
    resultRepo,
    logProvider,
  });
}
