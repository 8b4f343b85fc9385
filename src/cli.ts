#!/usr/bin/env node
/**
 * album-tiers entry point.
 * Loads .env, builds the production container and dispatches the command.
 */

import { config as loadDotenv } from 'dotenv';
import { loadConfig, type AppConfig } from './config.js';
import { getProductionContainer } from './container.production.js';
import type { Container } from './container.js';
import { TerminalOracle } from './oracle/TerminalOracle.js';
import { parseArgs, USAGE } from './cli/args.js';
import { runList, runRank, runRescore, type CommandContext } from './cli/commands.js';
import { formatCliError, toCliError } from './cli/error-handler.js';

export async function main(argv: readonly string[]): Promise<number> {
  let container: Container | null = null;

  try {
    const args = parseArgs(argv);
    if (args.command === 'help') {
      console.log(USAGE);
      return 0;
    }

    const loaded = loadConfig();
    const config: AppConfig = {
      ...loaded,
      minTracksPerAlbum: args.minTracks ?? loaded.minTracksPerAlbum,
    };
    container = getProductionContainer(config);

    const ctx: CommandContext = {
      container,
      config,
      write: (line) => console.log(line),
      createOracle: (estimatedTotal) => new TerminalOracle({ estimatedTotal }),
    };

    switch (args.command) {
      case 'rank':
        await runRank(ctx, args);
        break;
      case 'rescore':
        await runRescore(ctx, args);
        break;
      case 'list':
        await runList(ctx);
        break;
    }
    return 0;
  } catch (err) {
    const error = toCliError(err);
    container?.logProvider.error('Command failed', {
      code: error.code,
      error: err instanceof Error ? err.message : String(err),
    });
    console.error(formatCliError(error));
    return error.exitCode;
  } finally {
    await container?.logProvider.flush();
  }
}

loadDotenv();
main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
