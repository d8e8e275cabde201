#!/usr/bin/env node
/**
 * MagicLists CLI: scheduler daemon plus one-off playlist runs
 */

import 'dotenv/config';
import { APP_ENV } from './config.js';
import { CliUsageError, parseCommandLine, type CliCommand } from './cli-args.js';
import { closeDb } from './db/index.js';
import { formatDiagnostic, runDiagnostic } from './diagnostic.js';
import { createApp } from './index.js';
import { logger } from './logger.js';
import { llmSettingsFromEnv, navidromeClientFromEnv } from './playlist-runner.js';
import { RecipeManager } from './recipes/recipe-manager.js';
import { formatUserError } from './utils/error-formatter.js';

const usage = `MagicLists - AI-assisted playlists for Navidrome

Usage:
  magiclists [start]                          Run the scheduler (default)
  magiclists rediscover [options]             Generate Re-Discover Weekly now
      --tracks, -n N                          Number of tracks (default: ${APP_ENV.REDISCOVER_MAX_TRACKS})
      --no-ai                                 Use algorithmic selection only
      --context TEXT                          Extra variety guidance for the AI
  magiclists this-is <artistId> [options]     Generate "This Is <artist>" now
      --tracks, -n N                          Number of tracks (default: ${APP_ENV.THIS_IS_MAX_TRACKS})
      --context TEXT                          Extra variety guidance for the AI
  magiclists recipes                          List and validate recipe files
  magiclists health                           Check Navidrome, AI and recipe configuration
  magiclists --help                           Show this help

Configuration is read from the environment (see .env.example).`;

const listRecipes = (): boolean => {
  const manager = new RecipeManager(APP_ENV.RECIPES_DIR);
  let valid = true;
  for (const [playlistType, summary] of Object.entries(manager.listAvailableRecipes())) {
    const problems = summary.error ? [summary.error] : manager.validateRecipe(summary.filename);
    valid = valid && problems.length === 0;
    console.log(`${playlistType}: ${summary.filename} (${summary.format ?? 'unreadable'}, v${summary.version ?? '?'})`);
    if (summary.description) {
      console.log(`  ${summary.description}`);
    }
    for (const problem of problems) {
      console.log(`  ❌ ${problem}`);
    }
  }
  return valid;
};

async function execute(parsed: CliCommand): Promise<void> {
  switch (parsed.command) {
    case 'help':
      console.log(usage);
      return;

    case 'recipes':
      if (!listRecipes()) {
        process.exitCode = 1;
      }
      return;

    case 'health': {
      const checks = await runDiagnostic({
        library: navidromeClientFromEnv(),
        recipes: new RecipeManager(APP_ENV.RECIPES_DIR),
        llm: llmSettingsFromEnv()
      });
      console.log(formatDiagnostic(checks));
      if (checks.some(check => check.status === 'fail')) {
        process.exitCode = 1;
      }
      return;
    }

    case 'rediscover': {
      const app = createApp();
      try {
        const summary = await app.runRediscover(parsed);
        console.log(`✓ ${summary.title}: ${summary.trackIds.length} tracks (${summary.aiCurated ? 'AI curated' : 'algorithmic'})`);
        console.log(`  ${summary.reasoning}`);
      } catch (error) {
        console.error(formatUserError(error, 'generating Re-Discover Weekly'));
        process.exitCode = 1;
      } finally {
        closeDb();
      }
      return;
    }

    case 'this-is': {
      const app = createApp();
      try {
        const summary = await app.runThisIs(parsed.artistId, parsed);
        console.log(`✓ ${summary.title}: ${summary.trackIds.length} tracks (${summary.aiCurated ? 'AI curated' : 'algorithmic'})`);
        console.log(`  ${summary.reasoning}`);
      } catch (error) {
        console.error(formatUserError(error, `generating This Is playlist for artist ${parsed.artistId}`));
        process.exitCode = 1;
      } finally {
        closeDb();
      }
      return;
    }

    case 'start': {
      const app = createApp();
      const shutdown = (signal: string) => {
        logger.info({ signal }, 'received shutdown signal');
        app.stop();
        process.exit(0);
      };

      process.on('SIGTERM', () => shutdown('SIGTERM'));
      process.on('SIGINT', () => shutdown('SIGINT'));

      app.start();
      logger.info('press Ctrl+C to exit');
      // keep process alive
      process.stdin.resume();
      return;
    }
  }
}

async function main(): Promise<void> {
  let parsed: CliCommand;
  try {
    parsed = parseCommandLine(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.log('\n' + usage);
      process.exit(1);
    }
    throw error;
  }

  await execute(parsed);
}

main().catch(error => {
  logger.error({ err: error }, 'CLI execution failed');
  process.exit(1);
});
