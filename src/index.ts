import 'dotenv/config';
import { APP_ENV } from './config.js';
import { logger } from './logger.js';
import {
  createPlaylistRunner,
  type PlaylistRunSummary,
  type RediscoverRunOptions,
  type ThisIsRunOptions
} from './playlist-runner.js';
import { createScheduler } from './scheduler.js';
import { closeDb } from './db/index.js';

export interface App {
  start(): void;
  stop(): void;
  runRediscover(options?: RediscoverRunOptions): Promise<PlaylistRunSummary>;
  runThisIs(artistId: string, options?: ThisIsRunOptions): Promise<PlaylistRunSummary>;
  refreshAllThisIs(): Promise<void>;
}

export const createApp = (): App => {
  const runner = createPlaylistRunner();
  const scheduler = createScheduler({
    re_discover: async () => {
      await runner.runRediscoverWeekly();
    },
    this_is_refresh: () => runner.refreshAllThisIs()
  });

  return {
    start() {
      logger.info(
        { rediscover: APP_ENV.REDISCOVER_CRON || 'disabled', thisIs: APP_ENV.THIS_IS_CRON || 'disabled' },
        'loading playlist schedules'
      );
      scheduler.start({
        re_discover: APP_ENV.REDISCOVER_CRON,
        this_is_refresh: APP_ENV.THIS_IS_CRON
      });
      logger.info({ jobs: scheduler.scheduledCount }, 'scheduler started');
    },
    stop() {
      scheduler.stop();
      closeDb();
      logger.info('scheduler stopped');
    },
    runRediscover(options) {
      logger.info('manually triggering re-discover weekly');
      return runner.runRediscoverWeekly(options);
    },
    runThisIs(artistId, options) {
      logger.info({ artistId }, 'manually triggering this is playlist');
      return runner.runThisIs(artistId, options);
    },
    refreshAllThisIs() {
      return runner.refreshAllThisIs();
    }
  };
};
