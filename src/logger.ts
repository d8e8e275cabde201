import { pino } from 'pino';

import { APP_ENV } from './config.js';

export const logger = pino({
  name: 'magiclists',
  level: APP_ENV.LOG_LEVEL
});

export type Logger = typeof logger;
