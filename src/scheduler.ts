import cron from 'node-cron';
import { logger } from './logger.js';

export const JOB_NAMES = ['re_discover', 'this_is_refresh'] as const;
export type JobName = (typeof JOB_NAMES)[number];
export type JobRunner = () => Promise<void>;

export class Scheduler {
  private tasks: cron.ScheduledTask[] = [];

  constructor(private readonly jobs: Record<JobName, JobRunner>) {}

  start(cronExpressions: Partial<Record<JobName, string>>): void {
    this.stop();

    for (const job of JOB_NAMES) {
      const expression = cronExpressions[job];
      if (!expression) {
        continue;
      }
      if (!cron.validate(expression)) {
        throw new Error(`Invalid cron expression for ${job}: ${expression}`);
      }

      const run = this.jobs[job];
      // Timezone follows the process (container TZ)
      const task = cron.schedule(expression, () => {
        logger.info({ job }, 'starting scheduled job');
        run()
          .then(() => logger.info({ job }, 'scheduled job complete'))
          .catch(error => logger.error({ job, err: error }, 'scheduled job failed'));
      });
      this.tasks.push(task);
      logger.info({ job, cron: expression }, 'job scheduled');
    }
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }

  get scheduledCount(): number {
    return this.tasks.length;
  }
}

export const createScheduler = (jobs: Record<JobName, JobRunner>) => new Scheduler(jobs);
