import { describe, it, expect, beforeEach, vi } from 'vitest';

const { validate, schedule, stopTask } = vi.hoisted(() => {
  const stopTask = vi.fn();
  return {
    validate: vi.fn((expression: string) => expression.split(' ').length === 5),
    schedule: vi.fn((_expression: string, _task: () => void) => ({ stop: stopTask })),
    stopTask
  };
});

vi.mock('node-cron', () => ({
  default: { validate, schedule }
}));

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

import { Scheduler } from '../scheduler.js';
import { logger } from '../logger.js';

describe('Scheduler', () => {
  const jobs = {
    re_discover: vi.fn(async () => undefined),
    this_is_refresh: vi.fn(async () => undefined)
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('schedules every job with an expression', () => {
    const scheduler = new Scheduler(jobs);

    scheduler.start({ re_discover: '0 6 * * 1', this_is_refresh: '0 3 * * *' });

    expect(scheduler.scheduledCount).toBe(2);
    expect(schedule.mock.calls.map(call => call[0])).toEqual(['0 6 * * 1', '0 3 * * *']);
  });

  it('skips disabled jobs', () => {
    const scheduler = new Scheduler(jobs);

    scheduler.start({ re_discover: '', this_is_refresh: '0 3 * * *' });

    expect(scheduler.scheduledCount).toBe(1);
  });

  it('rejects an invalid expression', () => {
    const scheduler = new Scheduler(jobs);

    expect(() => scheduler.start({ re_discover: 'every monday' })).toThrow(
      'Invalid cron expression for re_discover: every monday'
    );
  });

  it('runs the job when the task fires and logs failures', async () => {
    jobs.this_is_refresh.mockRejectedValueOnce(new Error('Navidrome down'));
    const scheduler = new Scheduler(jobs);
    scheduler.start({ this_is_refresh: '0 3 * * *' });

    const [, tick] = schedule.mock.calls[0];
    tick();
    await vi.waitFor(() => expect(logger.error).toHaveBeenCalled());

    expect(jobs.this_is_refresh).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { job: 'this_is_refresh', err: new Error('Navidrome down') },
      'scheduled job failed'
    );
  });

  it('stops scheduled tasks before rescheduling', () => {
    const scheduler = new Scheduler(jobs);
    scheduler.start({ re_discover: '0 6 * * 1' });

    scheduler.start({ re_discover: '0 7 * * 1' });
    expect(stopTask).toHaveBeenCalledTimes(1);
    expect(scheduler.scheduledCount).toBe(1);

    scheduler.stop();
    expect(stopTask).toHaveBeenCalledTimes(2);
    expect(scheduler.scheduledCount).toBe(0);
  });
});
