/**
 * Integration tests for job run tracking
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestDb, closeTestDb, type TestDbContext } from '../helpers/test-db.js';
import { getRecentJobRuns, recordJobCompletion, recordJobStart } from '../../db/repository.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

describe('Job Run Tracking Integration', () => {
  let ctx: TestDbContext;

  beforeEach(() => {
    ctx = createTestDb();
  });

  afterEach(() => {
    closeTestDb(ctx);
  });

  it('records a running job', async () => {
    const id = await recordJobStart('re_discover', ctx.db);

    expect(id).toBeGreaterThan(0);
    const [run] = await getRecentJobRuns(10, ctx.db);
    expect(run).toMatchObject({ id, job: 're_discover', status: 'running', finishedAt: null, error: null });
  });

  it('records success and failure', async () => {
    const ok = await recordJobStart('re_discover', ctx.db);
    const failed = await recordJobStart('this_is:ar1', ctx.db);
    if (ok === null || failed === null) throw new Error('expected job ids');

    await recordJobCompletion(ok, 'success', undefined, ctx.db);
    await recordJobCompletion(failed, 'failed', 'Cannot connect to Navidrome', ctx.db);

    const runs = await getRecentJobRuns(10, ctx.db);
    const byId = new Map(runs.map(run => [run.id, run]));
    expect(byId.get(ok)).toMatchObject({ status: 'success', error: null });
    expect(byId.get(ok)?.finishedAt).toBeInstanceOf(Date);
    expect(byId.get(failed)).toMatchObject({ job: 'this_is:ar1', status: 'failed', error: 'Cannot connect to Navidrome' });
  });

  it('limits the number of runs returned', async () => {
    for (let i = 0; i < 3; i++) {
      await recordJobStart(`job-${i}`, ctx.db);
    }
    expect(await getRecentJobRuns(2, ctx.db)).toHaveLength(2);
  });
});
