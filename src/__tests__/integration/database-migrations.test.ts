/**
 * Integration tests for the SQL migrations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDb, closeTestDb, type TestDbContext } from '../helpers/test-db.js';

describe('Database Migrations', () => {
  let ctx: TestDbContext;

  beforeEach(() => {
    ctx = createTestDb();
  });

  afterEach(() => {
    closeTestDb(ctx);
  });

  it('creates every table', () => {
    const rows: Array<{ name: string }> = ctx.sqlite
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE '\\_\\_%' ESCAPE '\\' AND name != 'sqlite_sequence' ORDER BY name")
      .all()
      .flatMap(row => (typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string' ? [{ name: row.name }] : []));

    expect(rows.map(row => row.name)).toEqual(['job_runs', 'playlist_tracks', 'playlists']);
  });

  it('enforces one row per playlist key', () => {
    const insert = ctx.sqlite.prepare(
      "INSERT INTO playlists (playlist_key, playlist_type, title, created_at, updated_at) VALUES ('re_discover', 're_discover', 'Mix', 0, 0)"
    );
    insert.run();
    expect(() => insert.run()).toThrow(/UNIQUE constraint failed/);
  });

  it('removes tracks with their playlist', () => {
    ctx.sqlite
      .prepare("INSERT INTO playlists (id, playlist_key, playlist_type, title, created_at, updated_at) VALUES (1, 'k', 're_discover', 'Mix', 0, 0)")
      .run();
    ctx.sqlite.prepare("INSERT INTO playlist_tracks (playlist_id, track_id, position) VALUES (1, 't1', 0)").run();

    ctx.sqlite.prepare('DELETE FROM playlists WHERE id = 1').run();

    expect(ctx.sqlite.prepare('SELECT COUNT(*) AS count FROM playlist_tracks').get()).toEqual({ count: 0 });
  });
});
