import { index, integer, real, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * One row per generated playlist. `playlistKey` identifies the logical playlist
 * ('re_discover' or 'this_is:<artistId>') so refreshes update in place.
 */
export const playlists = sqliteTable(
  'playlists',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    playlistKey: text('playlist_key').notNull(),
    playlistType: text('playlist_type').notNull(),
    artistId: text('artist_id'),
    artistName: text('artist_name'),
    navidromePlaylistId: text('navidrome_playlist_id'),
    title: text('title').notNull(),
    reasoning: text('reasoning'),
    aiCurated: integer('ai_curated', { mode: 'boolean' }).notNull().default(false),
    trackCount: integer('track_count').notNull().default(0),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull()
  },
  table => ({
    playlistKeyIdx: uniqueIndex('playlists_key_unique').on(table.playlistKey),
    typeIdx: index('playlists_type_idx').on(table.playlistType)
  })
);

/**
 * Ordered track list; `position` is the playlist order.
 */
export const playlistTracks = sqliteTable('playlist_tracks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  playlistId: integer('playlist_id')
    .notNull()
    .references(() => playlists.id, { onDelete: 'cascade' }),
  trackId: text('track_id').notNull(),
  title: text('title'),
  artist: text('artist'),
  album: text('album'),
  position: integer('position').notNull(),
  score: real('score')
});

export const jobRuns = sqliteTable('job_runs', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  job: text('job').notNull(),
  startedAt: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
  finishedAt: integer('finished_at', { mode: 'timestamp_ms' }),
  status: text('status').notNull(),
  error: text('error')
});

export type PlaylistRecord = typeof playlists.$inferSelect;
export type PlaylistTrackRecord = typeof playlistTracks.$inferSelect;
export type JobRunRecord = typeof jobRuns.$inferSelect;
