import { desc, eq } from 'drizzle-orm';

import type { PlaylistType } from '../curation/types.js';
import { getDb, type DatabaseClient } from './index.js';
import { jobRuns, playlistTracks, playlists, type PlaylistRecord, type PlaylistTrackRecord } from './schema.js';

export interface SavedTrackInput {
  trackId: string;
  title?: string;
  artist?: string;
  album?: string;
  score?: number;
}

export interface SavePlaylistInput {
  playlistKey: string;
  playlistType: PlaylistType;
  title: string;
  artistId?: string;
  artistName?: string;
  navidromePlaylistId?: string;
  reasoning?: string;
  aiCurated: boolean;
  generatedAt: Date;
  /** In playlist order */
  tracks: SavedTrackInput[];
}

export const playlistKeyFor = (playlistType: PlaylistType, artistId?: string): string =>
  playlistType === 'this_is' && artistId ? `this_is:${artistId}` : playlistType;

export const recordJobStart = async (job: string, db: DatabaseClient = getDb()): Promise<number | null> => {
  const [inserted] = await db
    .insert(jobRuns)
    .values({ job, startedAt: new Date(), status: 'running' })
    .returning({ id: jobRuns.id });
  return inserted?.id ?? null;
};

export const recordJobCompletion = async (
  jobId: number,
  status: 'success' | 'failed',
  error?: string,
  db: DatabaseClient = getDb()
): Promise<void> => {
  await db
    .update(jobRuns)
    .set({ finishedAt: new Date(), status, error })
    .where(eq(jobRuns.id, jobId));
};

export const getRecentJobRuns = async (limit = 10, db: DatabaseClient = getDb()) =>
  db.select().from(jobRuns).orderBy(desc(jobRuns.startedAt)).limit(limit);

export const getPlaylistByKey = async (
  playlistKey: string,
  db: DatabaseClient = getDb()
): Promise<PlaylistRecord | null> => {
  const [existing] = await db.select().from(playlists).where(eq(playlists.playlistKey, playlistKey));
  return existing ?? null;
};

export const listPlaylistsByType = async (
  playlistType: PlaylistType,
  db: DatabaseClient = getDb()
): Promise<PlaylistRecord[]> =>
  db.select().from(playlists).where(eq(playlists.playlistType, playlistType)).orderBy(playlists.id);

export const getPlaylistTracks = async (
  playlistId: number,
  db: DatabaseClient = getDb()
): Promise<PlaylistTrackRecord[]> =>
  db.select().from(playlistTracks).where(eq(playlistTracks.playlistId, playlistId)).orderBy(playlistTracks.position);

/**
 * Insert or replace a playlist and its ordered tracks in one transaction.
 */
export const savePlaylist = (input: SavePlaylistInput, db: DatabaseClient = getDb()): number =>
  db.transaction(tx => {
    const existing = tx.select().from(playlists).where(eq(playlists.playlistKey, input.playlistKey)).get();
    const values = {
      playlistType: input.playlistType,
      artistId: input.artistId ?? null,
      artistName: input.artistName ?? null,
      navidromePlaylistId: input.navidromePlaylistId ?? null,
      title: input.title,
      reasoning: input.reasoning ?? null,
      aiCurated: input.aiCurated,
      trackCount: input.tracks.length,
      updatedAt: input.generatedAt
    };

    let playlistId: number;
    if (existing) {
      tx.update(playlists).set(values).where(eq(playlists.id, existing.id)).run();
      playlistId = existing.id;
      tx.delete(playlistTracks).where(eq(playlistTracks.playlistId, playlistId)).run();
    } else {
      const inserted = tx
        .insert(playlists)
        .values({ ...values, playlistKey: input.playlistKey, createdAt: input.generatedAt })
        .returning({ id: playlists.id })
        .get();
      if (!inserted) {
        throw new Error('failed to insert playlist metadata');
      }
      playlistId = inserted.id;
    }

    if (input.tracks.length > 0) {
      tx.insert(playlistTracks).values(
        input.tracks.map((track, position) => ({
          playlistId,
          trackId: track.trackId,
          title: track.title ?? null,
          artist: track.artist ?? null,
          album: track.album ?? null,
          position,
          score: track.score ?? null
        }))
      ).run();
    }

    return playlistId;
  });

export const deletePlaylistRecord = (playlistKey: string, db: DatabaseClient = getDb()): void => {
  db.transaction(tx => {
    const existing = tx.select().from(playlists).where(eq(playlists.playlistKey, playlistKey)).get();
    if (!existing) {
      return;
    }
    tx.delete(playlistTracks).where(eq(playlistTracks.playlistId, existing.id)).run();
    tx.delete(playlists).where(eq(playlists.id, existing.id)).run();
  });
};
