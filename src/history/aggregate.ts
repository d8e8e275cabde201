import { subDays } from 'date-fns';

import { fail, ok, type Result } from '../curation/errors.js';
import type { PlayEvent, TrackStat, TrackStatsMap } from './types.js';

export const RECENT_PLAY_DAYS = 7;

export interface BuildStatsOptions {
  now?: Date;
  /** Fail with insufficient-history instead of returning an empty map */
  requireNonEmpty?: boolean;
}

interface MutableStat {
  trackId: string;
  title: string;
  artist: string;
  album: string;
  genre?: string;
  totalPlays: number;
  recentPlays: number;
  lastPlay: Date | null;
}

/**
 * Aggregate raw play events into per-track statistics.
 *
 * Scrobbles increment `totalPlays` per event; synthetic entries set it directly
 * and never count towards `recentPlays`.
 */
export const buildStats = (
  history: readonly PlayEvent[],
  { now = new Date(), requireNonEmpty = false }: BuildStatsOptions = {}
): Result<TrackStatsMap> => {
  const recentThreshold = subDays(now, RECENT_PLAY_DAYS);
  const map = new Map<string, MutableStat>();

  for (const event of history) {
    let stat = map.get(event.trackId);
    if (!stat) {
      stat = {
        trackId: event.trackId,
        title: event.title,
        artist: event.artist,
        album: event.album,
        genre: event.genre,
        totalPlays: 0,
        recentPlays: 0,
        lastPlay: null
      };
      map.set(event.trackId, stat);
    }

    // Latest entry wins for display metadata
    stat.title = event.title;
    stat.artist = event.artist;
    stat.album = event.album;
    stat.genre = event.genre ?? stat.genre;

    if (event.kind === 'synthetic') {
      stat.totalPlays = event.playCount;
      stat.recentPlays = 0;
      continue;
    }

    stat.totalPlays += 1;
    if (!stat.lastPlay || stat.lastPlay < event.playedAt) {
      stat.lastPlay = event.playedAt;
    }
    if (event.playedAt >= recentThreshold) {
      stat.recentPlays += 1;
    }
  }

  if (requireNonEmpty && map.size === 0) {
    return fail({
      kind: 'insufficient-history',
      message: 'No listening history found. Listen to more music to enable Re-Discover Weekly.'
    });
  }

  const stats = new Map<string, TrackStat>();
  for (const [trackId, stat] of map) {
    stats.set(trackId, Object.freeze({ ...stat }));
  }
  return ok(stats);
};
