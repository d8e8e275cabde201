import { differenceInDays } from 'date-fns';

import { logger } from '../logger.js';
import type { LibraryTrack } from '../navidrome/types.js';

export interface LibraryStats {
  /** Highest play count in the catalogue being scored */
  maxPlayCount: number;
}

export interface FilterMetadata {
  filtered: boolean;
  sourceCount: number;
  sentCount: number;
  thresholdMultiplier: number;
  scoreRange?: { highest: number; lowest: number; cutoff: number };
}

const LOVED_BONUS = 50;
const RATING_WEIGHT = 10;
const PLAYLIST_WEIGHT = 5;
const PLAYLIST_CAP = 50;
const RECENCY_WINDOW_DAYS = 30;

/**
 * Engagement score from the listener's own signals:
 * plays normalised to 0-100, loved +50, rating x10, playlist appearances x5 (max 50),
 * and up to 30 points for plays within the last 30 days.
 */
export const engagementScore = (track: LibraryTrack, stats: LibraryStats, now: Date = new Date()): number => {
  let score = 0;

  if (stats.maxPlayCount > 0) {
    score += (track.playCount / stats.maxPlayCount) * 100;
  }
  if (track.loved) {
    score += LOVED_BONUS;
  }
  if (track.rating && track.rating > 0) {
    score += track.rating * RATING_WEIGHT;
  }
  score += Math.min((track.playlistAppearances ?? 0) * PLAYLIST_WEIGHT, PLAYLIST_CAP);

  if (track.lastPlayed) {
    const daysSince = differenceInDays(now, track.lastPlayed);
    if (daysSince <= RECENCY_WINDOW_DAYS) {
      score += Math.max(0, RECENCY_WINDOW_DAYS - daysSince);
    }
  }

  return score;
};

export const libraryStatsFor = (tracks: readonly LibraryTrack[]): LibraryStats => ({
  maxPlayCount: tracks.reduce((max, track) => Math.max(max, track.playCount), 0)
});

/**
 * Multiplier of the target size kept for the model. Larger playlists need less headroom.
 */
export const calculateFilterThreshold = (targetPlaylistSize: number): number => {
  if (targetPlaylistSize <= 25) return 10;
  if (targetPlaylistSize <= 50) return 8;
  if (targetPlaylistSize <= 100) return 6;
  return 5;
};

/**
 * Trim a large artist catalogue to the best-engaged `target x multiplier` tracks.
 * Catalogues at or under that threshold, or an empty target, pass through unchanged.
 */
export const filterTracksForThisIs = (
  sourceTracks: readonly LibraryTrack[],
  targetPlaylistSize: number,
  stats: LibraryStats = libraryStatsFor(sourceTracks),
  now: Date = new Date()
): { tracks: LibraryTrack[]; metadata: FilterMetadata } => {
  const thresholdMultiplier = calculateFilterThreshold(targetPlaylistSize);
  const thresholdCount = targetPlaylistSize * thresholdMultiplier;

  if (targetPlaylistSize < 1 || sourceTracks.length <= thresholdCount) {
    return {
      tracks: [...sourceTracks],
      metadata: { filtered: false, sourceCount: sourceTracks.length, sentCount: sourceTracks.length, thresholdMultiplier }
    };
  }

  const scored = sourceTracks
    .map(track => ({ track, score: engagementScore(track, stats, now) }))
    .sort((a, b) => b.score - a.score);
  const kept = scored.slice(0, thresholdCount);

  const metadata: FilterMetadata = {
    filtered: true,
    sourceCount: sourceTracks.length,
    sentCount: kept.length,
    thresholdMultiplier,
    scoreRange: {
      highest: scored[0].score,
      lowest: kept[kept.length - 1].score,
      cutoff: scored[thresholdCount].score
    }
  };

  logger.info(
    { ...metadata, reductionPct: Math.round(((sourceTracks.length - kept.length) / sourceTracks.length) * 1000) / 10 },
    'filtered artist catalogue by engagement'
  );

  return { tracks: kept.map(entry => entry.track), metadata };
};
