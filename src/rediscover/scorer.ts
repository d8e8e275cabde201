import { differenceInDays } from 'date-fns';

import { fail, ok, type Result } from '../curation/errors.js';
import type { CurationTrack } from '../curation/types.js';
import type { TrackStat, TrackStatsMap } from '../history/types.js';

export interface ScoredCandidate {
  readonly trackId: string;
  readonly rediscoveryScore: number;
  readonly daysSinceLastPlay: number;
  readonly stat: TrackStat;
}

export interface ScoringOptions {
  now?: Date;
  /** Tracks played more recently than this are excluded */
  minGapDays?: number;
  /** Tracks not played within this many days are excluded */
  maxGapDays?: number;
  /** Days assumed for tracks without a recorded last play */
  defaultDaysSincePlay?: number;
  /** Recency factor is capped at this many days */
  scoreCapDays?: number;
}

export const DEFAULT_SCORING: Required<Omit<ScoringOptions, 'now'>> = {
  minGapDays: 7,
  maxGapDays: 120,
  defaultDaysSincePlay: 90,
  scoreCapDays: 90
};

/** Candidate pool is oversampled so diversity filtering and AI selection have real choice */
export const POOL_OVERSAMPLE = 2.5;

/**
 * Rediscovery score: historical plays × days forgotten, with the day factor capped.
 */
export const rediscoveryScore = (
  totalPlays: number,
  daysSinceLastPlay: number,
  scoreCapDays: number = DEFAULT_SCORING.scoreCapDays
): number => totalPlays * Math.min(daysSinceLastPlay, scoreCapDays);

/**
 * Score every eligible track and sort by score, highest first.
 *
 * Eligible: at least one play, no plays in the recent window, and last played
 * between `minGapDays` and `maxGapDays` ago (inclusive).
 */
export const scoreCandidates = (stats: TrackStatsMap, options: ScoringOptions = {}): ScoredCandidate[] => {
  const { now = new Date() } = options;
  const { minGapDays, maxGapDays, defaultDaysSincePlay, scoreCapDays } = { ...DEFAULT_SCORING, ...options };
  const candidates: ScoredCandidate[] = [];

  for (const stat of stats.values()) {
    if (stat.totalPlays < 1 || stat.recentPlays > 0) {
      continue;
    }

    const daysSinceLastPlay = stat.lastPlay ? differenceInDays(now, stat.lastPlay) : defaultDaysSincePlay;
    if (daysSinceLastPlay < minGapDays || daysSinceLastPlay > maxGapDays) {
      continue;
    }

    candidates.push({
      trackId: stat.trackId,
      rediscoveryScore: rediscoveryScore(stat.totalPlays, daysSinceLastPlay, scoreCapDays),
      daysSinceLastPlay,
      stat
    });
  }

  // Array.prototype.sort is stable: equal scores keep history order
  candidates.sort((a, b) => b.rediscoveryScore - a.rediscoveryScore);
  return candidates;
};

/**
 * Roughly 12.5% of the target length, never below 2.
 */
export const maxPerArtistFor = (maxTracks: number): number => Math.max(2, Math.floor(maxTracks / 8));

/**
 * Greedy per-artist cap over a score-ordered list. Dropped slots are not backfilled.
 */
export const filterArtistDiversity = <T extends { stat: { artist: string } }>(
  candidates: readonly T[],
  maxPerArtist: number
): T[] => {
  const artistCounts = new Map<string, number>();
  const kept: T[] = [];

  for (const candidate of candidates) {
    const artist = candidate.stat.artist;
    const count = artistCounts.get(artist) ?? 0;
    if (count >= maxPerArtist) {
      continue;
    }
    kept.push(candidate);
    artistCounts.set(artist, count + 1);
  }

  return kept;
};

export interface CandidatePool {
  candidates: ScoredCandidate[];
  scoredCount: number;
  poolSize: number;
  maxPerArtist: number;
}

/**
 * Score, keep the top `maxTracks × 2.5`, then apply the artist cap.
 */
export const buildCandidatePool = (
  stats: TrackStatsMap,
  maxTracks: number,
  options: ScoringOptions & { maxPerArtist?: number } = {}
): Result<CandidatePool> => {
  const scored = scoreCandidates(stats, options);
  const poolSize = Math.min(Math.floor(maxTracks * POOL_OVERSAMPLE), scored.length);
  const maxPerArtist = options.maxPerArtist ?? maxPerArtistFor(maxTracks);
  const candidates = filterArtistDiversity(scored.slice(0, poolSize), maxPerArtist);

  if (candidates.length === 0) {
    return fail({
      kind: 'no-candidates',
      message: 'No tracks found for re-discovery. Try listening to more music first.'
    });
  }

  return ok({ candidates, scoredCount: scored.length, poolSize, maxPerArtist });
};

export const toCurationTrack = (candidate: ScoredCandidate): CurationTrack => ({
  id: candidate.trackId,
  title: candidate.stat.title,
  artist: candidate.stat.artist,
  album: candidate.stat.album,
  genre: candidate.stat.genre,
  playCount: candidate.stat.totalPlays,
  score: candidate.rediscoveryScore,
  daysSinceLastPlay: candidate.daysSinceLastPlay
});
