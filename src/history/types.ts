/**
 * Listening history shapes consumed by the history sampler
 */

interface PlayEventBase {
  trackId: string;
  title: string;
  artist: string;
  album: string;
  genre?: string;
}

/** A single timestamped play (scrobble). */
export interface ScrobbleEvent extends PlayEventBase {
  kind: 'scrobble';
  playedAt: Date;
}

/**
 * Degraded history entry built from a cumulative play count when the
 * server exposes no scrobbles. Never counted as recently played.
 */
export interface SyntheticPlayEvent extends PlayEventBase {
  kind: 'synthetic';
  playCount: number;
}

export type PlayEvent = ScrobbleEvent | SyntheticPlayEvent;

/**
 * Per-track aggregate derived from history. Immutable once built.
 */
export interface TrackStat {
  readonly trackId: string;
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly genre?: string;
  readonly totalPlays: number;
  /** Plays within the last 7 days */
  readonly recentPlays: number;
  readonly lastPlay: Date | null;
}

export type TrackStatsMap = ReadonlyMap<string, TrackStat>;
