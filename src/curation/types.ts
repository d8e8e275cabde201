/**
 * Curation pipeline types
 * Shared by the prompt builder, response interpreter and orchestrator
 */

/**
 * A track offered to the curator. `score` is a pre-computed ranking signal
 * (rediscovery score); when absent the fallback ranks by play count.
 */
export interface CurationTrack {
  id: string;
  title: string;
  artist: string;
  album: string;
  genre?: string;
  year?: number;
  playCount: number;
  score?: number;
  daysSinceLastPlay?: number | null;
}

/**
 * Minimal-field record sent to the LLM in place of a track.
 * Never carries the real identifier.
 */
export interface IndexedTrack {
  index: number;
  title: string;
  artist: string;
  album?: string;
  genre?: string;
  year?: number;
  plays: number;
  days_since_last_play?: number | string;
  score?: number;
}

/**
 * Legacy records carry the real identifier; only used by legacy recipes.
 */
export interface IdentifiedTrack extends Omit<IndexedTrack, 'index'> {
  id: string;
}

/**
 * Position == index. Rebuilt fresh for every curation request.
 */
export type IndexToIdMap = readonly string[];

export type PlaylistType = 're_discover' | 'this_is';

export interface CurationResult {
  trackIds: string[];
  reasoning: string;
  aiCurated: boolean;
}

export interface SelectionStats {
  returned: number;
  outOfRange: number;
  duplicates: number;
  unknownIds: number;
  backfilled: number;
  truncated: number;
}

export interface InterpretedSelection extends CurationResult {
  stats: SelectionStats;
}
