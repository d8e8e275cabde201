import type { FailureReason } from './errors.js';
import type { CurationResult, CurationTrack } from './types.js';

/**
 * Deterministic non-AI selection: highest pre-computed score first when tracks
 * carry one, else play count, then release year. Ties keep input order.
 */
export const selectFallbackTracks = (tracks: readonly CurationTrack[], count: number): CurationTrack[] => {
  const byScore = tracks.some(track => track.score !== undefined);
  const primary = (track: CurationTrack): number => (byScore ? track.score ?? 0 : track.playCount);

  return [...tracks]
    .sort((a, b) =>
      primary(b) - primary(a) ||
      b.playCount - a.playCount ||
      (b.year ?? 0) - (a.year ?? 0)
    )
    .slice(0, Math.max(0, count));
};

export const fallbackReasoning = (reason: FailureReason): string =>
  `Algorithmic selection used (${reason.message})`;

export const fallbackResult = (
  tracks: readonly CurationTrack[],
  count: number,
  reason: FailureReason
): CurationResult => ({
  trackIds: selectFallbackTracks(tracks, count).map(track => track.id),
  reasoning: fallbackReasoning(reason),
  aiCurated: false
});
