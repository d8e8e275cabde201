import type { LibraryTrack } from '../navidrome/types.js';
import { filterTracksForThisIs, type FilterMetadata } from './engagement-filter.js';
import { CurationError, unwrapOrThrow } from './errors.js';
import type { CurationOrchestrator } from './orchestrator.js';
import type { CurationResult, CurationTrack } from './types.js';

export interface ThisIsOptions {
  includeReasoning?: boolean;
  varietyContext?: string;
  signal?: AbortSignal;
  now?: Date;
}

export interface ThisIsResult extends CurationResult {
  filter: FilterMetadata;
}

const toCurationTrack = (track: LibraryTrack): CurationTrack => ({
  id: track.id,
  title: track.title,
  artist: track.artist,
  album: track.album,
  genre: track.genre,
  year: track.year,
  playCount: track.playCount
});

/**
 * Curate a "This Is <artist>" playlist from the artist's catalogue.
 *
 * Throws `CurationError` (no-candidates) for an empty catalogue; every other
 * failure yields the algorithmic selection.
 */
export const curateThisIs = async (
  orchestrator: CurationOrchestrator,
  artistName: string,
  tracks: readonly LibraryTrack[],
  numTracks: number,
  { includeReasoning = true, varietyContext, signal, now }: ThisIsOptions = {}
): Promise<ThisIsResult> => {
  if (tracks.length === 0) {
    throw new CurationError({ kind: 'no-candidates', message: `No tracks found for ${artistName}` });
  }

  const { tracks: filtered, metadata } = filterTracksForThisIs(tracks, numTracks, undefined, now);

  const result = unwrapOrThrow(
    await orchestrator.curate({
      playlistType: 'this_is',
      tracks: filtered.map(toCurationTrack),
      targetCount: numTracks,
      includeReasoning,
      targetArtist: artistName,
      varietyContext,
      signal
    })
  );

  return { ...result, filter: metadata };
};
