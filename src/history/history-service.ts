import { subDays } from 'date-fns';
import pLimit from 'p-limit';

import { logger } from '../logger.js';
import type { LibraryProvider } from '../navidrome/types.js';
import type { PlayEvent, ScrobbleEvent, SyntheticPlayEvent } from './types.js';

export interface HistoryOptions {
  now?: Date;
  /** Artists scanned when building play-count history */
  artistLimit?: number;
  concurrency?: number;
  scrobbleLimit?: number;
}

/**
 * Fetch listening history for the last `windowDays` days.
 *
 * Uses timestamped scrobbles when the server has them; otherwise builds synthetic
 * entries from cumulative play counts of the first `artistLimit` artists.
 */
export const fetchPlayHistory = async (
  library: LibraryProvider,
  windowDays: number,
  { now = new Date(), artistLimit = 50, concurrency = 4, scrobbleLimit = 1000 }: HistoryOptions = {}
): Promise<PlayEvent[]> => {
  const since = subDays(now, windowDays);
  const scrobbles = await library.getScrobbles(since, scrobbleLimit);

  if (scrobbles && scrobbles.length > 0) {
    logger.info({ windowDays, scrobbles: scrobbles.length }, 'using scrobble history');
    return scrobbles.map((scrobble): ScrobbleEvent => ({
      kind: 'scrobble',
      trackId: scrobble.trackId,
      title: scrobble.title,
      artist: scrobble.artist,
      album: scrobble.album,
      playedAt: scrobble.playedAt
    }));
  }

  logger.info({ windowDays, artistLimit }, 'no scrobble history, building play-count history');
  return fetchPlayCountHistory(library, artistLimit, concurrency);
};

const fetchPlayCountHistory = async (
  library: LibraryProvider,
  artistLimit: number,
  concurrency: number
): Promise<SyntheticPlayEvent[]> => {
  const artists = (await library.getArtists()).slice(0, artistLimit);
  const limit = pLimit(concurrency);
  let failedArtists = 0;

  const perArtist = await Promise.all(
    artists.map(artist =>
      limit(async (): Promise<SyntheticPlayEvent[]> => {
        try {
          const tracks = await library.getTracksByArtist(artist.id);
          return tracks
            .filter(track => track.playCount > 0)
            .map((track): SyntheticPlayEvent => ({
              kind: 'synthetic',
              trackId: track.id,
              title: track.title,
              artist: artist.name,
              album: track.album,
              genre: track.genre,
              playCount: track.playCount
            }));
        } catch (error) {
          failedArtists++;
          logger.warn({ artistId: artist.id, artist: artist.name, err: error }, 'skipping artist while building play-count history');
          return [];
        }
      })
    )
  );

  const history = perArtist.flat();
  logger.info(
    { artists: artists.length, failedArtists, entries: history.length },
    'play-count history built'
  );
  return history;
};
