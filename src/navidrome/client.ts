import got, { HTTPError } from 'got';

import { logger } from '../logger.js';
import type {
  Artist,
  LibraryProvider,
  LibraryTrack,
  NavidromeLoginResponse,
  PlaylistWriter,
  Scrobble,
  SubsonicAlbumBody,
  SubsonicArtistBody,
  SubsonicArtistsBody,
  SubsonicEnvelope,
  SubsonicPlaylistBody,
  SubsonicScrobblesBody,
  SubsonicSong,
  SubsonicSongsByGenreBody
} from './types.js';

const SUBSONIC_API_VERSION = '1.16.1';
const SUBSONIC_CLIENT_NAME = 'MagicLists';

export interface NavidromeClientOptions {
  baseUrl: string;
  username: string;
  password: string;
  libraryId?: string;
  timeoutMs?: number;
}

export class SubsonicError extends Error {
  readonly code?: number;

  constructor(message: string, code?: number) {
    super(message);
    this.name = 'SubsonicError';
    this.code = code;
  }
}

type ParamValue = string | number | readonly (string | number)[];

/**
 * Parse a scrobble timestamp: ISO-8601 string or epoch milliseconds.
 */
export const parseScrobbleTime = (value: string | number | undefined): Date | null => {
  if (value === undefined || value === '') {
    return null;
  }
  const date = typeof value === 'string' && value.includes('T')
    ? new Date(value)
    : new Date(Number(value));
  return Number.isNaN(date.getTime()) ? null : date;
};

const toLibraryTrack = (song: SubsonicSong, fallback: { artist?: string; album?: string; year?: number; genre?: string } = {}): LibraryTrack => ({
  id: song.id,
  title: song.title ?? 'Unknown Title',
  artist: song.artist ?? fallback.artist ?? 'Unknown Artist',
  album: song.album ?? fallback.album ?? '',
  genre: song.genre ?? fallback.genre,
  year: song.year ?? fallback.year,
  playCount: song.playCount ?? 0,
  lastPlayed: song.played ? parseScrobbleTime(song.played) : null,
  loved: Boolean(song.starred),
  rating: song.userRating ?? 0
});

/**
 * Subsonic API client for Navidrome.
 * Authenticates once through /auth/login and reuses the Subsonic token/salt pair.
 */
export class NavidromeClient implements LibraryProvider, PlaylistWriter {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private credentials: { token: string; salt: string } | null = null;

  constructor(private readonly options: NavidromeClientOptions) {
    if (!options.baseUrl) {
      throw new SubsonicError('NAVIDROME_URL is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  private async ensureAuthenticated(): Promise<{ token: string; salt: string }> {
    if (this.credentials) {
      return this.credentials;
    }

    const { username, password } = this.options;
    if (!username || !password) {
      throw new SubsonicError('No authentication method available (need NAVIDROME_USERNAME/NAVIDROME_PASSWORD)');
    }

    let login: NavidromeLoginResponse;
    try {
      login = await got.post(`${this.baseUrl}/auth/login`, {
        json: { username, password },
        timeout: { request: this.timeoutMs },
        retry: { limit: 0 }
      }).json<NavidromeLoginResponse>();
    } catch (error) {
      if (error instanceof HTTPError) {
        const status = error.response.statusCode;
        if (status === 401) {
          throw new SubsonicError('Invalid username or password');
        }
        if (status === 403) {
          throw new SubsonicError('Access forbidden - check your credentials');
        }
        throw new SubsonicError(`Login failed with status ${status}`);
      }
      throw error;
    }

    if (!login.subsonicToken || !login.subsonicSalt) {
      throw new SubsonicError('No Subsonic credentials received from login response');
    }

    this.credentials = { token: login.subsonicToken, salt: login.subsonicSalt };
    logger.debug({ baseUrl: this.baseUrl, username }, 'authenticated with navidrome');
    return this.credentials;
  }

  private async call<T>(endpoint: string, params: Record<string, ParamValue | undefined> = {}): Promise<T> {
    const { token, salt } = await this.ensureAuthenticated();

    const searchParams = new URLSearchParams({
      u: this.options.username,
      t: token,
      s: salt,
      v: SUBSONIC_API_VERSION,
      c: SUBSONIC_CLIENT_NAME,
      f: 'json'
    });
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        // Repeated parameters keep their order (playlist order depends on it)
        for (const item of value) {
          searchParams.append(key, String(item));
        }
      } else {
        searchParams.set(key, String(value));
      }
    }

    const body = await got.get(`${this.baseUrl}/rest/${endpoint}.view`, {
      searchParams,
      timeout: { request: this.timeoutMs },
      retry: { limit: 2, methods: ['GET'] }
    }).json<SubsonicEnvelope<T>>();

    const response = body['subsonic-response'];
    if (response.status !== 'ok') {
      throw new SubsonicError(
        `Subsonic API error: ${response.error?.message ?? 'Unknown error'}`,
        response.error?.code
      );
    }
    return response;
  }

  async getArtists(): Promise<Artist[]> {
    const libraryId = this.options.libraryId || undefined;
    let response: SubsonicArtistsBody;
    try {
      response = await this.call<SubsonicArtistsBody>('getArtists', { musicFolderId: libraryId });
    } catch (error) {
      // Servers with several libraries reject an unknown folder id; retry across all libraries
      if (libraryId && error instanceof SubsonicError && /library not found|empty/i.test(error.message)) {
        logger.warn({ libraryId }, 'library not found, retrying getArtists without library filter');
        response = await this.call<SubsonicArtistsBody>('getArtists');
      } else {
        throw error;
      }
    }

    const artists: Artist[] = [];
    for (const group of response.artists?.index ?? []) {
      for (const artist of group.artist ?? []) {
        artists.push({ id: artist.id, name: artist.name, albumCount: artist.albumCount });
      }
    }

    logger.debug({ artists: artists.length }, 'fetched artists from navidrome');
    return artists;
  }

  async getTracksByArtist(artistId: string): Promise<LibraryTrack[]> {
    const { artist } = await this.call<SubsonicArtistBody>('getArtist', { id: artistId });
    if (!artist) {
      return [];
    }

    const tracks: LibraryTrack[] = [];
    for (const album of artist.album ?? []) {
      const { album: details } = await this.call<SubsonicAlbumBody>('getAlbum', { id: album.id });
      for (const song of details?.song ?? []) {
        tracks.push(toLibraryTrack(song, {
          artist: artist.name,
          album: album.name,
          year: album.year,
          genre: album.genre
        }));
      }
    }

    logger.debug({ artistId, artist: artist.name, tracks: tracks.length }, 'fetched artist tracks');
    return tracks;
  }

  async getTracksByGenre(genre: string, count = 500): Promise<LibraryTrack[]> {
    const { songsByGenre } = await this.call<SubsonicSongsByGenreBody>('getSongsByGenre', {
      genre,
      count,
      musicFolderId: this.options.libraryId || undefined
    });
    return (songsByGenre?.song ?? []).map(song => toLibraryTrack(song, { genre }));
  }

  async getScrobbles(since: Date, count = 1000): Promise<Scrobble[] | null> {
    let response: SubsonicScrobblesBody;
    try {
      response = await this.call<SubsonicScrobblesBody>('getScrobbles', { count });
    } catch (error) {
      if (error instanceof HTTPError || error instanceof SubsonicError) {
        logger.debug({ err: error }, 'scrobble history not available on this server');
        return null;
      }
      throw error;
    }

    const entries = response.scrobbles?.scrobble;
    if (!entries || entries.length === 0) {
      return null;
    }

    const now = new Date();
    const scrobbles: Scrobble[] = [];
    for (const entry of entries) {
      const playedAt = parseScrobbleTime(entry.time);
      if (!playedAt || playedAt < since || playedAt > now) {
        continue;
      }
      scrobbles.push({
        trackId: entry.id,
        title: entry.title ?? 'Unknown Title',
        artist: entry.artist ?? 'Unknown Artist',
        album: entry.album ?? '',
        playedAt
      });
    }
    return scrobbles;
  }

  async createPlaylist(name: string, trackIds: readonly string[], comment?: string): Promise<string> {
    const { playlist } = await this.call<SubsonicPlaylistBody>('createPlaylist', { name });
    if (!playlist?.id) {
      throw new SubsonicError('Failed to get playlist ID from response');
    }

    // createPlaylist takes no comment; songs and comment go through a single updatePlaylist
    if (trackIds.length > 0 || comment) {
      await this.call('updatePlaylist', {
        playlistId: playlist.id,
        songIdToAdd: trackIds.length > 0 ? trackIds : undefined,
        comment
      });
    }

    logger.info({ playlistId: playlist.id, name, tracks: trackIds.length }, 'created navidrome playlist');
    return playlist.id;
  }

  async updatePlaylist(playlistId: string, trackIds: readonly string[], comment?: string): Promise<void> {
    const { playlist } = await this.call<SubsonicPlaylistBody>('getPlaylist', { id: playlistId });
    const currentCount = playlist?.entry?.length ?? 0;

    if (currentCount > 0 || comment) {
      await this.call('updatePlaylist', {
        playlistId,
        songIndexToRemove: currentCount > 0 ? Array.from({ length: currentCount }, (_, i) => i) : undefined,
        comment
      });
    }

    if (trackIds.length > 0) {
      await this.call('updatePlaylist', { playlistId, songIdToAdd: trackIds });
    }

    logger.info({ playlistId, removed: currentCount, added: trackIds.length }, 'replaced navidrome playlist contents');
  }

  async deletePlaylist(playlistId: string): Promise<void> {
    await this.call('deletePlaylist', { id: playlistId });
    logger.info({ playlistId }, 'deleted navidrome playlist');
  }
}
