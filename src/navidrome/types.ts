/**
 * Media-server capability surface used by the curation core.
 * `NavidromeClient` implements it over the Subsonic API; tests use in-process fakes.
 */

export interface Artist {
  id: string;
  name: string;
  albumCount?: number;
}

export interface LibraryTrack {
  id: string;
  title: string;
  artist: string;
  album: string;
  genre?: string;
  year?: number;
  playCount: number;
  lastPlayed?: Date | null;
  /** Starred in Navidrome */
  loved?: boolean;
  /** User rating, 0-5 */
  rating?: number;
  playlistAppearances?: number;
}

export interface Scrobble {
  trackId: string;
  title: string;
  artist: string;
  album: string;
  playedAt: Date;
}

export interface LibraryProvider {
  getArtists(): Promise<Artist[]>;
  getTracksByArtist(artistId: string): Promise<LibraryTrack[]>;
  getTracksByGenre(genre: string, count?: number): Promise<LibraryTrack[]>;
  /**
   * Timestamped plays since `since`, or null when the server exposes no scrobble history.
   */
  getScrobbles(since: Date, count?: number): Promise<Scrobble[] | null>;
}

export interface PlaylistWriter {
  createPlaylist(name: string, trackIds: readonly string[], comment?: string): Promise<string>;
  updatePlaylist(playlistId: string, trackIds: readonly string[], comment?: string): Promise<void>;
  deletePlaylist(playlistId: string): Promise<void>;
}

// Subsonic wire shapes (subset)

export interface SubsonicError {
  code: number;
  message: string;
}

export interface SubsonicEnvelope<T> {
  'subsonic-response': T & {
    status: 'ok' | 'failed';
    version?: string;
    error?: SubsonicError;
  };
}

export interface SubsonicSong {
  id: string;
  title?: string;
  artist?: string;
  album?: string;
  genre?: string;
  year?: number;
  playCount?: number;
  played?: string;
  starred?: string;
  userRating?: number;
}

export interface SubsonicArtistsBody {
  artists?: {
    index?: Array<{ name: string; artist?: Array<{ id: string; name: string; albumCount?: number }> }>;
  };
}

export interface SubsonicArtistBody {
  artist?: {
    id: string;
    name: string;
    album?: Array<{ id: string; name?: string; year?: number; genre?: string }>;
  };
}

export interface SubsonicAlbumBody {
  album?: {
    id: string;
    name?: string;
    year?: number;
    genre?: string;
    song?: SubsonicSong[];
  };
}

export interface SubsonicSongsByGenreBody {
  songsByGenre?: { song?: SubsonicSong[] };
}

export interface SubsonicScrobblesBody {
  scrobbles?: {
    scrobble?: Array<{ id: string; title?: string; artist?: string; album?: string; time?: string | number }>;
  };
}

export interface SubsonicPlaylistBody {
  playlist?: { id: string; name?: string; entry?: SubsonicSong[] };
}

export interface NavidromeLoginResponse {
  token?: string;
  subsonicToken?: string;
  subsonicSalt?: string;
  name?: string;
  username?: string;
}
