import { format } from 'date-fns';

import { createLlmProvider, type LlmSettings } from './ai/provider.js';
import { APP_ENV } from './config.js';
import { CurationOrchestrator } from './curation/orchestrator.js';
import { curateThisIs } from './curation/this-is.js';
import type { PlaylistType } from './curation/types.js';
import { getDb, type DatabaseClient } from './db/index.js';
import {
  getPlaylistByKey,
  listPlaylistsByType,
  playlistKeyFor,
  recordJobCompletion,
  recordJobStart,
  savePlaylist,
  type SavedTrackInput
} from './db/repository.js';
import { logger } from './logger.js';
import { NavidromeClient } from './navidrome/client.js';
import type { LibraryProvider, PlaylistWriter } from './navidrome/types.js';
import { RecipeManager } from './recipes/recipe-manager.js';
import { RediscoverWeekly } from './rediscover/rediscover-weekly.js';
import { formatUserError } from './utils/error-formatter.js';

export const REDISCOVER_TITLE = 'Re-Discover Weekly';
export const thisIsTitle = (artistName: string): string => `This Is ${artistName}`;

export interface RunnerSettings {
  rediscoverMaxTracks: number;
  rediscoverUseAi: boolean;
  thisIsMaxTracks: number;
}

export interface RunnerDependencies {
  library: LibraryProvider;
  writer: PlaylistWriter;
  orchestrator: CurationOrchestrator;
  rediscover: Pick<RediscoverWeekly, 'generate'>;
  settings: RunnerSettings;
  /** Defaults to the application database */
  db?: DatabaseClient;
  now?: () => Date;
}

export interface RediscoverRunOptions {
  maxTracks?: number;
  useAi?: boolean;
  varietyContext?: string;
}

export interface ThisIsRunOptions {
  maxTracks?: number;
  varietyContext?: string;
}

export interface PlaylistRunSummary {
  playlistKey: string;
  navidromePlaylistId: string;
  title: string;
  trackIds: string[];
  aiCurated: boolean;
  reasoning: string;
}

interface PublishInput {
  playlistType: PlaylistType;
  title: string;
  artistId?: string;
  artistName?: string;
  tracks: SavedTrackInput[];
  aiCurated: boolean;
  reasoning: string;
}

export class PlaylistRunner {
  constructor(private readonly deps: RunnerDependencies) {}

  private get db(): DatabaseClient {
    return this.deps.db ?? getDb();
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async withJob<T>(job: string, context: string, work: () => Promise<T>): Promise<T> {
    const jobId = await recordJobStart(job, this.db);
    try {
      const result = await work();
      if (jobId) {
        await recordJobCompletion(jobId, 'success', undefined, this.db);
      }
      return result;
    } catch (error) {
      if (jobId) {
        await recordJobCompletion(jobId, 'failed', formatUserError(error, context), this.db);
      }
      logger.error({ job, err: error }, 'playlist run failed');
      throw error;
    }
  }

  /**
   * Write the tracks to Navidrome (replacing an existing playlist in place) and store the result.
   */
  private async publish(input: PublishInput): Promise<PlaylistRunSummary> {
    const playlistKey = playlistKeyFor(input.playlistType, input.artistId);
    const generatedAt = this.now();
    const trackIds = input.tracks.map(track => track.trackId);
    const comment = `${trackIds.length} tracks • ${input.aiCurated ? 'AI curated' : 'Algorithmic selection'} • Updated ${format(generatedAt, 'yyyy-MM-dd HH:mm')}`;

    const existing = await getPlaylistByKey(playlistKey, this.db);
    let navidromePlaylistId: string | null = null;

    if (existing?.navidromePlaylistId) {
      try {
        await this.deps.writer.updatePlaylist(existing.navidromePlaylistId, trackIds, comment);
        navidromePlaylistId = existing.navidromePlaylistId;
      } catch (error) {
        logger.warn(
          { playlistKey, navidromePlaylistId: existing.navidromePlaylistId, err: error },
          'failed to update existing playlist, creating a new one'
        );
      }
    }

    if (!navidromePlaylistId) {
      navidromePlaylistId = await this.deps.writer.createPlaylist(input.title, trackIds, comment);
    }

    savePlaylist(
      {
        playlistKey,
        playlistType: input.playlistType,
        title: input.title,
        artistId: input.artistId,
        artistName: input.artistName,
        navidromePlaylistId,
        reasoning: input.reasoning,
        aiCurated: input.aiCurated,
        generatedAt,
        tracks: input.tracks
      },
      this.db
    );

    logger.info(
      { playlistKey, navidromePlaylistId, tracks: trackIds.length, aiCurated: input.aiCurated },
      'playlist published'
    );

    return {
      playlistKey,
      navidromePlaylistId,
      title: input.title,
      trackIds,
      aiCurated: input.aiCurated,
      reasoning: input.reasoning
    };
  }

  async runRediscoverWeekly(options: RediscoverRunOptions = {}): Promise<PlaylistRunSummary> {
    const { settings } = this.deps;
    const maxTracks = options.maxTracks ?? settings.rediscoverMaxTracks;
    const useAi = options.useAi ?? settings.rediscoverUseAi;

    return this.withJob('re_discover', 'generating Re-Discover Weekly', async () => {
      logger.info({ maxTracks, useAi }, 'starting re-discover weekly run');
      const tracks = await this.deps.rediscover.generate({
        maxTracks,
        useAi,
        varietyContext: options.varietyContext,
        now: this.now()
      });

      return this.publish({
        playlistType: 're_discover',
        title: REDISCOVER_TITLE,
        tracks: tracks.map(track => ({
          trackId: track.id,
          title: track.title,
          artist: track.artist,
          album: track.album,
          score: track.score
        })),
        aiCurated: tracks[0]?.aiCurated ?? false,
        reasoning: tracks[0]?.aiReasoning ?? ''
      });
    });
  }

  async runThisIs(artistId: string, options: ThisIsRunOptions = {}): Promise<PlaylistRunSummary> {
    const maxTracks = options.maxTracks ?? this.deps.settings.thisIsMaxTracks;

    return this.withJob(`this_is:${artistId}`, `generating This Is playlist for artist ${artistId}`, async () => {
      const artists = await this.deps.library.getArtists();
      const artist = artists.find(candidate => candidate.id === artistId);
      if (!artist) {
        throw new Error(`Unknown artist: ${artistId}`);
      }

      const catalogue = await this.deps.library.getTracksByArtist(artistId);
      logger.info({ artistId, artist: artist.name, tracks: catalogue.length, maxTracks }, 'starting this is run');

      const result = await curateThisIs(this.deps.orchestrator, artist.name, catalogue, maxTracks, {
        includeReasoning: true,
        varietyContext: options.varietyContext,
        now: this.now()
      });

      const byId = new Map(catalogue.map(track => [track.id, track]));
      return this.publish({
        playlistType: 'this_is',
        title: thisIsTitle(artist.name),
        artistId,
        artistName: artist.name,
        tracks: result.trackIds.map(id => {
          const track = byId.get(id);
          return { trackId: id, title: track?.title, artist: track?.artist, album: track?.album };
        }),
        aiCurated: result.aiCurated,
        reasoning: result.reasoning
      });
    });
  }

  /**
   * Regenerate every stored This Is playlist. Continues past failures and
   * throws once at the end if any artist failed.
   */
  async refreshAllThisIs(): Promise<void> {
    const stored = await listPlaylistsByType('this_is', this.db);
    const failed: string[] = [];

    for (const playlist of stored) {
      if (!playlist.artistId) {
        continue;
      }
      try {
        await this.runThisIs(playlist.artistId);
      } catch (error) {
        logger.error({ artistId: playlist.artistId, err: error }, 'this is refresh failed, continuing to next');
        failed.push(playlist.artistName ?? playlist.artistId);
      }
    }

    logger.info({ total: stored.length, failed: failed.length }, 'this is refresh complete');
    if (failed.length > 0) {
      throw new Error(`Failed to refresh ${failed.length}/${stored.length} This Is playlists: ${failed.join(', ')}`);
    }
  }
}

export const navidromeClientFromEnv = (): NavidromeClient =>
  new NavidromeClient({
    baseUrl: APP_ENV.NAVIDROME_URL,
    username: APP_ENV.NAVIDROME_USERNAME,
    password: APP_ENV.NAVIDROME_PASSWORD,
    libraryId: APP_ENV.NAVIDROME_LIBRARY_ID,
    timeoutMs: APP_ENV.NAVIDROME_TIMEOUT
  });

export const llmSettingsFromEnv = (): LlmSettings => ({
  provider: APP_ENV.AI_PROVIDER,
  apiKey: APP_ENV.AI_API_KEY,
  model: APP_ENV.AI_MODEL,
  ollamaBaseUrl: APP_ENV.OLLAMA_BASE_URL,
  timeoutMs: APP_ENV.AI_TIMEOUT,
  ollamaTimeoutMs: APP_ENV.OLLAMA_TIMEOUT
});

/**
 * Wire the runner from environment configuration.
 */
export const createPlaylistRunner = (): PlaylistRunner => {
  const client = navidromeClientFromEnv();
  const recipes = new RecipeManager(APP_ENV.RECIPES_DIR);
  const llm = createLlmProvider(llmSettingsFromEnv());
  if (!llm.ok) {
    logger.warn({ provider: APP_ENV.AI_PROVIDER, reason: llm.error.message }, 'ai curation unavailable, using algorithmic selection');
  }

  const orchestrator = new CurationOrchestrator({ llm, recipes });
  const rediscover = new RediscoverWeekly({
    library: client,
    orchestrator,
    recipes,
    artistLimit: APP_ENV.HISTORY_ARTIST_LIMIT,
    concurrency: APP_ENV.HISTORY_CONCURRENCY
  });

  return new PlaylistRunner({
    library: client,
    writer: client,
    orchestrator,
    rediscover,
    settings: {
      rediscoverMaxTracks: APP_ENV.REDISCOVER_MAX_TRACKS,
      rediscoverUseAi: APP_ENV.REDISCOVER_USE_AI,
      thisIsMaxTracks: APP_ENV.THIS_IS_MAX_TRACKS
    }
  });
};
