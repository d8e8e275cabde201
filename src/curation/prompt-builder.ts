import type { AppliedRecipe, RecipeFormat } from '../recipes/types.js';
import { TRACKS_DATA_FIELD } from '../recipes/recipe-manager.js';
import type { CurationTrack, IdentifiedTrack, IndexedTrack, IndexToIdMap, PlaylistType } from './types.js';

export interface PromptContext {
  playlistType: PlaylistType;
  includeReasoning: boolean;
  targetArtist?: string;
  varietyContext?: string;
}

export interface CurationPayload {
  recipe: {
    name: string;
    version: string;
    instructions: string;
    strategy_notes: Record<string, unknown>;
  };
  available_tracks: IndexedTrack[] | IdentifiedTrack[];
  request: {
    playlist_type: PlaylistType;
    track_count: number;
    target_artist?: string;
    variety_context?: string;
    include_reasoning: boolean;
    response_format: { track_ids: string; reasoning: string };
  };
}

export interface BuiltPrompt {
  format: RecipeFormat;
  payload: CurationPayload;
  /** Position == index sent to the model */
  indexMap: IndexToIdMap;
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

const roundScore = (score: number): number => Math.round(score * 100) / 100;

const describeTrack = (track: CurationTrack): Omit<IndexedTrack, 'index'> => {
  const record: Omit<IndexedTrack, 'index'> = {
    title: track.title,
    artist: track.artist,
    plays: track.playCount
  };
  if (track.album) record.album = track.album;
  if (track.genre) record.genre = track.genre;
  if (track.year) record.year = track.year;
  if (track.daysSinceLastPlay !== undefined) {
    record.days_since_last_play = track.daysSinceLastPlay ?? 'unknown';
  }
  if (track.score !== undefined) record.score = roundScore(track.score);
  return record;
};

/**
 * Build the model request for `tracks` in their given order.
 *
 * Indexed recipes receive dense 0-based indices instead of track ids; `indexMap`
 * maps them back. Legacy recipes receive ids directly and the map is the id list.
 */
export const buildPrompt = (
  tracks: readonly CurationTrack[],
  targetCount: number,
  context: PromptContext,
  recipe: AppliedRecipe
): BuiltPrompt => {
  const indexMap: IndexToIdMap = tracks.map(track => track.id);
  const availableTracks = recipe.format === 'indexed'
    ? tracks.map((track, index): IndexedTrack => ({ index, ...describeTrack(track) }))
    : tracks.map((track): IdentifiedTrack => ({ id: track.id, ...describeTrack(track) }));

  const payload: CurationPayload = {
    recipe: {
      name: recipe.name,
      version: recipe.version,
      instructions: recipe.instructions,
      strategy_notes: recipe.strategyNotes
    },
    available_tracks: availableTracks,
    request: {
      playlist_type: context.playlistType,
      track_count: targetCount,
      ...(context.targetArtist !== undefined ? { target_artist: context.targetArtist } : {}),
      ...(context.varietyContext ? { variety_context: context.varietyContext } : {}),
      include_reasoning: context.includeReasoning,
      response_format: recipe.format === 'indexed'
        ? { track_ids: 'array of integer indices from available_tracks, in playlist order', reasoning: 'string' }
        : { track_ids: 'array of track id strings from available_tracks, in playlist order', reasoning: 'string' }
    }
  };

  const userPrompt = recipe.format === 'indexed'
    ? JSON.stringify(payload, null, 2)
    : recipe.instructions.split(`{${TRACKS_DATA_FIELD}}`).join(JSON.stringify(availableTracks, null, 2));

  return {
    format: recipe.format,
    payload,
    indexMap,
    systemPrompt: recipe.systemPrompt,
    userPrompt,
    maxTokens: recipe.maxTokens,
    temperature: recipe.temperature
  };
};
