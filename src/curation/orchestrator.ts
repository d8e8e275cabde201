import { LlmEnvelopeError, LlmTransportError, type LlmProvider } from '../ai/provider.js';
import { logger } from '../logger.js';
import type { AppliedRecipe, RecipeInputs } from '../recipes/types.js';
import { fail, ok, type FailureReason, type Result } from './errors.js';
import { fallbackResult } from './fallback.js';
import { buildPrompt } from './prompt-builder.js';
import { interpretResponse } from './response-interpreter.js';
import type { CurationResult, CurationTrack, PlaylistType } from './types.js';

export interface RecipeSource {
  applyRecipe(playlistType: string, inputs: RecipeInputs, includeReasoning?: boolean): AppliedRecipe;
}

export interface OrchestratorDependencies {
  /** A failed result (e.g. no API key) sends every request straight to the fallback */
  llm: Result<LlmProvider>;
  recipes: RecipeSource;
  /** Uniform [0, 1) source for the pre-prompt shuffle */
  random?: () => number;
}

export interface CurationRequest {
  playlistType: PlaylistType;
  tracks: readonly CurationTrack[];
  targetCount: number;
  includeReasoning: boolean;
  targetArtist?: string;
  analysisSummary?: string;
  varietyContext?: string;
  signal?: AbortSignal;
}

/**
 * Fisher-Yates shuffle into a new array
 */
export const shuffleArray = <T>(array: readonly T[], random: () => number = Math.random): T[] => {
  const shuffled = [...array];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
};

const toFailureReason = (error: unknown): FailureReason => {
  if (error instanceof LlmTransportError) {
    return { kind: 'transport-failure', message: error.message, status: error.status };
  }
  if (error instanceof LlmEnvelopeError) {
    return { kind: 'malformed-response', message: `AI response failed validation: ${error.message}` };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'transport-failure', message: `Unexpected error in AI curation: ${message}` };
};

/**
 * Runs one AI-assisted curation: shuffle, prompt, a single model round trip,
 * interpretation. Any failure after the source tracks are known degrades to
 * the deterministic fallback; only an empty source is returned as a failure.
 *
 * Holds no per-request state, so concurrent `curate` calls are independent.
 */
export class CurationOrchestrator {
  private readonly random: () => number;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.random = deps.random ?? Math.random;
  }

  async curate(request: CurationRequest): Promise<Result<CurationResult>> {
    const { playlistType, tracks, targetCount, includeReasoning, signal } = request;
    signal?.throwIfAborted();

    if (tracks.length === 0) {
      return fail({ kind: 'no-candidates', message: 'No tracks available for curation' });
    }

    const fallback = (reason: FailureReason): Result<CurationResult> => {
      logger.warn({ playlistType, reason: reason.kind, cause: reason.message }, 'using algorithmic selection');
      return ok(fallbackResult(tracks, targetCount, reason));
    };

    const { llm } = this.deps;
    if (!llm.ok) {
      return fallback(llm.error);
    }

    let recipe: AppliedRecipe;
    try {
      recipe = this.deps.recipes.applyRecipe(
        playlistType,
        {
          numTracks: targetCount,
          targetArtist: request.targetArtist,
          analysisSummary: request.analysisSummary,
          varietyContext: request.varietyContext
        },
        includeReasoning
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fallback({ kind: 'configuration-missing', message: `Recipe unavailable: ${message}` });
    }

    // Ordinal position must not carry album or track-listing order into the selection
    const shuffled = shuffleArray(tracks, this.random);
    const prompt = buildPrompt(
      shuffled,
      targetCount,
      {
        playlistType,
        includeReasoning,
        targetArtist: request.targetArtist,
        varietyContext: request.varietyContext
      },
      recipe
    );

    logger.info(
      { playlistType, provider: llm.value.name, recipe: recipe.filename, format: prompt.format, tracks: tracks.length, targetCount },
      'requesting ai curation'
    );

    let rawText: string;
    try {
      rawText = await llm.value.generate(
        {
          systemPrompt: prompt.systemPrompt,
          userPrompt: prompt.userPrompt,
          maxTokens: prompt.maxTokens,
          temperature: prompt.temperature
        },
        signal
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      return fallback(toFailureReason(error));
    }

    const interpreted = interpretResponse(rawText, prompt.indexMap, targetCount, {
      mode: prompt.format,
      backfillOrder: tracks.map(track => track.id)
    });
    if (!interpreted.ok) {
      logger.debug({ playlistType, response: rawText.slice(0, 500) }, 'unusable ai response');
      return fallback(interpreted.error);
    }

    const { stats, ...result } = interpreted.value;
    logger.info({ playlistType, tracks: result.trackIds.length, ...stats }, 'ai curation complete');
    return ok(result);
  }
}
