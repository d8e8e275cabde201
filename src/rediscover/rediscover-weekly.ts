import { z } from 'zod';

import { CurationError, unwrapOrThrow } from '../curation/errors.js';
import { fallbackResult } from '../curation/fallback.js';
import type { CurationOrchestrator, RecipeSource } from '../curation/orchestrator.js';
import type { CurationResult } from '../curation/types.js';
import { buildStats } from '../history/aggregate.js';
import { fetchPlayHistory } from '../history/history-service.js';
import type { PlayEvent } from '../history/types.js';
import { logger } from '../logger.js';
import type { LibraryProvider } from '../navidrome/types.js';
import {
  DEFAULT_SCORING,
  buildCandidatePool,
  maxPerArtistFor,
  toCurationTrack,
  type CandidatePool,
  type ScoredCandidate
} from './scorer.js';

export interface ResultTrack {
  id: string;
  title: string;
  artist: string;
  album: string;
  score: number;
  historicalPlays: number;
  daysSinceLastPlay: number;
  aiCurated: boolean;
  aiReasoning: string;
}

export interface RediscoverOptions {
  maxTracks: number;
  useAi: boolean;
  varietyContext?: string;
  now?: Date;
  signal?: AbortSignal;
}

export interface RediscoverStrategy {
  analysisDays: number;
  minGapDays: number;
  maxGapDays: number;
  maxPerArtist: number;
}

export interface RediscoverDependencies {
  library: LibraryProvider;
  orchestrator: CurationOrchestrator;
  recipes: RecipeSource;
  artistLimit?: number;
  concurrency?: number;
}

const DEFAULT_ANALYSIS_DAYS = 30;

const leadingInt = z
  .union([z.number(), z.string()])
  .transform(value => (typeof value === 'number' ? value : Number.parseInt(value, 10)))
  .pipe(z.number().int().positive());

const strategyNotesSchema = z.object({
  time_windows: z
    .object({
      analysis_period: leadingInt.optional(),
      minimum_gap: leadingInt.optional(),
      maximum_gap: leadingInt.optional()
    })
    .optional(),
  diversity_controls: z.object({ max_per_artist: leadingInt.optional() }).optional()
});

/**
 * Read time windows and the artist cap from the recipe's strategy notes
 * ("30 days", "7+ days", ...). Missing or unreadable values use the defaults.
 */
export const resolveStrategy = (strategyNotes: Record<string, unknown> | null, maxTracks: number): RediscoverStrategy => {
  const defaults: RediscoverStrategy = {
    analysisDays: DEFAULT_ANALYSIS_DAYS,
    minGapDays: DEFAULT_SCORING.minGapDays,
    maxGapDays: DEFAULT_SCORING.maxGapDays,
    maxPerArtist: maxPerArtistFor(maxTracks)
  };
  if (!strategyNotes) {
    return defaults;
  }

  const parsed = strategyNotesSchema.safeParse(strategyNotes);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues.length }, 'unreadable re-discover strategy notes, using defaults');
    return defaults;
  }

  const windows = parsed.data.time_windows;
  return {
    analysisDays: windows?.analysis_period ?? defaults.analysisDays,
    minGapDays: windows?.minimum_gap ?? defaults.minGapDays,
    maxGapDays: windows?.maximum_gap ?? defaults.maxGapDays,
    maxPerArtist: parsed.data.diversity_controls?.max_per_artist ?? defaults.maxPerArtist
  };
};

export const buildAnalysisSummary = (
  eventCount: number,
  uniqueTracks: number,
  strategy: RediscoverStrategy,
  pool: CandidatePool
): string => {
  const avgScore = pool.candidates.reduce((sum, candidate) => sum + candidate.rediscoveryScore, 0) / pool.candidates.length;
  return [
    'Algorithmic Analysis Results:',
    `- Analyzed ${eventCount} listening events from the last ${strategy.analysisDays} days`,
    `- Found ${uniqueTracks} unique tracks in listening history`,
    `- Applied scoring formula: play_count × days_since_last_play (capped at ${DEFAULT_SCORING.scoreCapDays} days)`,
    `- Kept tracks last played ${strategy.minGapDays} to ${strategy.maxGapDays} days ago`,
    `- Applied artist diversity limit of ${pool.maxPerArtist} tracks per artist`,
    `- Generated ${pool.candidates.length} rediscovery candidates`,
    `- Average algorithmic score: ${avgScore.toFixed(1)}`
  ].join('\n');
};

/**
 * Re-Discover Weekly: tracks the listener played a lot but has not heard for a while.
 */
export class RediscoverWeekly {
  constructor(private readonly deps: RediscoverDependencies) {}

  private loadStrategy(maxTracks: number): RediscoverStrategy {
    try {
      const recipe = this.deps.recipes.applyRecipe('re_discover', { numTracks: maxTracks });
      return resolveStrategy(recipe.strategyNotes, maxTracks);
    } catch (error) {
      logger.warn({ err: error }, 're-discover recipe unavailable, using default strategy');
      return resolveStrategy(null, maxTracks);
    }
  }

  private async loadHistory(analysisDays: number, now: Date): Promise<PlayEvent[]> {
    try {
      return await fetchPlayHistory(this.deps.library, analysisDays, {
        now,
        artistLimit: this.deps.artistLimit,
        concurrency: this.deps.concurrency
      });
    } catch (error) {
      if (error instanceof CurationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error }, 'failed to fetch listening history');
      throw new CurationError({ kind: 'insufficient-history', message: `Failed to get listening history: ${message}` });
    }
  }

  /**
   * Throws `CurationError` when there is no history or no eligible track;
   * AI problems fall back to the top-scored candidates.
   */
  async generate({ maxTracks, useAi, varietyContext, now = new Date(), signal }: RediscoverOptions): Promise<ResultTrack[]> {
    const strategy = this.loadStrategy(maxTracks);

    const history = await this.loadHistory(strategy.analysisDays, now);
    const stats = unwrapOrThrow(buildStats(history, { now, requireNonEmpty: true }));
    const pool = unwrapOrThrow(
      buildCandidatePool(stats, maxTracks, {
        now,
        minGapDays: strategy.minGapDays,
        maxGapDays: strategy.maxGapDays,
        maxPerArtist: strategy.maxPerArtist
      })
    );

    logger.info(
      { events: history.length, uniqueTracks: stats.size, scored: pool.scoredCount, candidates: pool.candidates.length },
      're-discover candidate pool ready'
    );

    const tracks = pool.candidates.map(toCurationTrack);
    let result: CurationResult;
    if (useAi) {
      result = unwrapOrThrow(
        await this.deps.orchestrator.curate({
          playlistType: 're_discover',
          tracks,
          targetCount: maxTracks,
          includeReasoning: true,
          analysisSummary: buildAnalysisSummary(history.length, stats.size, strategy, pool),
          varietyContext,
          signal
        })
      );
    } else {
      result = fallbackResult(tracks, maxTracks, { kind: 'configuration-missing', message: 'AI curation disabled' });
    }

    const byId = new Map<string, ScoredCandidate>(pool.candidates.map(candidate => [candidate.trackId, candidate]));
    return result.trackIds.flatMap(id => {
      const candidate = byId.get(id);
      if (!candidate) {
        return [];
      }
      return [{
        id,
        title: candidate.stat.title,
        artist: candidate.stat.artist,
        album: candidate.stat.album,
        score: Math.round(candidate.rediscoveryScore * 100) / 100,
        historicalPlays: candidate.stat.totalPlays,
        daysSinceLastPlay: candidate.daysSinceLastPlay,
        aiCurated: result.aiCurated,
        aiReasoning: result.reasoning
      }];
    });
  }
}
