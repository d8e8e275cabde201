import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { RediscoverWeekly, buildAnalysisSummary, resolveStrategy } from '../rediscover-weekly.js';
import { buildCandidatePool } from '../scorer.js';
import { CurationOrchestrator } from '../../curation/orchestrator.js';
import { CurationError, fail, ok } from '../../curation/errors.js';
import { RecipeManager } from '../../recipes/recipe-manager.js';
import type { GenerateRequest } from '../../ai/provider.js';
import type { TrackStat } from '../../history/types.js';
import { FakeLibrary, FakeLlm, createLibraryTrack, seededRandom } from '../../__tests__/helpers/fakes.js';

vi.mock('../../logger.js', () => ({
  logger: {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

const NOW = new Date('2025-06-30T12:00:00Z');
const recipes = new RecipeManager(fileURLToPath(new URL('../../../recipes', import.meta.url)));

const playCountLibrary = () =>
  new FakeLibrary({
    scrobbles: null,
    artists: [
      { id: 'a1', name: 'First' },
      { id: 'a2', name: 'Second' }
    ],
    tracksByArtist: {
      a1: [
        createLibraryTrack({ id: 't1', playCount: 10 }),
        createLibraryTrack({ id: 't2', playCount: 4 }),
        createLibraryTrack({ id: 't3', playCount: 7 })
      ],
      a2: [createLibraryTrack({ id: 't4', playCount: 2 })]
    }
  });

const offlineOrchestrator = new CurationOrchestrator({
  llm: fail({ kind: 'configuration-missing', message: 'No AI API key configured' }),
  recipes
});

describe('resolveStrategy', () => {
  it('reads windows and the artist cap from the recipe notes', () => {
    const notes = recipes.applyRecipe('re_discover', { numTracks: 40 }).strategyNotes;
    expect(resolveStrategy(notes, 40)).toEqual({ analysisDays: 30, minGapDays: 7, maxGapDays: 120, maxPerArtist: 5 });
  });

  it('uses defaults without notes', () => {
    expect(resolveStrategy(null, 24)).toEqual({ analysisDays: 30, minGapDays: 7, maxGapDays: 120, maxPerArtist: 3 });
  });

  it('fills missing values from defaults', () => {
    expect(resolveStrategy({ time_windows: { analysis_period: '14 days' } }, 20)).toEqual({
      analysisDays: 14,
      minGapDays: 7,
      maxGapDays: 120,
      maxPerArtist: 2
    });
  });

  it('ignores unreadable notes', () => {
    expect(resolveStrategy({ diversity_controls: { max_per_artist: '{{MATH:oops}}' } }, 20)).toEqual({
      analysisDays: 30,
      minGapDays: 7,
      maxGapDays: 120,
      maxPerArtist: 2
    });
  });
});

describe('buildAnalysisSummary', () => {
  it('describes the candidate pool', () => {
    const stat = (trackId: string, totalPlays: number): TrackStat => ({
      trackId,
      title: trackId,
      artist: trackId,
      album: 'Album',
      totalPlays,
      recentPlays: 0,
      lastPlay: null
    });
    const pool = buildCandidatePool(new Map([['a', stat('a', 1)], ['b', stat('b', 2)]]), 4, { now: NOW });
    if (!pool.ok) throw new Error('expected a pool');

    const summary = buildAnalysisSummary(12, 2, { analysisDays: 30, minGapDays: 7, maxGapDays: 120, maxPerArtist: 2 }, pool.value);

    expect(summary.split('\n')).toEqual([
      'Algorithmic Analysis Results:',
      '- Analyzed 12 listening events from the last 30 days',
      '- Found 2 unique tracks in listening history',
      '- Applied scoring formula: play_count × days_since_last_play (capped at 90 days)',
      '- Kept tracks last played 7 to 120 days ago',
      '- Applied artist diversity limit of 2 tracks per artist',
      '- Generated 2 rediscovery candidates',
      '- Average algorithmic score: 135.0'
    ]);
  });
});

describe('RediscoverWeekly', () => {
  it('returns the top-scored candidates when AI is disabled', async () => {
    const rediscover = new RediscoverWeekly({ library: playCountLibrary(), orchestrator: offlineOrchestrator, recipes });

    const tracks = await rediscover.generate({ maxTracks: 2, useAi: false, now: NOW });

    expect(tracks).toEqual([
      {
        id: 't1',
        title: 'Track t1',
        artist: 'First',
        album: 'Test Album',
        score: 900,
        historicalPlays: 10,
        daysSinceLastPlay: 90,
        aiCurated: false,
        aiReasoning: 'Algorithmic selection used (AI curation disabled)'
      },
      {
        id: 't3',
        title: 'Track t3',
        artist: 'First',
        album: 'Test Album',
        score: 630,
        historicalPlays: 7,
        daysSinceLastPlay: 90,
        aiCurated: false,
        aiReasoning: 'Algorithmic selection used (AI curation disabled)'
      }
    ]);
  });

  it('lets the AI choose from the diversity-capped pool', async () => {
    const llm = new FakeLlm((request: GenerateRequest) => {
      const payload: { available_tracks: Array<{ index: number; title: string }>; recipe: { instructions: string } } =
        JSON.parse(request.userPrompt);
      const index = (title: string) => payload.available_tracks.find(track => track.title === title)?.index;
      return JSON.stringify({ track_ids: [index('Track t4'), index('Track t1')], reasoning: 'balanced artists' });
    });
    const orchestrator = new CurationOrchestrator({ llm: ok(llm), recipes, random: seededRandom(1) });
    const rediscover = new RediscoverWeekly({ library: playCountLibrary(), orchestrator, recipes });

    const tracks = await rediscover.generate({ maxTracks: 2, useAi: true, now: NOW });

    expect(tracks.map(track => [track.id, track.aiCurated, track.aiReasoning])).toEqual([
      ['t4', true, 'balanced artists'],
      ['t1', true, 'balanced artists']
    ]);

    const payload: { available_tracks: unknown[]; recipe: { instructions: string } } = JSON.parse(llm.requests[0].userPrompt);
    // t2 is the third track by First and is dropped by the artist cap
    expect(payload.available_tracks).toHaveLength(3);
    expect(payload.recipe.instructions).toContain('- Generated 3 rediscovery candidates');
  });

  it('uses scrobbles and skips recently played tracks', async () => {
    const scrobble = (trackId: string, playedAt: string) => ({
      trackId,
      title: `Song ${trackId}`,
      artist: 'Artist',
      album: 'Album',
      playedAt: new Date(playedAt)
    });
    const library = new FakeLibrary({
      scrobbles: [
        scrobble('x', '2025-06-10T12:00:00Z'),
        scrobble('x', '2025-06-09T12:00:00Z'),
        scrobble('y', '2025-06-28T12:00:00Z'),
        scrobble('y', '2025-06-01T12:00:00Z')
      ]
    });
    const rediscover = new RediscoverWeekly({ library, orchestrator: offlineOrchestrator, recipes });

    const tracks = await rediscover.generate({ maxTracks: 5, useAi: false, now: NOW });

    expect(tracks.map(track => [track.id, track.score, track.daysSinceLastPlay, track.historicalPlays])).toEqual([
      ['x', 40, 20, 2]
    ]);
  });

  it('reports missing history', async () => {
    const rediscover = new RediscoverWeekly({ library: new FakeLibrary(), orchestrator: offlineOrchestrator, recipes });

    const promise = rediscover.generate({ maxTracks: 5, useAi: false, now: NOW });

    await expect(promise).rejects.toBeInstanceOf(CurationError);
    await expect(promise).rejects.toThrow('No listening history found');
  });

  it('reports when every track was heard recently', async () => {
    const library = new FakeLibrary({
      scrobbles: [{ trackId: 'x', title: 'X', artist: 'A', album: 'B', playedAt: new Date('2025-06-29T12:00:00Z') }]
    });
    const rediscover = new RediscoverWeekly({ library, orchestrator: offlineOrchestrator, recipes });

    await expect(rediscover.generate({ maxTracks: 5, useAi: false, now: NOW })).rejects.toThrow(
      'No tracks found for re-discovery. Try listening to more music first.'
    );
  });

  it('wraps a failing history source as insufficient history', async () => {
    const library = playCountLibrary();
    vi.spyOn(library, 'getArtists').mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:4533'));
    const rediscover = new RediscoverWeekly({ library, orchestrator: offlineOrchestrator, recipes });

    const promise = rediscover.generate({ maxTracks: 5, useAi: false, now: NOW });

    await expect(promise).rejects.toBeInstanceOf(CurationError);
    await expect(promise).rejects.toMatchObject({
      reason: {
        kind: 'insufficient-history',
        message: 'Failed to get listening history: connect ECONNREFUSED 127.0.0.1:4533'
      }
    });
  });

  it('wraps a scrobble request failure', async () => {
    const library = playCountLibrary();
    vi.spyOn(library, 'getScrobbles').mockRejectedValue(new Error('Timeout awaiting request'));
    const rediscover = new RediscoverWeekly({ library, orchestrator: offlineOrchestrator, recipes });

    await expect(rediscover.generate({ maxTracks: 5, useAi: false, now: NOW })).rejects.toThrow(
      'Failed to get listening history: Timeout awaiting request'
    );
  });
});
