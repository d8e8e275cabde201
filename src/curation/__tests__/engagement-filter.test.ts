import { describe, it, expect, vi } from 'vitest';
import {
  calculateFilterThreshold,
  engagementScore,
  filterTracksForThisIs,
  libraryStatsFor
} from '../engagement-filter.js';
import { createLibraryTrack } from '../../__tests__/helpers/fakes.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

const NOW = new Date('2025-06-30T12:00:00Z');

describe('engagementScore', () => {
  it('adds every engagement signal', () => {
    const track = createLibraryTrack({
      id: 't1',
      playCount: 10,
      loved: true,
      rating: 4,
      playlistAppearances: 12,
      lastPlayed: new Date('2025-06-20T12:00:00Z')
    });

    // 50 plays + 50 loved + 40 rating + 50 playlists (capped) + 20 recency
    expect(engagementScore(track, { maxPlayCount: 20 }, NOW)).toBe(210);
  });

  it('gives no recency bonus after 30 days', () => {
    const track = createLibraryTrack({ id: 't1', playCount: 5, lastPlayed: new Date('2025-05-01T12:00:00Z') });
    expect(engagementScore(track, { maxPlayCount: 5 }, NOW)).toBe(100);
  });

  it('scores zero for an unplayed library', () => {
    expect(engagementScore(createLibraryTrack({ id: 't1' }), { maxPlayCount: 0 }, NOW)).toBe(0);
  });
});

describe('calculateFilterThreshold', () => {
  it('shrinks the multiplier as playlists grow', () => {
    expect([10, 25, 26, 50, 51, 100, 101, 500].map(calculateFilterThreshold)).toEqual([10, 10, 8, 8, 6, 6, 5, 5]);
  });
});

describe('filterTracksForThisIs', () => {
  it('passes small catalogues through unchanged', () => {
    const tracks = [createLibraryTrack({ id: 'a' }), createLibraryTrack({ id: 'b' })];
    const { tracks: kept, metadata } = filterTracksForThisIs(tracks, 2, undefined, NOW);

    expect(kept.map(t => t.id)).toEqual(['a', 'b']);
    expect(metadata).toEqual({ filtered: false, sourceCount: 2, sentCount: 2, thresholdMultiplier: 10 });
  });

  it('passes the catalogue through for an empty target', () => {
    const tracks = [createLibraryTrack({ id: 'a', playCount: 3 }), createLibraryTrack({ id: 'b', playCount: 9 })];
    const { tracks: kept, metadata } = filterTracksForThisIs(tracks, 0, undefined, NOW);

    expect(kept.map(t => t.id)).toEqual(['a', 'b']);
    expect(metadata).toEqual({ filtered: false, sourceCount: 2, sentCount: 2, thresholdMultiplier: 10 });
  });

  it('keeps the best-engaged tracks of a large catalogue', () => {
    const tracks = Array.from({ length: 25 }, (_, i) => createLibraryTrack({ id: `t${i}`, playCount: i }));

    const { tracks: kept, metadata } = filterTracksForThisIs(tracks, 2, libraryStatsFor(tracks), NOW);

    expect(kept).toHaveLength(20);
    expect(kept[0].id).toBe('t24');
    expect(kept[19].id).toBe('t5');
    expect(metadata.filtered).toBe(true);
    expect(metadata.sentCount).toBe(20);
    expect(metadata.scoreRange?.highest).toBe(100);
    expect(metadata.scoreRange?.lowest).toBeCloseTo(20.833, 3);
    expect(metadata.scoreRange?.cutoff).toBeCloseTo(16.667, 3);
  });
});
