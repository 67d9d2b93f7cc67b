import { normalizeSeries } from '@/lib/mangabaka/normalize';
import type { CanonicalMetadata } from '@/lib/metadata/types';
import {
  MatchTier,
  normalizeTitle,
  rankCandidates,
  scoreTitle,
  similarity,
  titlesMatch,
} from '@/lib/search/ranking';
import { buildSearchQuery } from '@/lib/search/query';
import { seriesRecord } from '../helpers/fixtures';

function candidate(id: number, title: string, extra: Record<string, unknown> = {}): CanonicalMetadata {
  return normalizeSeries(seriesRecord({ id, title, ...extra }));
}

describe('normalizeTitle', () => {
  it('lowercases, strips accents and punctuation', () => {
    expect(normalizeTitle('  Pokémon:  Adventures! ')).toBe('pokemon adventures');
  });

  it('keeps non-latin letters', () => {
    expect(normalizeTitle('ナルト')).toBe('ナルト');
  });
});

describe('similarity', () => {
  it('is 1 for equal strings and 0 against empty', () => {
    expect(similarity('naruto', 'naruto')).toBe(1);
    expect(similarity('naruto', '')).toBe(0);
  });

  it('is the Levenshtein ratio', () => {
    // one substitution over six characters
    expect(similarity('naruto', 'narute')).toBeCloseTo(5 / 6);
  });
});

describe('titlesMatch', () => {
  it('matches titles differing only by case and accents', () => {
    expect(titlesMatch('Pokemon', 'POKÉMON')).toBe(true);
  });

  it('rejects titles below the threshold', () => {
    expect(titlesMatch('Naruto', 'Boruto: Naruto Next Generations')).toBe(false);
  });

  it('honours a custom threshold', () => {
    expect(titlesMatch('naruto', 'narute', 80)).toBe(true);
    expect(titlesMatch('naruto', 'narute', 90)).toBe(false);
  });
});

describe('scoreTitle', () => {
  it('ranks exact, substring, fuzzy and unrelated titles into tiers', () => {
    expect(scoreTitle('Naruto', { title: 'NARUTO', alternateTitles: [] }).tier).toBe(MatchTier.EXACT);
    expect(scoreTitle('Naruto', { title: 'Naruto Gaiden', alternateTitles: [] }).tier).toBe(MatchTier.SUBSTRING);
    expect(scoreTitle('Naruto', { title: 'Narutu', alternateTitles: [] }).tier).toBe(MatchTier.FUZZY);
    expect(scoreTitle('Naruto', { title: 'Bleach', alternateTitles: [] }).tier).toBe(MatchTier.NONE);
  });

  it('considers alternate titles', () => {
    const score = scoreTitle('Shingeki no Kyojin', {
      title: 'Attack on Titan',
      alternateTitles: ['Shingeki no Kyojin'],
    });

    expect(score).toEqual({ tier: MatchTier.EXACT, similarity: 1 });
  });

  it('rounds similarity to two decimals', () => {
    // 1 - 1/6 = 0.8333...
    expect(scoreTitle('naruto', { title: 'narute', alternateTitles: [] }).similarity).toBe(0.83);
  });
});

describe('rankCandidates', () => {
  it('puts the exact title first, then substring matches by similarity', () => {
    const ranked = rankCandidates(buildSearchQuery('Naruto'), [
      candidate(1, 'Boruto: Naruto Next Generations'),
      candidate(2, 'Naruto'),
      candidate(3, 'Naruto Gaiden'),
    ]);

    expect(ranked.map((c) => c.id)).toEqual(['2', '3', '1']);
  });

  it('breaks ties with the year hint, then rating, then recency, then provider order', () => {
    const query = buildSearchQuery('Monster (1994)');
    const ranked = rankCandidates(query, [
      candidate(1, 'Monster', { year: 2010, rating: 9, last_updated_at: '2024-01-01T00:00:00Z' }),
      candidate(2, 'Monster', { year: 1994, rating: 5, last_updated_at: '2020-01-01T00:00:00Z' }),
      candidate(3, 'Monster', { year: 2010, rating: 9, last_updated_at: '2024-06-01T00:00:00Z' }),
      candidate(4, 'Monster', { year: 2010, rating: 7, last_updated_at: '2025-01-01T00:00:00Z' }),
      candidate(5, 'Monster', { year: 2010, rating: 7, last_updated_at: '2025-01-01T00:00:00Z' }),
    ]);

    expect(ranked.map((c) => c.id)).toEqual(['2', '3', '1', '4', '5']);
  });

  it('ranks unknown ratings below known ones', () => {
    const ranked = rankCandidates(buildSearchQuery('Monster'), [
      candidate(1, 'Monster', { rating: null }),
      candidate(2, 'Monster', { rating: 1 }),
    ]);

    expect(ranked.map((c) => c.id)).toEqual(['2', '1']);
  });

  it('is deterministic and leaves its input untouched', () => {
    const input = [candidate(1, 'Bleach'), candidate(2, 'Naruto'), candidate(3, 'One Piece')];
    const query = buildSearchQuery('Naruto');

    const first = rankCandidates(query, input);
    const second = rankCandidates(query, input);

    expect(first.map((c) => c.id)).toEqual(second.map((c) => c.id));
    expect(input.map((c) => c.id)).toEqual(['1', '2', '3']);
  });
});
