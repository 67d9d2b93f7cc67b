import { normalizeSeries } from '@/lib/mangabaka/normalize';
import { allowedRatings, applyFilters, DEFAULT_FILTERS } from '@/lib/search/filters';
import { seriesRecord } from '../helpers/fixtures';

const candidates = [
  normalizeSeries(seriesRecord({ id: 1, content_rating: 'safe', type: 'manga', genres: ['action'] })),
  normalizeSeries(seriesRecord({ id: 2, content_rating: 'suggestive', type: 'manhwa', genres: ['romance'] })),
  normalizeSeries(seriesRecord({ id: 3, content_rating: 'erotica', type: 'manga', genres: [] })),
  normalizeSeries(seriesRecord({ id: 4, content_rating: 'safe', type: 'manga', genres: ['Doujinshi'] })),
  normalizeSeries(seriesRecord({ id: 5, content_rating: null, type: 'manga', genres: ['action'] })),
  normalizeSeries(seriesRecord({ id: 6, content_rating: 'safe', type: 'novel', genres: null })),
];

const ids = (list: { id: string }[]) => list.map((c) => c.id);

describe('allowedRatings', () => {
  it('includes every rating up to the ceiling', () => {
    expect(allowedRatings('safe')).toEqual(['safe']);
    expect(allowedRatings('erotica')).toEqual(['safe', 'suggestive', 'erotica']);
  });
});

describe('applyFilters', () => {
  it('drops ratings above the ceiling, unrated records and doujinshi by default', () => {
    expect(ids(applyFilters(candidates, DEFAULT_FILTERS))).toEqual(['1', '6']);
  });

  it('lets more through with a higher ceiling', () => {
    expect(
      ids(applyFilters(candidates, { maxContentRating: 'pornographic', excludeDoujinshi: true }))
    ).toEqual(['1', '2', '3', '6']);
  });

  it('keeps doujinshi when the filter is off', () => {
    expect(ids(applyFilters(candidates, { maxContentRating: 'safe', excludeDoujinshi: false }))).toEqual([
      '1',
      '4',
      '6',
    ]);
  });

  it('restricts to a single format', () => {
    expect(
      ids(applyFilters(candidates, { maxContentRating: 'erotica', excludeDoujinshi: true, format: 'manga' }))
    ).toEqual(['1', '3']);
  });
});
