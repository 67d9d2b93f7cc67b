import { normalizeSeries, normalizeSeriesList, parseCount } from '@/lib/mangabaka/normalize';
import { ParseError } from '@/lib/talker-errors';
import { seriesRecord } from '../helpers/fixtures';

describe('normalizeSeries', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps a complete record', () => {
    const series = normalizeSeries(
      seriesRecord({
        id: 77,
        title: 'Naruto',
        native_title: 'ナルト',
        romanized_title: 'Naruto',
        secondary_titles: {
          en: [{ title: 'Naruto: The Series' }],
          es: [{ title: 'Naruto el Ninja' }, { title: 'Naruto: The Series' }],
          fr: null,
        },
        source: { anilist: { id: 30011, rating: 80 }, kitsu: { id: null, rating: null } },
      })
    );

    expect(series.id).toBe('77');
    expect(series.source).toEqual({ id: 'mangabaka', name: 'MangaBaka' });
    expect(series.title).toBe('Naruto');
    expect(series.nativeTitle).toBe('ナルト');
    expect(series.alternateTitles).toEqual(['ナルト', 'Naruto: The Series', 'Naruto el Ninja']);
    expect(series.credits).toEqual([
      { name: 'Author One', role: 'Writer' },
      { name: 'Artist One', role: 'Artist' },
    ]);
    expect(series.publishers).toEqual([
      { name: 'Origin Press', kind: 'original', note: '' },
      { name: 'English House', kind: 'english', note: '' },
    ]);
    expect(series.format).toBe('manga');
    expect(series.status).toBe('completed');
    expect(series.contentRating).toBe('safe');
    expect(series.state).toBe('active');
    expect(series.releaseYear).toEqual({ kind: 'known', value: 2001 });
    expect(series.volumeCount).toEqual({ kind: 'known', value: 10 });
    expect(series.chapterCount).toEqual({ kind: 'known', value: 95 });
    expect(series.rating).toEqual({ kind: 'known', value: 8 });
    expect(series.lastUpdated).toEqual({ kind: 'known', value: '2024-01-01T00:00:00Z' });
    expect(series.mergedInto).toEqual({ kind: 'unknown' });
    expect(series.cover).toEqual({
      url: 'https://cdn.example.test/covers/1.jpg',
      thumbnailUrl: 'https://cdn.example.test/covers/1.jpg',
    });
    expect(series.identifiers).toEqual({ anilist: '30011', mangabaka: '77' });
  });

  it('fills documented defaults for a minimal record', () => {
    const series = normalizeSeries({ id: '5', title: 'Bare' });

    expect(series).toMatchObject({
      id: '5',
      nativeTitle: '',
      romanizedTitle: '',
      alternateTitles: [],
      description: '',
      publishers: [],
      credits: [],
      genres: [],
      tags: [],
      links: [],
      format: 'unknown',
      status: 'unknown',
      contentRating: 'unknown',
      state: 'unknown',
      cover: { url: '', thumbnailUrl: '' },
      identifiers: { mangabaka: '5' },
    });
    expect(series.releaseYear).toEqual({ kind: 'unknown' });
    expect(series.volumeCount).toEqual({ kind: 'unknown' });
    expect(series.rating).toEqual({ kind: 'unknown' });
    expect(series.lastUpdated).toEqual({ kind: 'unknown' });
  });

  it('maps unrecognized enums to unknown or other', () => {
    const series = normalizeSeries(
      seriesRecord({ type: 'webcomic', status: 'abandoned', content_rating: 'adult', state: 'archived' })
    );

    expect(series.format).toBe('other');
    expect(series.status).toBe('unknown');
    expect(series.contentRating).toBe('unknown');
    expect(series.state).toBe('unknown');
  });

  it('turns unparseable counts into unknown instead of failing', () => {
    const series = normalizeSeries(seriesRecord({ final_volume: 'TBD', final_chapter: null, total_chapters: 700 }));

    expect(series.volumeCount).toEqual({ kind: 'unknown' });
    expect(series.chapterCount).toEqual({ kind: 'known', value: 700 });
  });

  it('records the merge target only for merged records', () => {
    expect(normalizeSeries(seriesRecord({ state: 'merged', merged_with: 12 })).mergedInto).toEqual({
      kind: 'known',
      value: '12',
    });
    expect(normalizeSeries(seriesRecord({ state: 'active', merged_with: 12 })).mergedInto).toEqual({
      kind: 'unknown',
    });
  });

  it('drops links that are not http(s) URLs', () => {
    const series = normalizeSeries(
      seriesRecord({ links: ['https://a.example.test/1', 'ftp://b.example.test', 'not a url'] })
    );

    expect(series.links).toEqual(['https://a.example.test/1']);
  });

  it('prefers the default cover and the small image as thumbnail', () => {
    const series = normalizeSeries(
      seriesRecord({ cover: { raw: 'https://x.test/raw.png', default: null, small: 'https://x.test/s.png' } })
    );

    expect(series.cover).toEqual({ url: 'https://x.test/raw.png', thumbnailUrl: 'https://x.test/s.png' });
  });

  it('throws ParseError naming a missing title', () => {
    const error = (() => {
      try {
        normalizeSeries({ id: 1 });
        return null;
      } catch (e: unknown) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ field: 'title' });
  });

  it('rejects a title that is only whitespace', () => {
    expect(() => normalizeSeries(seriesRecord({ title: '   ' }))).toThrow(ParseError);
    expect(() => normalizeSeries(seriesRecord({ title: '   ' }))).toThrow('Invalid MangaBaka series at "title"');
  });

  it('throws ParseError with the dotted path of a wrongly typed nested field', () => {
    expect(() => normalizeSeries(seriesRecord({ cover: { default: 5 } }))).toThrow(
      'Invalid MangaBaka series at "cover.default"'
    );
  });

  it('rejects non-numeric ids', () => {
    expect(() => normalizeSeries(seriesRecord({ id: 'abc' }))).toThrow(ParseError);
  });

  it('strips unknown provider fields', () => {
    const series = normalizeSeries(seriesRecord({ brand_new_field: { nested: true } }));

    expect(series).not.toHaveProperty('brand_new_field');
  });
});

describe('normalizeSeriesList', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('skips malformed records and reports them', () => {
    const { items, rejected } = normalizeSeriesList([
      seriesRecord({ id: 1 }),
      { id: 2 },
      seriesRecord({ id: 3, title: 'Third' }),
    ]);

    expect(items.map((item) => item.id)).toEqual(['1', '3']);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].field).toBe('title');
  });
});

describe('parseCount', () => {
  it.each([
    [12, 12],
    ['12', 12],
    ['12.5', 12],
    [' 7 ', 7],
  ])('parses %p as %p', (input, expected) => {
    expect(parseCount(input)).toEqual({ kind: 'known', value: expected });
  });

  it.each([null, undefined, '', 'n/a', -1])('treats %p as unknown', (input) => {
    expect(parseCount(input)).toEqual({ kind: 'unknown' });
  });
});
