/**
 * MangaBaka Cache Unit Tests
 * Tests: TTL behavior, eviction, cache key generation
 */

import {
  CACHE_TTL,
  InMemoryCache,
  SeriesRecordCache,
  searchCacheKey,
  seriesCacheKey,
} from '@/lib/mangabaka/cache';

describe('InMemoryCache', () => {
  let now: number;
  let cache: InMemoryCache;

  beforeEach(() => {
    now = 1_000_000;
    cache = new InMemoryCache({ now: () => now });
  });

  it('stores and retrieves values within TTL', async () => {
    await cache.set('series:123', { id: 123, title: 'Test Manga' }, 3600);

    now += 3599 * 1000;

    expect(await cache.get('series:123')).toEqual({ id: 123, title: 'Test Manga' });
    expect(await cache.has('series:123')).toBe(true);
  });

  it('expires values after TTL', async () => {
    await cache.set('series:123', { id: 123 }, 60);

    now += 61 * 1000;

    expect(await cache.get('series:123')).toBeNull();
    expect(await cache.has('series:123')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('evicts the oldest entry past maxEntries', async () => {
    const small = new InMemoryCache({ maxEntries: 2, now: () => now });
    await small.set('a', 1);
    await small.set('b', 2);
    await small.set('c', 3);

    expect(await small.get('a')).toBeNull();
    expect(await small.get('b')).toBe(2);
    expect(await small.get('c')).toBe(3);
  });

  it('treats a rewrite as the newest entry', async () => {
    const small = new InMemoryCache({ maxEntries: 2, now: () => now });
    await small.set('a', 1);
    await small.set('b', 2);
    await small.set('a', 10);
    await small.set('c', 3);

    expect(await small.get('a')).toBe(10);
    expect(await small.get('b')).toBeNull();
  });

  it('deletes and clears entries', async () => {
    await cache.set('a', 1);
    await cache.set('b', 2);

    expect(await cache.delete('a')).toBe(true);
    expect(await cache.delete('a')).toBe(false);

    await cache.clear();
    expect(cache.size).toBe(0);
  });
});

describe('cache keys', () => {
  it('namespaces series ids', () => {
    expect(seriesCacheKey('42')).toBe('series:42');
  });

  it('normalizes case and surrounding space of search queries', () => {
    expect(searchCacheKey('  One Piece ')).toBe('search:one%20piece');
    expect(searchCacheKey('ONE PIECE')).toBe(searchCacheKey('one piece'));
  });
});

describe('SeriesRecordCache', () => {
  it('keeps series and search results apart', async () => {
    const backend = new InMemoryCache();
    const setSpy = jest.spyOn(backend, 'set');
    const cache = new SeriesRecordCache(backend);

    await cache.setSeries('1', { id: 1, title: 'One' });
    await cache.setSearch('one', [{ id: 1, title: 'One' }]);

    expect(await cache.getSeries('1')).toEqual({ id: 1, title: 'One' });
    expect(await cache.getSearch('ONE')).toEqual([{ id: 1, title: 'One' }]);
    expect(await cache.getSeries('one')).toBeNull();
    expect(setSpy).toHaveBeenCalledWith('series:1', { id: 1, title: 'One' }, CACHE_TTL.SERIES);
    expect(setSpy).toHaveBeenCalledWith('search:one', [{ id: 1, title: 'One' }], CACHE_TTL.SEARCH);
  });
});
