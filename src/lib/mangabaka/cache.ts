/**
 * MangaBaka Cache Layer
 *
 * TTL cache for raw provider records, scoped to one talker instance and to the
 * lifetime of the process. Nothing is written to disk.
 *
 * CACHE TTLs:
 * - Series records: 24 hours
 * - Search results: 1 hour
 */

import type { RemoteRecord } from '../schemas/mangabaka';

const DEFAULT_TTL_SECONDS = 86400;
const DEFAULT_MAX_ENTRIES = 500;

// ============================================================================
// Cache Interface
// ============================================================================

export interface CacheInterface {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  has(key: string): Promise<boolean>;
  clear(): Promise<void>;
}

// ============================================================================
// In-Memory Cache
// ============================================================================

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface InMemoryCacheOptions {
  /** Oldest entries are evicted past this size (default: 500) */
  maxEntries?: number;
  /** Clock override for tests */
  now?: () => number;
}

/**
 * Expired entries are dropped lazily on read, so no timer keeps the process
 * alive after the host is done with the talker.
 */
export class InMemoryCache implements CacheInterface {
  private readonly cache = new Map<string, CacheEntry<unknown>>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: InMemoryCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  private read(key: string): CacheEntry<unknown> | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry;
  }

  async get<T>(key: string): Promise<T | null> {
    const entry = this.read(key);
    return entry ? (entry.value as T) : null;
  }

  async set<T>(key: string, value: T, ttlSeconds: number = DEFAULT_TTL_SECONDS): Promise<void> {
    // re-insert so Map order tracks recency of writes
    this.cache.delete(key);
    this.cache.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });

    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// ============================================================================
// Typed accessors
// ============================================================================

export const CACHE_TTL = {
  /** Series records - 24 hours */
  SERIES: 86400,
  /** Search results - 1 hour */
  SEARCH: 3600,
} as const;

export function seriesCacheKey(seriesId: string): string {
  return `series:${seriesId}`;
}

export function searchCacheKey(query: string): string {
  return `search:${encodeURIComponent(query.trim().toLowerCase())}`;
}

/**
 * Record-level view over a CacheInterface, so callers never juggle key formats
 * or generic parameters.
 */
export class SeriesRecordCache {
  constructor(private readonly backend: CacheInterface = new InMemoryCache()) {}

  getSeries(seriesId: string): Promise<RemoteRecord | null> {
    return this.backend.get<RemoteRecord>(seriesCacheKey(seriesId));
  }

  setSeries(seriesId: string, record: RemoteRecord): Promise<void> {
    return this.backend.set(seriesCacheKey(seriesId), record, CACHE_TTL.SERIES);
  }

  getSearch(query: string): Promise<RemoteRecord[] | null> {
    return this.backend.get<RemoteRecord[]>(searchCacheKey(query));
  }

  setSearch(query: string, records: RemoteRecord[]): Promise<void> {
    return this.backend.set(searchCacheKey(query), records, CACHE_TTL.SEARCH);
  }

  clear(): Promise<void> {
    return this.backend.clear();
  }
}
