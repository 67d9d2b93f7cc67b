/**
 * MangaBaka API V1 provider.
 *
 * The client handles transport (rate limiting, retries, envelope checks), the
 * normalizer turns raw series JSON into CanonicalMetadata, and the cache keeps
 * raw records for the lifetime of one talker.
 */

export {
  MangaBakaClient,
  type MangaBakaClientOptions,
  type RateLimitCallback,
  type RateLimitStatus,
  type RequestOptions,
  type SearchPage,
  type SearchParams,
  type PageInfo,
  type SeriesSource,
  type StatusResult,
} from './client';

export { normalizeSeries, normalizeSeriesList, parseCount, MANGABAKA_ID, type NormalizedBatch } from './normalize';

export {
  InMemoryCache,
  SeriesRecordCache,
  CACHE_TTL,
  seriesCacheKey,
  searchCacheKey,
  type CacheInterface,
} from './cache';
