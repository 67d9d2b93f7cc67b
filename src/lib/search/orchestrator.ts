/**
 * Search Orchestrator
 *
 * Turns a SearchQuery into a ranked candidate list:
 * 1. title search (paginated) and identifier lookup run concurrently, each
 *    remote call under its own deadline
 * 2. raw records are normalized; malformed ones are skipped
 * 3. filters apply to title-search results, then dedupe by id and rank
 *
 * Failures of one source are contained while the other yields candidates.
 * ConfigurationError always propagates.
 */

import { MANGABAKA_SOURCE } from '../config/env-validation';
import { logger } from '../logger';
import { SeriesRecordCache } from '../mangabaka/cache';
import type { RateLimitCallback, SearchPage, SeriesSource } from '../mangabaka/client';
import { normalizeSeries, normalizeSeriesList } from '../mangabaka/normalize';
import { CONTENT_RATINGS, type CanonicalMetadata, type SearchQuery } from '../metadata/types';
import type { RemoteRecord } from '../schemas/mangabaka';
import {
  ConfigurationError,
  NotFoundError,
  RateLimitError,
  TalkerError,
  describeError,
} from '../talker-errors';
import { withDeadline } from './deadline';
import { applyFilters, type CandidateFilters } from './filters';
import { rankCandidates, titlesMatch } from './ranking';

// ============================================================================
// Configuration
// ============================================================================

const DEFAULT_CALL_TIMEOUT_MS = 30000;
const DEFAULT_MATCH_THRESHOLD = 90;
/** Pagination follows `next` while the current page is below this number */
const PAGE_CEILING = 6;
const DEFAULT_PAGE_SIZE = 50;

export interface SearchOrchestratorOptions {
  source: SeriesSource;
  cache?: SeriesRecordCache;
  /** Deadline per remote call (default: 30000) */
  callTimeoutMs?: number;
  /** Percent similarity every record on a page needs to keep paginating (default: 90) */
  matchThreshold?: number;
  pageSize?: number;
}

export interface SearchOptions {
  /** Applied to title-search results only; omitted means no filtering */
  filters?: CandidateFilters;
  /** Bypass cached results (fresh results are still cached) */
  refreshCache?: boolean;
  onRateLimit?: RateLimitCallback;
  /** Overrides the orchestrator's pagination match threshold for this search */
  matchThreshold?: number;
  /** Called after each result page with (records so far, total reported) */
  onProgress?: (current: number, total: number) => void;
  signal?: AbortSignal;
}

export type FetchOptions = Pick<SearchOptions, 'refreshCache' | 'onRateLimit' | 'signal'>;

interface TitleSearchResult {
  records: RemoteRecord[];
  /** Failure that cut pagination short, if any */
  error?: TalkerError;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SearchOrchestrator {
  private readonly source: SeriesSource;
  private readonly cache: SeriesRecordCache;
  private readonly callTimeoutMs: number;
  private readonly matchThreshold: number;
  private readonly pageSize: number;

  constructor(options: SearchOrchestratorOptions) {
    this.source = options.source;
    this.cache = options.cache ?? new SeriesRecordCache();
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.matchThreshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * Search by title and/or identifier.
   *
   * @returns ranked candidates, possibly empty
   * @throws {ConfigurationError} immediately when any source reports one
   * @throws {TalkerError} when nothing was found and a source failed;
   *   a RateLimitError is preferred over other failures
   */
  async search(query: SearchQuery, options: SearchOptions = {}): Promise<CanonicalMetadata[]> {
    const title = query.title.trim();
    if (!title && !query.identifier) {
      logger.debug('[Search] Empty query, skipping remote calls');
      return [];
    }

    const [byTitle, byId] = await Promise.allSettled([
      title ? this.searchByTitle(query, options) : Promise.resolve<TitleSearchResult>({ records: [] }),
      query.identifier ? this.lookupIdentifier(query.identifier, options) : Promise.resolve([]),
    ]);

    const failures: TalkerError[] = [];
    const collect = (reason: unknown) => {
      if (reason instanceof ConfigurationError) throw reason;
      if (!(reason instanceof TalkerError)) throw reason;
      // A missing search route or page is an empty result, not a failure
      if (reason instanceof NotFoundError) {
        logger.debug('[Search] Source answered not found', { query: query.title, error: reason.message });
        return;
      }
      failures.push(reason);
    };

    let titleCandidates: CanonicalMetadata[] = [];
    if (byTitle.status === 'fulfilled') {
      if (byTitle.value.error) collect(byTitle.value.error);
      const { items } = normalizeSeriesList(byTitle.value.records);
      titleCandidates = options.filters ? applyFilters(items, options.filters) : items;
    } else {
      collect(byTitle.reason);
    }

    let idCandidates: CanonicalMetadata[] = [];
    if (byId.status === 'fulfilled') {
      idCandidates = byId.value;
    } else {
      collect(byId.reason);
    }

    const seen = new Set<string>();
    const merged: CanonicalMetadata[] = [];
    for (const candidate of [...idCandidates, ...titleCandidates]) {
      if (seen.has(candidate.id)) continue;
      seen.add(candidate.id);
      merged.push(candidate);
    }

    if (merged.length === 0 && failures.length > 0) {
      throw failures.find((failure) => failure instanceof RateLimitError) ?? failures[0];
    }

    for (const failure of failures) {
      logger.warn('[Search] Source failed; returning partial results', {
        query: query.title,
        code: failure.code,
        error: failure.message,
      });
    }

    return rankCandidates(query, merged);
  }

  /**
   * Fetch one series by id.
   *
   * Merged records are followed once to their target; deleted or missing
   * records resolve to null.
   */
  async fetchById(id: string, options: FetchOptions = {}): Promise<CanonicalMetadata | null> {
    const series = await this.resolveSeries(id, options);
    if (!series) return null;

    if (series.state === 'merged' && series.mergedInto.kind === 'known' && series.mergedInto.value !== id) {
      logger.info(`[Search] Series ${id} was merged into ${series.mergedInto.value}; following`);
      return this.resolveSeries(series.mergedInto.value, options);
    }

    return series;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private call<T>(task: (signal: AbortSignal) => Promise<T>, options: SearchOptions): Promise<T> {
    return withDeadline(task, this.callTimeoutMs, options.signal);
  }

  private async resolveSeries(id: string, options: FetchOptions): Promise<CanonicalMetadata | null> {
    const record = await this.loadRecord(id, options);
    if (!record) return null;

    const series = normalizeSeries(record);
    if (series.state === 'deleted') {
      logger.info(`[Search] Series ${id} was deleted upstream`);
      return null;
    }
    return series;
  }

  private async loadRecord(id: string, options: FetchOptions): Promise<RemoteRecord | null> {
    if (!options.refreshCache) {
      const cached = await this.cache.getSeries(id);
      if (cached) return cached;
    }

    try {
      const record = await this.call(
        (signal) => this.source.fetchSeries(id, { signal, onRateLimit: options.onRateLimit }),
        options
      );
      await this.cache.setSeries(id, record);
      return record;
    } catch (error: unknown) {
      if (error instanceof NotFoundError) {
        logger.debug(`[Search] Series ${id} not found`);
        return null;
      }
      throw error;
    }
  }

  private async lookupIdentifier(id: string, options: SearchOptions): Promise<CanonicalMetadata[]> {
    const series = await this.fetchById(id, options);
    return series ? [series] : [];
  }

  private async searchByTitle(query: SearchQuery, options: SearchOptions): Promise<TitleSearchResult> {
    const title = query.title.trim();
    const useCache = !options.refreshCache && !query.literal;

    if (useCache) {
      const cached = await this.cache.getSearch(title);
      if (cached) {
        logger.debug(`[Search] Cache hit for "${title}"`, { count: cached.length });
        return { records: cached };
      }
    }

    const request = { onRateLimit: options.onRateLimit };
    let page: SearchPage = await this.call(
      (signal) =>
        this.source.searchSeries(
          title,
          { page: 1, limit: this.pageSize, contentRatings: CONTENT_RATINGS },
          { ...request, signal }
        ),
      options
    );

    const records = [...page.records];
    options.onProgress?.(records.length, page.pagination.count);
    logger.debug(`[Search] ${MANGABAKA_SOURCE} page ${page.pagination.page}`, {
      query: title,
      received: records.length,
      total: page.pagination.count,
    });

    while (page.pagination.next && page.pagination.page < PAGE_CEILING) {
      if (!query.literal && this.hasPoorMatch(title, page.records, options.matchThreshold)) break;

      const next = page.pagination.next;
      try {
        page = await this.call((signal) => this.source.fetchNextPage(next, { ...request, signal }), options);
      } catch (error: unknown) {
        if (error instanceof ConfigurationError || !(error instanceof TalkerError)) throw error;
        // keep what we have; partial pages are not cached
        logger.warn(`[Search] Pagination stopped early: ${describeError(error)}`, { query: title });
        return { records, error };
      }

      records.push(...page.records);
      options.onProgress?.(records.length, page.pagination.count);
    }

    await this.cache.setSearch(title, records);
    for (const record of records) {
      const id = record.id;
      if (typeof id === 'number' || typeof id === 'string') {
        await this.cache.setSeries(String(id), record);
      }
    }

    return { records };
  }

  /** True when any record's title falls below the match threshold. */
  private hasPoorMatch(title: string, records: readonly RemoteRecord[], threshold = this.matchThreshold): boolean {
    return records.some((record) => {
      const candidate = typeof record.title === 'string' ? record.title : '';
      return !titlesMatch(title, candidate, threshold);
    });
  }
}
