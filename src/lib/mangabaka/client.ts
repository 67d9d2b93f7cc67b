/**
 * MangaBaka API V1 Client
 *
 * @see https://mangabaka.dev/api
 *
 * OPERATIONAL CONSTRAINTS:
 * - Rate limit: 60 req/min by default (configurable via requestsPerMinute).
 * - Respect Retry-After on 429; exponential backoff for 5xx and timeouts.
 * - Every response is wrapped in `{ status, message, data, pagination }` and
 *   the envelope status can disagree with the HTTP status.
 *
 * API KEY NOTE:
 * - Reads are public. When a key is configured it is sent as
 *   `Authorization: Bearer <key>` and never logged.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import PQueue from 'p-queue';
import { DEFAULT_API_URL, MANGABAKA_SOURCE, fixUrl } from '../config/env-validation';
import { logger } from '../logger';
import {
  MangaBakaEnvelopeSchema,
  RemoteRecordListSchema,
  RemoteRecordSchema,
  issuePath,
  type MangaBakaEnvelope,
  type RemoteRecord,
} from '../schemas/mangabaka';
import {
  ConfigurationError,
  NetworkError,
  NotFoundError,
  ParseError,
  RateLimitError,
  TalkerError,
} from '../talker-errors';

// ============================================================================
// Configuration Constants
// ============================================================================

const DEFAULT_REQUESTS_PER_MINUTE = 60;
const DEFAULT_TIMEOUT_MS = 20000;
const DEFAULT_MAX_RETRIES = 4;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 32000;
const MAX_RATE_LIMIT_WAIT_MS = 10000;
/** Seconds to wait on 429 when the provider sends no Retry-After */
const DEFAULT_RETRY_AFTER_SECONDS = 10;
const DEFAULT_PAGE_SIZE = 50;
/** A long-lived series used to probe the endpoint */
const STATUS_PROBE_ID = '10023';

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

// ============================================================================
// Type Definitions
// ============================================================================

export interface MangaBakaClientOptions {
  /** Base URL for API (default: https://api.mangabaka.dev/v1/) */
  baseUrl?: string;
  /** Optional API key, sent as a Bearer token */
  apiKey?: string;
  /** Talker version, reported in the User-Agent */
  version?: string;
  /** Requests per minute rate limit (default: 60) */
  requestsPerMinute?: number;
  /** Request timeout in milliseconds (default: 20000) */
  timeoutMs?: number;
  /** Maximum attempts per request (default: 4) */
  maxRetries?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  /** Longest Retry-After the client will sit out before raising RateLimitError (default: 10000) */
  maxRateLimitWaitMs?: number;
  /** Transport override; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
}

/**
 * Called before the client sleeps on a 429.
 * `waitSeconds` is the pause about to happen, `requestsPerMinute` the configured limit.
 */
export type RateLimitCallback = (waitSeconds: number, requestsPerMinute: number) => void;

export interface RequestOptions {
  signal?: AbortSignal;
  onRateLimit?: RateLimitCallback;
}

export interface SearchParams {
  page?: number;
  limit?: number;
  /** Sent as repeated `content_rating` params; empty means every rating */
  contentRatings?: readonly string[];
}

export interface PageInfo {
  count: number;
  page: number;
  limit: number;
  next: string | null;
}

export interface SearchPage {
  records: RemoteRecord[];
  pagination: PageInfo;
}

export interface StatusResult {
  message: string;
  ok: boolean;
}

/** Rate limit status information */
export interface RateLimitStatus {
  requestsPerMinute: number;
  queueSize: number;
  pending: number;
  isPaused: boolean;
}

/**
 * What the search orchestrator needs from a provider. Tests substitute fakes.
 */
export interface SeriesSource {
  searchSeries(title: string, params?: SearchParams, request?: RequestOptions): Promise<SearchPage>;
  fetchNextPage(url: string, request?: RequestOptions): Promise<SearchPage>;
  fetchSeries(id: string, request?: RequestOptions): Promise<RemoteRecord>;
}

interface FailedAttempt {
  status?: number;
  code?: string;
  retryAfterHeader?: unknown;
  message: string;
}

// ============================================================================
// MangaBaka Client
// ============================================================================

/**
 * MangaBaka API V1 client with rate limiting, retry logic and envelope validation.
 *
 * @example
 * ```typescript
 * const client = new MangaBakaClient({ version: '0.1.0' });
 * const page = await client.searchSeries('Naruto', { contentRatings: ['safe'] });
 * for (const record of page.records) {
 *   console.log(record.id, record.title);
 * }
 * ```
 */
export class MangaBakaClient implements SeriesSource {
  private readonly http: AxiosInstance;
  private readonly queue: PQueue;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly requestsPerMinute: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxRateLimitWaitMs: number;
  private readonly timeoutMs: number;
  private requestCount = 0;

  constructor(options: MangaBakaClientOptions = {}) {
    const {
      baseUrl = DEFAULT_API_URL,
      apiKey,
      version = '0.0.0',
      requestsPerMinute = DEFAULT_REQUESTS_PER_MINUTE,
      timeoutMs = DEFAULT_TIMEOUT_MS,
      maxRetries = DEFAULT_MAX_RETRIES,
      initialBackoffMs = INITIAL_BACKOFF_MS,
      maxBackoffMs = MAX_BACKOFF_MS,
      maxRateLimitWaitMs = MAX_RATE_LIMIT_WAIT_MS,
      adapter,
    } = options;

    this.baseUrl = fixUrl(baseUrl) || DEFAULT_API_URL;
    this.requestsPerMinute = requestsPerMinute;
    this.maxRetries = Math.max(1, maxRetries);
    this.initialBackoffMs = initialBackoffMs;
    this.maxBackoffMs = maxBackoffMs;
    this.maxRateLimitWaitMs = maxRateLimitWaitMs;
    this.timeoutMs = timeoutMs;

    // intervalCap requests per 60s window
    this.queue = new PQueue({
      intervalCap: requestsPerMinute,
      interval: 60000,
      carryoverConcurrencyCount: true,
    });

    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: timeoutMs,
      adapter,
      headers: {
        Accept: 'application/json',
        'User-Agent': `mangabaka-talker/${version}`,
        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
      },
      paramsSerializer: { indexes: null },
    });
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * Exponential backoff with jitter, capped at maxBackoffMs.
   */
  private calculateBackoff(attempt: number): number {
    const exponential = this.initialBackoffMs * Math.pow(2, attempt);
    const jitter = Math.random() * this.initialBackoffMs;
    return Math.min(exponential + jitter, this.maxBackoffMs);
  }

  private abortError(): NetworkError {
    return new NetworkError(MANGABAKA_SOURCE, `${MANGABAKA_SOURCE} request aborted`, true);
  }

  /**
   * Sleep for `ms`, rejecting early when the caller aborts.
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(this.abortError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(this.abortError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private parseRetryAfter(header: unknown): number {
    const seconds = typeof header === 'string' || typeof header === 'number' ? Number(header) : Number.NaN;
    return Number.isFinite(seconds) && seconds >= 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
  }

  private parseEnvelope(body: unknown): MangaBakaEnvelope {
    const parsed = MangaBakaEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      const field = issuePath(parsed.error);
      throw new ParseError(MANGABAKA_SOURCE, field, `${MANGABAKA_SOURCE} returned a malformed response at "${field}"`);
    }
    return parsed.data;
  }

  /**
   * Run one GET with retry logic, rate limiting and error classification.
   * Each attempt goes through the p-queue, so retries count against the limit.
   */
  private async executeWithRetry(
    url: string,
    config: AxiosRequestConfig,
    request: RequestOptions = {}
  ): Promise<MangaBakaEnvelope> {
    const { signal, onRateLimit } = request;
    let lastError: TalkerError | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (signal?.aborted) throw this.abortError();

      let failure: FailedAttempt;
      try {
        logger.debug(`[MangaBaka] GET ${url}`, { params: config.params, attempt: attempt + 1 });
        const response = await this.queue.add(() => {
          this.requestCount++;
          return this.http.get<unknown>(url, { ...config, signal });
        });

        const envelope = this.parseEnvelope(response.data);
        if (envelope.status === 200) return envelope;

        failure = {
          status: envelope.status,
          retryAfterHeader: response.headers['retry-after'],
          message: envelope.message ?? `status ${envelope.status}`,
        };
      } catch (error: unknown) {
        if (error instanceof TalkerError) throw error;
        if (axios.isCancel(error)) throw this.abortError();
        if (!axios.isAxiosError(error)) throw error;

        failure = {
          status: error.response?.status,
          code: error.code,
          retryAfterHeader: error.response?.headers['retry-after'],
          message: error.message,
        };
      }

      const { status } = failure;
      const isLastAttempt = attempt === this.maxRetries - 1;

      // Handle 404 - Not Found (don't retry)
      if (status === 404) {
        throw new NotFoundError(MANGABAKA_SOURCE, `${MANGABAKA_SOURCE} resource not found: ${url}`);
      }

      // Handle 401/403 - credential rejected
      if (status === 401 || status === 403) {
        throw new ConfigurationError(
          MANGABAKA_SOURCE,
          `${MANGABAKA_SOURCE} rejected the request (${status}); check the API key`
        );
      }

      // Handle 429 - Rate Limit
      if (status === 429) {
        const retryAfter = this.parseRetryAfter(failure.retryAfterHeader);
        const waitMs = retryAfter * 1000;

        if (isLastAttempt || waitMs > this.maxRateLimitWaitMs) {
          logger.warn(`[MangaBaka] Rate limited; giving up after ${attempt + 1} attempt(s)`, { retryAfter });
          throw new RateLimitError(MANGABAKA_SOURCE, retryAfter);
        }

        logger.warn(
          `[MangaBaka] Rate limited. Waiting ${retryAfter}s (attempt ${attempt + 1}/${this.maxRetries})`
        );
        onRateLimit?.(retryAfter, this.requestsPerMinute);
        await this.sleep(waitMs, signal);
        continue;
      }

      // Handle 5xx - Server Errors (retry with backoff)
      if (status !== undefined && RETRYABLE_STATUSES.has(status)) {
        lastError = new NetworkError(
          MANGABAKA_SOURCE,
          `${MANGABAKA_SOURCE} server error ${status} after ${attempt + 1} attempt(s)`,
          false,
          status
        );
      } else if (status !== undefined && status >= 400) {
        // Other client/server errors are not retried
        throw new TalkerError(
          `${MANGABAKA_SOURCE} API error: ${status} - ${failure.message}`,
          MANGABAKA_SOURCE,
          'API',
          false,
          status
        );
      } else if (failure.code !== undefined && TIMEOUT_CODES.has(failure.code)) {
        lastError = new NetworkError(MANGABAKA_SOURCE, `Request timeout after ${this.timeoutMs}ms`, true);
      } else {
        lastError = new NetworkError(MANGABAKA_SOURCE, `Network error: ${failure.message}`);
      }

      if (!isLastAttempt) {
        const backoff = this.calculateBackoff(attempt);
        logger.warn(
          `[MangaBaka] ${lastError.message}. Retrying in ${Math.round(backoff)}ms (attempt ${attempt + 1}/${this.maxRetries})`
        );
        await this.sleep(backoff, signal);
      }
    }

    throw lastError ?? new NetworkError(MANGABAKA_SOURCE, 'Unexpected retry loop exit');
  }

  private toSearchPage(envelope: MangaBakaEnvelope, fallback: { page: number; limit: number }): SearchPage {
    const parsed = RemoteRecordListSchema.safeParse(envelope.data ?? []);
    if (!parsed.success) {
      throw new ParseError(MANGABAKA_SOURCE, issuePath(parsed.error, 'data'));
    }

    const pagination = envelope.pagination;
    return {
      records: parsed.data,
      pagination: {
        count: pagination?.count ?? parsed.data.length,
        page: pagination?.page ?? fallback.page,
        limit: pagination?.limit ?? fallback.limit,
        next: pagination?.next || null,
      },
    };
  }

  // ==========================================================================
  // Public API Methods
  // ==========================================================================

  /**
   * Search series by title.
   *
   * @example
   * ```typescript
   * const page = await client.searchSeries('One Piece', { page: 1, limit: 50 });
   * ```
   */
  async searchSeries(title: string, params: SearchParams = {}, request?: RequestOptions): Promise<SearchPage> {
    const { page = 1, limit = DEFAULT_PAGE_SIZE, contentRatings = [] } = params;

    const envelope = await this.executeWithRetry(
      'series/search',
      {
        params: {
          q: title,
          ...(contentRatings.length > 0 ? { content_rating: [...contentRatings] } : {}),
          page,
          limit,
        },
      },
      request
    );

    return this.toSearchPage(envelope, { page, limit });
  }

  /**
   * Follow a `pagination.next` link. The link must point at the configured API.
   *
   * @throws {ParseError} when the link is not a URL on the configured host
   */
  async fetchNextPage(url: string, request?: RequestOptions): Promise<SearchPage> {
    let next: URL;
    try {
      next = new URL(url, this.baseUrl);
    } catch (error: unknown) {
      throw new ParseError(
        MANGABAKA_SOURCE,
        'pagination.next',
        `Invalid pagination link "${url}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (next.origin !== new URL(this.baseUrl).origin) {
      throw new ParseError(MANGABAKA_SOURCE, 'pagination.next', `Pagination link leaves the API host: ${next.origin}`);
    }

    const envelope = await this.executeWithRetry(next.toString(), {}, request);
    const page = Number(next.searchParams.get('page') ?? '1');
    const limit = Number(next.searchParams.get('limit') ?? String(DEFAULT_PAGE_SIZE));
    return this.toSearchPage(envelope, {
      page: Number.isInteger(page) && page > 0 ? page : 1,
      limit: Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_PAGE_SIZE,
    });
  }

  /**
   * Fetch one series record by id.
   *
   * @throws {NotFoundError} If the series does not exist
   */
  async fetchSeries(id: string, request?: RequestOptions): Promise<RemoteRecord> {
    const envelope = await this.executeWithRetry(`series/${encodeURIComponent(id)}`, {}, request);

    const parsed = RemoteRecordSchema.safeParse(envelope.data);
    if (!parsed.success) {
      throw new ParseError(MANGABAKA_SOURCE, issuePath(parsed.error, 'data'));
    }
    return parsed.data;
  }

  /**
   * Probe a known series to confirm the URL answers like a MangaBaka API.
   * Never throws; the outcome is reported in the result.
   */
  async checkStatus(): Promise<StatusResult> {
    try {
      await this.fetchSeries(STATUS_PROBE_ID);
      return { message: 'The URL is valid', ok: true };
    } catch (error: unknown) {
      logger.warn(`[MangaBaka] Status check failed`, {
        baseUrl: this.baseUrl,
        error: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof NetworkError) {
        return { message: 'Failed to connect to the URL!', ok: false };
      }
      return { message: 'The URL is INVALID!', ok: false };
    }
  }

  /**
   * Get current rate limit status and queue information.
   */
  getRateLimitStatus(): RateLimitStatus {
    return {
      requestsPerMinute: this.requestsPerMinute,
      queueSize: this.queue.size,
      pending: this.queue.pending,
      isPaused: this.queue.isPaused,
    };
  }

  /** Number of HTTP attempts made by this client, retries included. */
  getRequestCount(): number {
    return this.requestCount;
  }
}
