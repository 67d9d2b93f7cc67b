/**
 * MangaBaka talker: the host-facing adapter.
 *
 * Validates host arguments, applies settings, delegates to the search
 * orchestrator and maps canonical records into host types. Internal errors are
 * translated into host errors here and nowhere else.
 */

import {
  MANGABAKA_SOURCE,
  readEnvOverrides,
  resolveApiUrl,
  type EnvOverrides,
} from '../config/env-validation';
import { logger } from '../logger';
import { SeriesRecordCache } from '../mangabaka/cache';
import { MangaBakaClient, type MangaBakaClientOptions } from '../mangabaka/client';
import { MANGABAKA_ID } from '../mangabaka/normalize';
import type { CanonicalMetadata } from '../metadata/types';
import { buildSearchQuery } from '../search/query';
import { SearchOrchestrator, type SearchOrchestratorOptions } from '../search/orchestrator';
import {
  ConfigurationError,
  NetworkError,
  NotFoundError,
  ParseError,
  RateLimitError,
  TalkerError,
  describeError,
} from '../talker-errors';
import {
  HostDataError,
  HostErrorCode,
  HostNetworkError,
  HostTalkerError,
  TALKER_API_VERSION,
  emptyMetadata,
  type ComicDataRequest,
  type ComicSeries,
  type ComicTalker,
  type GenericMetadata,
  type RateLimitCallback,
  type RawSettings,
  type SeriesSearchOptions,
  type SettingDefinition,
  type StatusReport,
} from './contract';
import { toComicSeries, toGenericMetadata } from './mapping';
import {
  DEFAULT_SETTINGS,
  parseTalkerSettings,
  settingDefinitions,
  toCandidateFilters,
  toRawSettings,
  type TalkerSettings,
} from './settings';

const WEBSITE = 'https://mangabaka.dev';
const SERIES_ID = /^\d+$/;

export interface MangaBakaTalkerOptions {
  /** Talker version, reported in the User-Agent */
  version?: string;
  /** Environment to read MANGABAKA_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Extra client options; tests pass an in-process adapter and short backoffs */
  client?: Omit<MangaBakaClientOptions, 'baseUrl' | 'apiKey' | 'version'>;
  /** Orchestrator tuning */
  search?: Omit<SearchOrchestratorOptions, 'source' | 'cache'>;
}

/**
 * Translate an internal error into the host's error types.
 * NotFoundError is handled as an empty result before reaching here: the
 * orchestrator drops it from search failures and lookups resolve it to null.
 */
export function toHostError(error: unknown): HostTalkerError {
  if (error instanceof HostTalkerError) return error;

  if (error instanceof RateLimitError) {
    return new HostNetworkError(error.source, HostErrorCode.RATE_LIMIT, error.message, error.retryAfter);
  }
  if (error instanceof NetworkError) {
    return new HostNetworkError(
      error.source,
      error.timedOut ? HostErrorCode.TIMEOUT : HostErrorCode.NETWORK,
      error.message
    );
  }
  if (error instanceof ParseError) {
    return new HostDataError(error.source, HostErrorCode.DATA, error.message);
  }
  if (error instanceof ConfigurationError) {
    return new HostTalkerError(error.source, HostErrorCode.UNKNOWN, error.message);
  }
  if (error instanceof TalkerError) {
    return new HostNetworkError(error.source, HostErrorCode.OTHER, error.message);
  }

  logger.error(`[MangaBaka] Unexpected error`, { error: describeError(error) });
  return new HostTalkerError(MANGABAKA_SOURCE, HostErrorCode.OTHER, describeError(error));
}

function translating<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error: unknown) {
    throw toHostError(error);
  }
}

export class MangaBakaTalker implements ComicTalker {
  readonly apiVersion = TALKER_API_VERSION;
  readonly id = MANGABAKA_ID;
  readonly name = MANGABAKA_SOURCE;
  readonly website = WEBSITE;
  readonly logoUrl = `${WEBSITE}/images/logo.png`;
  readonly attribution = `Metadata provided by <a href='${WEBSITE}'>${MANGABAKA_SOURCE}</a>`;
  readonly about =
    `<a href='${WEBSITE}'>${MANGABAKA_SOURCE}</a> collates and cleanses the data from multiple sources: ` +
    'AniList, Kitsu, MangaDex, MangaUpdates, MyAnimeList and Anime News Network.';
  readonly minHostVersion = '1.6.0b7';

  private readonly version: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly options: MangaBakaTalkerOptions;
  private readonly cache = new SeriesRecordCache();
  private settings: TalkerSettings = DEFAULT_SETTINGS;
  private client: MangaBakaClient;
  private orchestrator: SearchOrchestrator;
  private apiUrl = '';

  constructor(options: MangaBakaTalkerOptions = {}) {
    this.options = options;
    this.version = options.version ?? '0.0.0';
    this.env = options.env ?? process.env;

    const { client, orchestrator } = translating(() => this.configure(DEFAULT_SETTINGS));
    this.client = client;
    this.orchestrator = orchestrator;
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  registerSettings(): SettingDefinition[] {
    return settingDefinitions();
  }

  /**
   * Validate and apply host settings.
   *
   * @returns the flat settings with defaults filled in
   * @throws {HostTalkerError} code 0 when a setting or the resulting URL is invalid
   */
  parseSettings(raw: RawSettings): RawSettings {
    return translating(() => {
      const settings = parseTalkerSettings(raw);
      const { client, orchestrator } = this.configure(settings);
      this.client = client;
      this.orchestrator = orchestrator;
      return toRawSettings(settings);
    });
  }

  async checkStatus(raw: RawSettings): Promise<StatusReport> {
    let client: MangaBakaClient;
    try {
      const settings = parseTalkerSettings(raw);
      client = this.createClient(settings, this.readEnv());
    } catch (error: unknown) {
      logger.warn(`[MangaBaka] Status check rejected settings`, { error: describeError(error) });
      return { message: 'The URL is INVALID!', ok: false };
    }
    return client.checkStatus();
  }

  // ==========================================================================
  // Lookups
  // ==========================================================================

  async searchForSeries(name: string, options: SeriesSearchOptions = {}): Promise<ComicSeries[]> {
    const query = buildSearchQuery(name, { literal: options.literal });
    logger.info(`[MangaBaka] Searching: ${query.title || query.identifier || '(empty)'}`);

    try {
      const results = await this.orchestrator.search(query, {
        filters: toCandidateFilters(this.settings),
        refreshCache: options.refreshCache,
        matchThreshold: options.seriesMatchThreshold,
        onRateLimit: options.onRateLimit,
        onProgress: options.callback,
      });
      return results.map((series) => toComicSeries(series, this.settings));
    } catch (error: unknown) {
      throw toHostError(error);
    }
  }

  async fetchSeries(seriesId: string, onRateLimit?: RateLimitCallback): Promise<ComicSeries | null> {
    const series = await this.lookup(seriesId, onRateLimit);
    return series ? toComicSeries(series, this.settings) : null;
  }

  /**
   * The provider has no issue-level data: an `issueId` alone is read as the
   * series id, and unknown ids give empty metadata.
   */
  async fetchComicData(request: ComicDataRequest): Promise<GenericMetadata> {
    const seriesId = request.seriesId ?? request.issueId;
    if (!seriesId) return emptyMetadata();

    const series = await this.lookup(seriesId, request.onRateLimit);
    return series ? toGenericMetadata(series, this.settings) : emptyMetadata();
  }

  async fetchIssuesInSeries(seriesId: string): Promise<GenericMetadata[]> {
    this.assertSeriesId(seriesId);
    return [emptyMetadata()];
  }

  async fetchIssuesBySeriesIssueNumAndYear(
    seriesIds: readonly string[],
    _issueNumber: string,
    _year: string | number | null,
    onRateLimit?: RateLimitCallback
  ): Promise<GenericMetadata[]> {
    seriesIds.forEach((id) => this.assertSeriesId(id));

    const found: GenericMetadata[] = [];
    for (const id of seriesIds) {
      const series = await this.lookup(id, onRateLimit);
      if (series) found.push(toGenericMetadata(series, this.settings));
    }
    return found;
  }

  /** Requests made by the current client, retries included. */
  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private readEnv(): EnvOverrides {
    return readEnvOverrides(this.env);
  }

  private createClient(
    settings: TalkerSettings,
    env: EnvOverrides,
    baseUrl = resolveApiUrl(settings.url, env)
  ): MangaBakaClient {
    return new MangaBakaClient({
      requestsPerMinute: env.MANGABAKA_REQUESTS_PER_MINUTE,
      timeoutMs: env.MANGABAKA_TIMEOUT_MS,
      ...this.options.client,
      baseUrl,
      apiKey: settings.apiKey || env.MANGABAKA_API_KEY,
      version: this.version,
    });
  }

  private configure(settings: TalkerSettings): { client: MangaBakaClient; orchestrator: SearchOrchestrator } {
    const env = this.readEnv();
    const apiUrl = resolveApiUrl(settings.url, env);
    const client = this.createClient(settings, env, apiUrl);

    // records from another endpoint must not answer for this one
    if (this.apiUrl && apiUrl !== this.apiUrl) {
      this.cache.clear().catch((error: unknown) => {
        logger.warn(`[MangaBaka] Failed to clear cache`, { error: describeError(error) });
      });
    }

    this.apiUrl = apiUrl;
    this.settings = settings;
    logger.debug(`[MangaBaka] Configured`, { apiUrl, ageFilter: settings.ageFilter });

    return {
      client,
      orchestrator: new SearchOrchestrator({ ...this.options.search, source: client, cache: this.cache }),
    };
  }

  private assertSeriesId(seriesId: string): void {
    if (!SERIES_ID.test(seriesId) || Number(seriesId) === 0) {
      throw new HostDataError(MANGABAKA_SOURCE, HostErrorCode.DATA, `Invalid series id "${seriesId}"`);
    }
  }

  private async lookup(seriesId: string, onRateLimit?: RateLimitCallback): Promise<CanonicalMetadata | null> {
    this.assertSeriesId(seriesId);
    try {
      return await this.orchestrator.fetchById(seriesId, { onRateLimit });
    } catch (error: unknown) {
      if (error instanceof NotFoundError) return null;
      throw toHostError(error);
    }
  }
}
