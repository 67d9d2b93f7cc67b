/**
 * Host talker contract.
 *
 * Everything a talker hands back to the host is expressed in these types.
 * Provider-specific shapes and error classes never cross this boundary.
 */

import type { RateLimitCallback } from '../mangabaka/client';

/** Bumped when a method signature or a host type changes. */
export const TALKER_API_VERSION = 1;

export type { RateLimitCallback };

// ============================================================================
// Host metadata types
// ============================================================================

export interface ComicSeries {
  id: string;
  name: string;
  aliases: string[];
  description: string;
  imageUrl: string;
  publisher: string;
  startYear: number | null;
  countOfIssues: number | null;
  countOfVolumes: number | null;
  format: string;
}

export interface MetadataOrigin {
  id: string;
  name: string;
}

export interface HostCredit {
  person: string;
  role: string;
  primary: boolean;
}

/**
 * The host's issue-level record.
 *
 * null is the host's own "not set" marker for scalar fields, so unknown
 * values reach it as null rather than as a made-up default. Lists are
 * always arrays, never null.
 */
export interface GenericMetadata {
  isEmpty: boolean;
  dataOrigin: MetadataOrigin | null;
  issueId: string | null;
  seriesId: string | null;
  series: string | null;
  seriesAliases: string[];
  issue: string | null;
  volume: number | null;
  publisher: string | null;
  year: number | null;
  countOfIssues: number | null;
  countOfVolumes: number | null;
  description: string | null;
  credits: HostCredit[];
  genres: string[];
  tags: string[];
  /** 'Yes' for manga, null otherwise */
  manga: string | null;
  maturityRating: string | null;
  criticalRating: number | null;
  webLinks: string[];
  coverImageUrl: string | null;
  identifiers: Record<string, string>;
}

export function emptyMetadata(): GenericMetadata {
  return {
    isEmpty: true,
    dataOrigin: null,
    issueId: null,
    seriesId: null,
    series: null,
    seriesAliases: [],
    issue: null,
    volume: null,
    publisher: null,
    year: null,
    countOfIssues: null,
    countOfVolumes: null,
    description: null,
    credits: [],
    genres: [],
    tags: [],
    manga: null,
    maturityRating: null,
    criticalRating: null,
    webLinks: [],
    coverImageUrl: null,
    identifiers: {},
  };
}

// ============================================================================
// Settings
// ============================================================================

export type SettingValue = string | boolean;

export interface SettingDefinition {
  /** Flat key the host stores the value under, e.g. `mangabaka_url` */
  key: string;
  displayName: string;
  help?: string;
  kind: 'boolean' | 'choice' | 'string' | 'secret';
  default: SettingValue;
  choices?: readonly string[];
  /** Secrets are kept out of settings files */
  persisted: boolean;
}

export type RawSettings = Readonly<Record<string, unknown>>;

// ============================================================================
// Host errors
// ============================================================================

export const HostErrorCode = {
  UNKNOWN: 0,
  NETWORK: 1,
  DATA: 2,
  RATE_LIMIT: 3,
  TIMEOUT: 4,
  OTHER: 5,
} as const;

export type HostErrorCode = (typeof HostErrorCode)[keyof typeof HostErrorCode];

const CODE_DESCRIPTIONS: Record<HostErrorCode, string> = {
  0: 'Unknown',
  1: 'Network Error',
  2: 'Data Error',
  3: 'Rate Limit',
  4: 'Timeout',
  5: 'Other',
};

export class HostTalkerError extends Error {
  constructor(
    public readonly source: string,
    public readonly code: HostErrorCode = HostErrorCode.UNKNOWN,
    public readonly description = ''
  ) {
    super(`${source} encountered a ${CODE_DESCRIPTIONS[code]}: ${description}`);
    this.name = 'HostTalkerError';
  }
}

export class HostNetworkError extends HostTalkerError {
  constructor(
    source: string,
    code: HostErrorCode = HostErrorCode.NETWORK,
    description = '',
    public readonly retryAfter?: number
  ) {
    super(source, code, description);
    this.name = 'HostNetworkError';
  }
}

export class HostDataError extends HostTalkerError {
  constructor(source: string, code: HostErrorCode = HostErrorCode.DATA, description = '') {
    super(source, code, description);
    this.name = 'HostDataError';
  }
}

// ============================================================================
// Talker interface
// ============================================================================

export interface SeriesSearchOptions {
  /** Progress as (records received, total reported) */
  callback?: (current: number, total: number) => void;
  refreshCache?: boolean;
  literal?: boolean;
  /** Percent similarity needed to keep paginating */
  seriesMatchThreshold?: number;
  onRateLimit?: RateLimitCallback;
}

export interface ComicDataRequest {
  issueId?: string;
  seriesId?: string;
  issueNumber?: string;
  onRateLimit?: RateLimitCallback;
}

export interface StatusReport {
  message: string;
  ok: boolean;
}

export interface ComicTalker {
  readonly apiVersion: number;
  readonly id: string;
  readonly name: string;
  readonly website: string;
  readonly logoUrl: string;
  readonly attribution: string;
  readonly about: string;
  readonly minHostVersion: string;

  registerSettings(): SettingDefinition[];
  parseSettings(raw: RawSettings): RawSettings;
  checkStatus(raw: RawSettings): Promise<StatusReport>;
  searchForSeries(name: string, options?: SeriesSearchOptions): Promise<ComicSeries[]>;
  fetchSeries(seriesId: string, onRateLimit?: RateLimitCallback): Promise<ComicSeries | null>;
  fetchComicData(request: ComicDataRequest): Promise<GenericMetadata>;
  fetchIssuesInSeries(seriesId: string, onRateLimit?: RateLimitCallback): Promise<GenericMetadata[]>;
  fetchIssuesBySeriesIssueNumAndYear(
    seriesIds: readonly string[],
    issueNumber: string,
    year: string | number | null,
    onRateLimit?: RateLimitCallback
  ): Promise<GenericMetadata[]>;
}
