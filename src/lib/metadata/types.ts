/**
 * Canonical, provider-agnostic metadata.
 *
 * Every field is always populated. Values the provider may omit are either a
 * documented empty default ('' / [] / 'unknown') or a Maybe<T>.
 */

export type Maybe<T> = { kind: 'known'; value: T } | { kind: 'unknown' };

export const unknownValue: { kind: 'unknown' } = { kind: 'unknown' };

export function known<T>(value: T): Maybe<T> {
  return { kind: 'known', value };
}

export function valueOr<T, D>(maybe: Maybe<T>, fallback: D): T | D {
  return maybe.kind === 'known' ? maybe.value : fallback;
}

export const SERIES_FORMATS = ['manga', 'novel', 'manhwa', 'manhua', 'oel', 'other'] as const;
export type SeriesFormat = (typeof SERIES_FORMATS)[number] | 'unknown';

export const PUBLICATION_STATUSES = ['cancelled', 'completed', 'hiatus', 'releasing', 'upcoming'] as const;
export type PublicationStatus = (typeof PUBLICATION_STATUSES)[number] | 'unknown';

/** Ordered from least to most restrictive audience. */
export const CONTENT_RATINGS = ['safe', 'suggestive', 'erotica', 'pornographic'] as const;
export type ContentRating = (typeof CONTENT_RATINGS)[number];

export const RECORD_STATES = ['active', 'merged', 'deleted'] as const;
export type RecordState = (typeof RECORD_STATES)[number] | 'unknown';

export type PublisherKind = 'original' | 'english' | 'other';

export interface PublisherCredit {
  name: string;
  kind: PublisherKind;
  note: string;
}

export type CreditRole = 'Writer' | 'Artist';

export interface Credit {
  name: string;
  role: CreditRole;
}

export interface CoverImage {
  url: string;
  thumbnailUrl: string;
}

export interface MetadataSource {
  id: string;
  name: string;
}

export interface CanonicalMetadata {
  id: string;
  source: MetadataSource;
  title: string;
  nativeTitle: string;
  romanizedTitle: string;
  /** Deduplicated, never contains `title`. */
  alternateTitles: string[];
  description: string;
  publishers: PublisherCredit[];
  credits: Credit[];
  genres: string[];
  tags: string[];
  links: string[];
  format: SeriesFormat;
  status: PublicationStatus;
  contentRating: ContentRating | 'unknown';
  state: RecordState;
  releaseYear: Maybe<number>;
  volumeCount: Maybe<number>;
  chapterCount: Maybe<number>;
  rating: Maybe<number>;
  lastUpdated: Maybe<string>;
  mergedInto: Maybe<string>;
  cover: CoverImage;
  /** Cross-site ids keyed by site; always contains the provider's own id. */
  identifiers: Record<string, string>;
}

export interface SearchQuery {
  readonly title: string;
  readonly year?: number;
  readonly volume?: number;
  readonly identifier?: string;
  /** Literal searches skip the cache and the early pagination stop. */
  readonly literal: boolean;
}
