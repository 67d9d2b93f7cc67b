/**
 * normalize.ts
 *
 * Converts raw MangaBaka series JSON into CanonicalMetadata.
 * This is a pure transformation - no filtering, ranking or I/O.
 */

import { MANGABAKA_SOURCE } from '../config/env-validation';
import { logger } from '../logger';
import {
  CONTENT_RATINGS,
  PUBLICATION_STATUSES,
  RECORD_STATES,
  SERIES_FORMATS,
  known,
  unknownValue,
  type CanonicalMetadata,
  type Credit,
  type CreditRole,
  type Maybe,
  type PublisherCredit,
  type PublisherKind,
} from '../metadata/types';
import {
  MangaBakaSeriesSchema,
  issuePath,
  type MangaBakaSeries,
  type RemoteRecord,
} from '../schemas/mangabaka';
import { ParseError } from '../talker-errors';

export const MANGABAKA_ID = 'mangabaka';

/**
 * Parses counts the provider sends as numbers or numeric strings ("12", "12.5").
 * Fractions are truncated; negatives and garbage become unknown.
 */
export function parseCount(value: string | number | null | undefined): Maybe<number> {
  if (value === null || value === undefined) return unknownValue;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value.trim());
  if (!Number.isFinite(parsed) || parsed < 0) return unknownValue;
  return known(Math.trunc(parsed));
}

function pickEnum<T extends string>(value: string | null | undefined, allowed: readonly T[]): T | undefined {
  const needle = value?.trim().toLowerCase();
  return allowed.find((candidate) => candidate === needle);
}

function cleanList(values: ReadonlyArray<string | null | undefined>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

function collectAlternateTitles(series: MangaBakaSeries): string[] {
  const secondary = Object.values(series.secondary_titles ?? {}).flatMap(
    (titles) => titles?.map((t) => t.title) ?? []
  );
  const title = series.title.trim();
  return cleanList([series.native_title, series.romanized_title, ...secondary]).filter((t) => t !== title);
}

function publisherKind(type: string | null | undefined): PublisherKind {
  switch (type?.trim().toLowerCase()) {
    case 'original':
      return 'original';
    case 'english':
      return 'english';
    default:
      return 'other';
  }
}

function collectPublishers(series: MangaBakaSeries): PublisherCredit[] {
  return (series.publishers ?? [])
    .filter((p) => p.name.trim())
    .map((p) => ({ name: p.name.trim(), kind: publisherKind(p.type), note: p.note?.trim() ?? '' }));
}

function collectCredits(series: MangaBakaSeries): Credit[] {
  const byRole = (names: string[] | null | undefined, role: CreditRole): Credit[] =>
    cleanList(names ?? []).map((name) => ({ name, role }));
  return [...byRole(series.authors, 'Writer'), ...byRole(series.artists, 'Artist')];
}

function collectLinks(series: MangaBakaSeries): string[] {
  return cleanList(series.links ?? []).filter((link) => {
    try {
      const { protocol } = new URL(link);
      return protocol === 'http:' || protocol === 'https:';
    } catch (error: unknown) {
      logger.debug(`[MangaBaka] Dropping unparseable link for series ${series.id}`, {
        link,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  });
}

function collectIdentifiers(id: string, series: MangaBakaSeries): Record<string, string> {
  const identifiers: Record<string, string> = {};
  for (const [site, entry] of Object.entries(series.source ?? {})) {
    if (entry?.id !== null && entry?.id !== undefined && String(entry.id).trim()) {
      identifiers[site.toLowerCase()] = String(entry.id).trim();
    }
  }
  identifiers[MANGABAKA_ID] = id;
  return identifiers;
}

function parseTimestamp(value: string | null | undefined): Maybe<string> {
  if (!value || Number.isNaN(Date.parse(value))) return unknownValue;
  return known(value);
}

/**
 * Normalize one MangaBaka series record.
 *
 * @throws {ParseError} naming the first offending field when the record is
 *   structurally invalid (missing id/title, wrongly typed fields)
 */
export function normalizeSeries(record: RemoteRecord): CanonicalMetadata {
  const parsed = MangaBakaSeriesSchema.safeParse(record);
  if (!parsed.success) {
    const field = issuePath(parsed.error);
    const reason = parsed.error.issues[0]?.message ?? 'invalid value';
    throw new ParseError(MANGABAKA_SOURCE, field, `Invalid ${MANGABAKA_SOURCE} series at "${field}": ${reason}`);
  }

  const series = parsed.data;
  const id = String(series.id);
  const state = pickEnum(series.state, RECORD_STATES) ?? 'unknown';
  const coverUrl = series.cover?.default?.trim() || series.cover?.raw?.trim() || '';

  return {
    id,
    source: { id: MANGABAKA_ID, name: MANGABAKA_SOURCE },
    title: series.title.trim(),
    nativeTitle: series.native_title?.trim() ?? '',
    romanizedTitle: series.romanized_title?.trim() ?? '',
    alternateTitles: collectAlternateTitles(series),
    description: series.description?.trim() ?? '',
    publishers: collectPublishers(series),
    credits: collectCredits(series),
    genres: cleanList(series.genres ?? []),
    tags: cleanList(series.tags ?? []),
    links: collectLinks(series),
    format: series.type ? pickEnum(series.type, SERIES_FORMATS) ?? 'other' : 'unknown',
    status: pickEnum(series.status, PUBLICATION_STATUSES) ?? 'unknown',
    contentRating: pickEnum(series.content_rating, CONTENT_RATINGS) ?? 'unknown',
    state,
    releaseYear: parseCount(series.year),
    volumeCount: parseCount(series.final_volume),
    chapterCount: parseCount(series.final_chapter ?? series.total_chapters),
    rating: typeof series.rating === 'number' && Number.isFinite(series.rating) ? known(series.rating) : unknownValue,
    lastUpdated: parseTimestamp(series.last_updated_at),
    mergedInto:
      state === 'merged' && series.merged_with !== null && series.merged_with !== undefined
        ? known(String(series.merged_with))
        : unknownValue,
    cover: {
      url: coverUrl,
      thumbnailUrl: series.cover?.small?.trim() || coverUrl,
    },
    identifiers: collectIdentifiers(id, series),
  };
}

export interface NormalizedBatch {
  items: CanonicalMetadata[];
  rejected: ParseError[];
}

/**
 * Normalize many records, skipping (and logging) the ones that fail to parse.
 */
export function normalizeSeriesList(records: readonly RemoteRecord[]): NormalizedBatch {
  const items: CanonicalMetadata[] = [];
  const rejected: ParseError[] = [];

  for (const record of records) {
    try {
      items.push(normalizeSeries(record));
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) throw error;
      logger.warn(`[MangaBaka] Skipping malformed series record`, {
        id: record.id,
        field: error.field,
        error: error.message,
      });
      rejected.push(error);
    }
  }

  return { items, rejected };
}
