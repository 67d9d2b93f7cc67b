import { MANGABAKA_SOURCE } from '../config/env-validation';
import { MANGABAKA_ID } from '../mangabaka/normalize';
import { valueOr, type CanonicalMetadata, type PublisherKind } from '../metadata/types';
import type { ComicSeries, GenericMetadata } from './contract';
import type { TalkerSettings } from './settings';

export type MappingSettings = Pick<TalkerSettings, 'useOriginalPublisher' | 'useSeriesStartAsVolume'>;

/** Aliases shown to the host: native, romanized and secondary titles. */
function aliasesOf(series: CanonicalMetadata): string[] {
  return [...series.alternateTitles];
}

/**
 * Publishers of the preferred kind joined with ", ".
 * Empty when the provider lists none of that kind.
 */
export function pickPublisher(series: CanonicalMetadata, useOriginal: boolean): string {
  const wanted: PublisherKind = useOriginal ? 'original' : 'english';
  return series.publishers
    .filter((publisher) => publisher.kind === wanted)
    .map((publisher) => publisher.name)
    .join(', ');
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function toComicSeries(series: CanonicalMetadata, settings: MappingSettings): ComicSeries {
  return {
    id: series.id,
    name: series.title,
    aliases: aliasesOf(series),
    description: series.description,
    imageUrl: series.cover.url,
    publisher: pickPublisher(series, settings.useOriginalPublisher),
    startYear: valueOr(series.releaseYear, null),
    countOfIssues: valueOr(series.chapterCount, null),
    countOfVolumes: valueOr(series.volumeCount, null),
    format: series.format === 'unknown' ? '' : series.format,
  };
}

export function toGenericMetadata(series: CanonicalMetadata, settings: MappingSettings): GenericMetadata {
  const year = valueOr(series.releaseYear, null);
  const rating = valueOr(series.rating, null);
  const publisher = pickPublisher(series, settings.useOriginalPublisher);

  return {
    isEmpty: false,
    dataOrigin: { id: MANGABAKA_ID, name: MANGABAKA_SOURCE },
    issueId: series.id,
    seriesId: series.id,
    series: series.title,
    seriesAliases: aliasesOf(series),
    issue: null,
    volume: settings.useSeriesStartAsVolume && year ? year : null,
    publisher: publisher || null,
    year,
    countOfIssues: valueOr(series.chapterCount, null),
    countOfVolumes: valueOr(series.volumeCount, null),
    description: series.description || null,
    credits: series.credits.map((credit) => ({ person: credit.name, role: credit.role, primary: false })),
    genres: [...series.genres],
    tags: [...series.tags],
    manga: series.format === 'manga' ? 'Yes' : null,
    maturityRating: series.contentRating === 'unknown' ? null : capitalize(series.contentRating),
    criticalRating: rating === null ? null : rating / 2,
    webLinks: [...series.links],
    coverImageUrl: series.cover.url || null,
    identifiers: { ...series.identifiers },
  };
}
