import type { SearchQuery } from '../metadata/types';

export interface QueryOptions {
  /** Skip hint extraction, cache and early pagination stop */
  literal?: boolean;
  /** Explicit hints win over the ones found in the text */
  year?: number;
  volume?: number;
}

const PREFIXED_ID = /(?:^|\s)(?:mangabaka|mb):\s*(\d+)(?=\s|$)/i;
const SERIES_URL = /https?:\/\/(?:www\.)?mangabaka\.dev\/(?:series\/)?(\d+)\S*/i;
const BARE_ID = /^\d+$/;
const TRAILING_YEAR = /[([]\s*(\d{4})\s*[)\]]\s*$/;
const VOLUME = /\b(?:vol(?:ume)?\.?\s*|v)(\d{1,4})\b/i;

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function isPlausibleYear(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * Builds a frozen SearchQuery from free text.
 *
 * Lifts out, in order: a MangaBaka identifier (`mb:123`, `mangabaka:123` or a
 * mangabaka.dev link), a trailing `(2003)` / `[2003]` year and a volume marker
 * (`v01`, `vol. 2`, `volume 3`). A bare number is kept as the title and also
 * tried as an identifier, since some series are titled with digits.
 */
export function buildSearchQuery(input: string, options: QueryOptions = {}): SearchQuery {
  const literal = options.literal ?? false;
  let text = collapse(input ?? '');

  if (literal) {
    return Object.freeze({ title: text, year: options.year, volume: options.volume, literal });
  }

  let identifier: string | undefined;
  let year: number | undefined;
  let volume: number | undefined;

  const url = text.match(SERIES_URL);
  if (url) {
    identifier = url[1];
    text = collapse(text.replace(url[0], ' '));
  } else {
    const prefixed = text.match(PREFIXED_ID);
    if (prefixed) {
      identifier = prefixed[1];
      text = collapse(text.replace(prefixed[0], ' '));
    } else if (BARE_ID.test(text)) {
      identifier = text.replace(/^0+(?=\d)/, '');
    }
  }

  const yearMatch = text.match(TRAILING_YEAR);
  if (yearMatch) {
    const parsed = Number.parseInt(yearMatch[1], 10);
    if (isPlausibleYear(parsed)) {
      year = parsed;
      text = collapse(text.slice(0, yearMatch.index));
    }
  }

  // a bare number is a title, never a volume marker
  const volumeMatch = BARE_ID.test(text) ? null : text.match(VOLUME);
  if (volumeMatch) {
    volume = Number.parseInt(volumeMatch[1], 10);
    text = collapse(text.replace(volumeMatch[0], ' '));
  }

  return Object.freeze({
    title: text,
    year: options.year ?? year,
    volume: options.volume ?? volume,
    identifier: identifier && identifier !== '0' ? identifier : undefined,
    literal,
  });
}
