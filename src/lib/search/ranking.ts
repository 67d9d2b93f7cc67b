import { valueOr, type CanonicalMetadata, type SearchQuery } from '../metadata/types';

/**
 * Normalizes a title for comparison:
 * - lowercase
 * - strip diacritics
 * - remove punctuation
 * - collapse repeated spaces
 */
export function normalizeTitle(str: string): string {
  if (!str) return '';
  return str
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // remove diacritics
    .replace(/[^\p{L}\p{N}\s]/gu, ' ') // punctuation separates words
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Calculates Levenshtein distance between two strings.
 */
function levenshtein(a: string, b: string): number {
  if (a.length < b.length) [a, b] = [b, a];
  if (b.length === 0) return a.length;

  const arr = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    let prev = i;
    for (let j = 1; j <= b.length; j++) {
      const cur = a[i - 1] === b[j - 1] ? arr[j - 1] : Math.min(arr[j - 1], arr[j], prev) + 1;
      arr[j - 1] = prev;
      prev = cur;
    }
    arr[b.length] = prev;
  }
  return arr[b.length];
}

/**
 * Similarity ratio between two already-normalized strings (0 to 1).
 */
export function similarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;
  return 1 - levenshtein(a, b) / Math.max(a.length, b.length);
}

/**
 * True when `candidate` is at least `threshold` percent similar to `query`
 * after normalization. Used to stop paginating once results drift off-topic.
 */
export function titlesMatch(query: string, candidate: string, threshold = 90): boolean {
  return similarity(normalizeTitle(query), normalizeTitle(candidate)) * 100 >= threshold;
}

export const MatchTier = {
  NONE: 0,
  FUZZY: 1,
  SUBSTRING: 2,
  EXACT: 3,
} as const;

export type MatchTier = (typeof MatchTier)[keyof typeof MatchTier];

const FUZZY_THRESHOLD = 0.6;

export interface TitleScore {
  tier: MatchTier;
  /** Best similarity over title and alternates, two decimals */
  similarity: number;
}

/**
 * Scores a candidate against the query over its title and alternate titles.
 * The best tier wins; similarity is the best ratio across every title.
 */
export function scoreTitle(query: string, candidate: Pick<CanonicalMetadata, 'title' | 'alternateTitles'>): TitleScore {
  const needle = normalizeTitle(query);
  if (!needle) return { tier: MatchTier.NONE, similarity: 0 };

  let tier: MatchTier = MatchTier.NONE;
  let best = 0;

  for (const title of [candidate.title, ...candidate.alternateTitles]) {
    const hay = normalizeTitle(title);
    if (!hay) continue;

    const ratio = similarity(needle, hay);
    best = Math.max(best, ratio);

    if (hay === needle) tier = MatchTier.EXACT;
    else if (hay.includes(needle) && tier < MatchTier.SUBSTRING) tier = MatchTier.SUBSTRING;
    else if (ratio >= FUZZY_THRESHOLD && tier < MatchTier.FUZZY) tier = MatchTier.FUZZY;
  }

  return { tier, similarity: Math.round(best * 100) / 100 };
}

interface RankedEntry {
  candidate: CanonicalMetadata;
  score: TitleScore;
  yearMatch: number;
  rating: number;
  updated: number;
  index: number;
}

function toTimestamp(value: string | null): number {
  if (value === null) return Number.NEGATIVE_INFINITY;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Orders candidates best-first. Keys, in order:
 * tier, similarity, release year equal to the query's year hint, provider
 * rating, last update, then the provider's original order.
 *
 * Pure and deterministic: equal inputs always give the same order.
 */
export function rankCandidates(query: SearchQuery, candidates: readonly CanonicalMetadata[]): CanonicalMetadata[] {
  const entries: RankedEntry[] = candidates.map((candidate, index) => ({
    candidate,
    score: scoreTitle(query.title, candidate),
    yearMatch:
      query.year !== undefined && valueOr(candidate.releaseYear, null) === query.year ? 1 : 0,
    rating: valueOr(candidate.rating, Number.NEGATIVE_INFINITY),
    updated: toTimestamp(valueOr(candidate.lastUpdated, null)),
    index,
  }));

  entries.sort((a, b) => {
    if (a.score.tier !== b.score.tier) return b.score.tier - a.score.tier;
    if (a.score.similarity !== b.score.similarity) return b.score.similarity - a.score.similarity;
    if (a.yearMatch !== b.yearMatch) return b.yearMatch - a.yearMatch;
    if (a.rating !== b.rating) return a.rating < b.rating ? 1 : -1;
    if (a.updated !== b.updated) return a.updated < b.updated ? 1 : -1;
    return a.index - b.index;
  });

  return entries.map((entry) => entry.candidate);
}
