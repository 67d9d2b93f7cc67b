import { CONTENT_RATINGS, type CanonicalMetadata, type ContentRating, type SeriesFormat } from '../metadata/types';

export interface CandidateFilters {
  /** Highest content rating let through; records without a rating are dropped */
  maxContentRating: ContentRating;
  excludeDoujinshi: boolean;
  /** Keep only this format when set */
  format?: SeriesFormat;
}

export const DEFAULT_FILTERS: CandidateFilters = {
  maxContentRating: 'safe',
  excludeDoujinshi: true,
};

/** Ratings at or below the ceiling, least restrictive first. */
export function allowedRatings(ceiling: ContentRating): ContentRating[] {
  return CONTENT_RATINGS.slice(0, CONTENT_RATINGS.indexOf(ceiling) + 1);
}

const DOUJINSHI = 'doujinshi';

export function isDoujinshi(candidate: CanonicalMetadata): boolean {
  return candidate.genres.some((genre) => genre.toLowerCase() === DOUJINSHI);
}

export function applyFilters(
  candidates: readonly CanonicalMetadata[],
  filters: CandidateFilters
): CanonicalMetadata[] {
  const ratings = new Set<string>(allowedRatings(filters.maxContentRating));

  return candidates.filter((candidate) => {
    if (!ratings.has(candidate.contentRating)) return false;
    if (filters.excludeDoujinshi && isDoujinshi(candidate)) return false;
    if (filters.format && candidate.format !== filters.format) return false;
    return true;
  });
}
