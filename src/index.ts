import { MangaBakaTalker } from './lib/talker/mangabaka-talker';

export * from './lib/talker';
export { MangaBakaClient, SeriesRecordCache, InMemoryCache, normalizeSeries } from './lib/mangabaka';
export type { SeriesSource, SearchPage, RequestOptions } from './lib/mangabaka';
export { SearchOrchestrator, type SearchOptions } from './lib/search/orchestrator';
export { buildSearchQuery } from './lib/search/query';
export { rankCandidates, titlesMatch } from './lib/search/ranking';
export type { CanonicalMetadata, SearchQuery, Maybe } from './lib/metadata/types';
export {
  TalkerError,
  NetworkError,
  RateLimitError,
  NotFoundError,
  ParseError,
  ConfigurationError,
} from './lib/talker-errors';

// Default export for the host's plugin loader
export default MangaBakaTalker;
