/**
 * Public API: the pipeline pieces for callers that want to drive a scrape
 * from code instead of the `scrape-all` / `scrape-category` commands, and
 * the loader for reading persisted seasons back.
 */

export * from './core/types';
export {
  ExtractionError,
  FetchError,
  SeasonDataNotFoundError,
  WriteError,
  describeError,
} from './core/errors';
export { loadScraperConfig, retryPolicyFrom } from './core/config';
export type { RetryPolicy, ScraperConfig } from './core/config';
export { Logger } from './core/logger';
export type { LogLevel } from './core/logger';
export { currentSeason, seasonLabel, seasonRange } from './core/season';

export { createExtractors, RankingsExtractor, StatsTableExtractor } from './extractors';
export type { ExtractorRegistry } from './extractors';
export { createPageFetcher, SitePageFetcher } from './middleware';
export type { PageFetcher } from './middleware';

export { CATEGORY_STRATEGIES, parseCategory, resolveMode } from './pipeline/categories';
export type { CategoryStrategy } from './pipeline/categories';
export { SeasonJob } from './pipeline/seasonJob';
export type { SeasonJobOptions } from './pipeline/seasonJob';
export { BatchOrchestrator, planJobs } from './pipeline/batchOrchestrator';
export type { BatchRequest, JobRunner } from './pipeline/batchOrchestrator';

export { CsvOutputSink, serializeRows } from './storage/csvOutputSink';
export type { OutputSink } from './storage/csvOutputSink';
export { loadSeason, loadSeasons, parseSeasonCsv } from './storage/seasonLoader';

export { formatRunReport } from './cli/report';
