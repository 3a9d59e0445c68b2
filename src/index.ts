export { ReviewScraper, createReviewScraper } from './scraper';
export type { ReviewScraperConfig } from './scraper';
export { Engine } from './engine';
export { HttpEngine } from './engines';
export { SiteRegistry, getSiteRegistry, loadSiteEntries } from './sites';
export type { SiteEntry } from './sites';
export { PlatformDetector } from './detector';
export { ReviewExtractor, parseRating, parseDate } from './extractor';
export { loadDocument } from './document';
export type { ReviewDocument, DocumentNode } from './document';
export { TextClassifier } from './analysis/classifier';
export { RelevanceScorer } from './analysis/relevance';
export { ReviewFilterRanker, DEFAULT_QUERY, RELEVANCE_THRESHOLD, sortReviews } from './analysis/ranker';
export { InsightAggregator, emptyInsights } from './analysis/insights';
export { parseFilterQuery } from './analysis/query';
export type { QueryParams } from './analysis/query';
export { loadConfig, parseConfig } from './config';
export type { AppConfig } from './config';
export { logger, setLogLevel } from './logger';
export {
  ReviewScraperError,
  UnsupportedPlatformError,
  NetworkError,
  MalformedElementError,
  InvalidQueryError,
  InvalidUrlError,
  ConfigError,
} from './errors';
export * from './types';
