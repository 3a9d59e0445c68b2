import type {
  CategoryDescription,
  FilterQuery,
  PlatformSummary,
  RetryConfig,
  ScrapeOptions,
  ScrapeResult,
  SearchResult,
} from './types';
import { Engine } from './engine';
import { HttpEngine } from './engines';
import { loadDocument } from './document';
import type { ReviewDocument } from './document';
import { PlatformDetector } from './detector';
import { ReviewExtractor } from './extractor';
import { getSiteRegistry } from './sites';
import type { SiteRegistry } from './sites';
import { TextClassifier } from './analysis/classifier';
import { ReviewFilterRanker, DEFAULT_QUERY } from './analysis/ranker';
import { InsightAggregator } from './analysis/insights';
import { InvalidUrlError, UnsupportedPlatformError } from './errors';
import { isValidUrl, retryWithBackoff } from './utils';
import { logger, setLogLevel } from './logger';
import { loadConfig } from './config';
import type { AppConfig } from './config';

const DEFAULT_RETRY: Required<RetryConfig> = { attempts: 3, delay: 1000, backoff: 'exponential' };

export interface ReviewScraperConfig {
  engine?: Engine;
  registry?: SiteRegistry;
  parse?: (html: string) => ReviewDocument;
  retry?: RetryConfig;
  timeout?: number;
  userAgent?: string;
}

export class ReviewScraper {
  private readonly engine: Engine;
  private readonly registry: SiteRegistry;
  private readonly detector: PlatformDetector;
  private readonly extractor = new ReviewExtractor();
  private readonly classifier = new TextClassifier();
  private readonly ranker = new ReviewFilterRanker(this.classifier);
  private readonly aggregator = new InsightAggregator();
  private readonly parse: (html: string) => ReviewDocument;
  private readonly retry: Required<RetryConfig>;
  private readonly timeout?: number;

  constructor(config: ReviewScraperConfig = {}) {
    this.registry = config.registry ?? getSiteRegistry();
    this.detector = new PlatformDetector(this.registry);
    this.engine = config.engine ?? new HttpEngine({ userAgent: config.userAgent ?? 'review-sift', timeout: config.timeout });
    this.parse = config.parse ?? loadDocument;
    this.retry = { ...DEFAULT_RETRY, ...config.retry };
    this.timeout = config.timeout;
  }

  detectPlatform(url: string): string | undefined {
    return this.detector.detect(url);
  }

  platforms(): PlatformSummary[] {
    return this.registry.list();
  }

  categories(): CategoryDescription[] {
    return this.classifier.describeCategories();
  }

  private resolvePlatform(url: string, override?: string): string {
    const platform = override ?? this.detector.detect(url);
    if (!platform || !this.registry.has(platform)) {
      const supported = this.registry.list();
      throw new UnsupportedPlatformError(
        override
          ? `Unsupported platform "${override}". Supported: ${supported.map(p => p.id).join(', ')}`
          : `No supported platform matches ${url}`,
        supported
      );
    }
    return platform;
  }

  async scrape(url: string, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    if (!isValidUrl(url)) {
      throw new InvalidUrlError('URL must be an http:// or https:// address with a host');
    }

    const platform = this.resolvePlatform(url, options.platform);
    const config = this.registry.lookup(platform);
    if (!config) {
      throw new UnsupportedPlatformError(`Unsupported platform "${platform}"`, this.registry.list());
    }

    const page = await retryWithBackoff(
      () => this.engine.fetch(url, { timeout: options.timeout ?? this.timeout }),
      {
        maxRetries: this.retry.attempts - 1,
        baseDelay: this.retry.delay,
        backoff: this.retry.backoff,
        operation: `Fetching ${url}`,
      }
    );

    const reviews = this.extractor.extract(this.parse(page.html), config, { platformId: platform, sourceUrl: url });

    return {
      url,
      platform,
      platformName: config.name,
      reviews,
      scrapedAt: new Date().toISOString(),
    };
  }

  async search(url: string, query: FilterQuery = DEFAULT_QUERY, options: ScrapeOptions = {}): Promise<SearchResult> {
    const scraped = await this.scrape(url, options);
    const reviews = this.ranker.apply(scraped.reviews, query);
    const insights = this.aggregator.summarize(reviews);

    logger.info(`Search matched ${reviews.length}/${scraped.reviews.length} reviews`, { url, platform: scraped.platform });

    return {
      ...scraped,
      reviews,
      insights,
      query,
      totalScraped: scraped.reviews.length,
      totalFound: reviews.length,
    };
  }

  async dispose(): Promise<void> {
    await this.engine.dispose();
  }
}

export function createReviewScraper(appConfig: AppConfig = loadConfig()): ReviewScraper {
  setLogLevel(appConfig.logLevel);
  return new ReviewScraper({
    userAgent: appConfig.userAgent,
    timeout: appConfig.fetchTimeoutMs,
    retry: { attempts: appConfig.maxRetries + 1, delay: appConfig.retryDelayMs, backoff: 'exponential' },
  });
}
