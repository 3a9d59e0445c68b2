export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const CATEGORIES = [
  'assembly',
  'quality',
  'value',
  'size',
  'comfort',
  'delivery',
  'customer_service',
  'durability',
] as const;
export type Category = (typeof CATEGORIES)[number];

export const SORT_KEYS = ['relevance', 'rating', 'date', 'length'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export interface SiteConfig {
  readonly name: string;
  readonly domain: string;
  readonly reviewContainer: string;
  readonly reviewerName: string;
  readonly rating: string;
  readonly reviewText: string;
  readonly date: string;
  readonly ratingScale: number;
  readonly maxReviews: number;
}

export interface PlatformSummary {
  id: string;
  name: string;
  domain: string;
}

export interface Review {
  reviewerName: string;
  rating: number;
  reviewText: string;
  date: string;
  sourceUrl: string;
  source: string;
  platformName: string;
}

export interface AnnotatedReview extends Review {
  sentiment: Sentiment;
  categories: Category[];
  keywordRelevance: number;
}

export interface FilterQuery {
  keywords: string[];
  categories: Category[];
  minRating: number;
  maxRating: number;
  sentiment?: Sentiment;
  // Kept open: an unrecognized key preserves input order when sorting.
  sortBy: SortKey | (string & {});
  limit: number;
}

export type RatingBucket = '5_star' | '4_star' | '3_star' | '2_star' | '1_star';

export interface Insights {
  totalReviews: number;
  averageRating: number;
  // Insertion order is descending by count.
  categoryBreakdown: Partial<Record<Category, number>>;
  sentimentBreakdown: Partial<Record<Sentiment, number>>;
  topCategories: Category[];
  ratingDistribution: Record<RatingBucket, number>;
}

export interface CategoryDescription {
  category: Category;
  description: string;
  keywords: string[];
}

export interface EngineOptions {
  timeout?: number;
  headers?: Record<string, string>;
}

export interface RawPage {
  url: string;
  status: number;
  html: string;
}

export interface RetryConfig {
  attempts?: number;
  delay?: number;
  backoff?: 'exponential' | 'linear';
}

export interface ScrapeOptions {
  platform?: string;
  timeout?: number;
}

export interface ScrapeResult {
  url: string;
  platform: string;
  platformName: string;
  reviews: Review[];
  scrapedAt: string;
}

export interface SearchResult extends Omit<ScrapeResult, 'reviews'> {
  reviews: AnnotatedReview[];
  insights: Insights;
  query: FilterQuery;
  totalScraped: number;
  totalFound: number;
}
