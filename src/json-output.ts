import { v4 as uuidv4 } from 'uuid';
import type { Category, FilterQuery, Insights, SearchResult, Sentiment } from './types';

export interface BatchResult {
  url: string;
  result?: SearchResult;
  error?: string;
  code?: string;
}

export interface JsonReview {
  reviewer: string;
  rating: number;
  date: string;
  sentiment: Sentiment;
  categories: Category[];
  relevance: string;
  text: string;
}

export interface JsonSingleResult {
  url: string;
  timestamp: string;
  platform?: string;
  status: 'success' | 'error';
  totals?: {
    scraped: number;
    found: number;
  };
  filter?: FilterQuery;
  insights?: Insights;
  reviews?: JsonReview[];
  error?: string;
  code?: string;
}

export interface JsonBatchResult {
  batchId: string;
  timestamp: string;
  summary: {
    total: number;
    successful: number;
    failed: number;
  };
  results: JsonSingleResult[];
  sharedCategories: Category[];
}

export function formatPercentage(relevance: number): string {
  return relevance >= 1 ? '100%' : `${(relevance * 100).toFixed(1)}%`;
}

export function formatJsonSingle(batch: BatchResult): JsonSingleResult {
  const { url, result, error, code } = batch;

  if (!result) {
    return {
      url,
      timestamp: new Date().toISOString(),
      status: 'error',
      error: error ?? 'Unknown error',
      ...(code ? { code } : {}),
    };
  }

  return {
    url,
    timestamp: result.scrapedAt,
    platform: result.platformName,
    status: 'success',
    totals: { scraped: result.totalScraped, found: result.totalFound },
    filter: result.query,
    insights: result.insights,
    reviews: result.reviews.map(review => ({
      reviewer: review.reviewerName,
      rating: review.rating,
      date: review.date,
      sentiment: review.sentiment,
      categories: review.categories,
      relevance: formatPercentage(review.keywordRelevance),
      text: review.reviewText,
    })),
  };
}

export function formatJsonBatch(results: BatchResult[], batchId?: string): JsonBatchResult {
  const successful = results.filter(r => r.result).length;

  return {
    batchId: batchId || uuidv4(),
    timestamp: new Date().toISOString(),
    summary: {
      total: results.length,
      successful,
      failed: results.length - successful,
    },
    results: results.map(formatJsonSingle),
    sharedCategories: extractSharedCategories(results),
  };
}

/** Top categories that show up for more than one page. */
function extractSharedCategories(results: BatchResult[]): Category[] {
  const counts = new Map<Category, number>();
  for (const { result } of results) {
    for (const category of result?.insights.topCategories ?? []) {
      counts.set(category, (counts.get(category) ?? 0) + 1);
    }
  }

  return [...counts]
    .filter(([, count]) => count > 1)
    .sort(([, a], [, b]) => b - a)
    .slice(0, 5)
    .map(([category]) => category);
}
