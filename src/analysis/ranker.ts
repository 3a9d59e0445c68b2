import type { AnnotatedReview, FilterQuery, Review } from '../types';
import { TextClassifier } from './classifier';
import { RelevanceScorer } from './relevance';

export const RELEVANCE_THRESHOLD = 0.1;

export const DEFAULT_QUERY: FilterQuery = {
  keywords: [],
  categories: [],
  minRating: 0,
  maxRating: 5,
  sortBy: 'relevance',
  limit: 50,
};

type Comparator = (a: AnnotatedReview, b: AnnotatedReview) => number;

const descending = <T extends number | string>(key: (review: AnnotatedReview) => T): Comparator =>
  (a, b) => {
    const left = key(a);
    const right = key(b);
    if (left === right) return 0;
    return left < right ? 1 : -1;
  };

const COMPARATORS: Record<string, Comparator> = {
  relevance: descending(review => review.keywordRelevance),
  rating: descending(review => review.rating),
  // Date strings come in whatever format the site prints, so this is a
  // plain string ordering rather than a chronological one.
  date: descending(review => review.date),
  length: descending(review => review.reviewText.length),
};

export function sortReviews(reviews: AnnotatedReview[], sortBy: string): AnnotatedReview[] {
  const comparator = Object.hasOwn(COMPARATORS, sortBy) ? COMPARATORS[sortBy] : undefined;
  return comparator ? [...reviews].sort(comparator) : [...reviews];
}

/**
 * Filters, annotates, orders and truncates reviews for a query.
 *
 * Every filter (rating range, sentiment, category, keyword relevance) is
 * evaluated before a review is kept; a review is kept only when all pass.
 */
export class ReviewFilterRanker {
  constructor(
    private readonly classifier: TextClassifier = new TextClassifier(),
    private readonly scorer: RelevanceScorer = new RelevanceScorer()
  ) {}

  annotate(review: Review, keywords: readonly string[]): AnnotatedReview {
    return {
      ...review,
      sentiment: this.classifier.sentiment(review.reviewText),
      categories: this.classifier.categories(review.reviewText),
      keywordRelevance: keywords.length > 0 ? this.scorer.score(review.reviewText, keywords) : 1,
    };
  }

  apply(reviews: readonly Review[], query: FilterQuery = DEFAULT_QUERY): AnnotatedReview[] {
    const wanted = new Set<string>(query.categories);
    const kept: AnnotatedReview[] = [];

    for (const review of reviews) {
      if (review.rating < query.minRating || review.rating > query.maxRating) continue;

      const annotated = this.annotate(review, query.keywords);
      if (query.sentiment && annotated.sentiment !== query.sentiment) continue;
      if (wanted.size > 0 && !annotated.categories.some(category => wanted.has(category))) continue;
      if (query.keywords.length > 0 && annotated.keywordRelevance <= RELEVANCE_THRESHOLD) continue;

      kept.push(annotated);
    }

    return sortReviews(kept, query.sortBy).slice(0, Math.max(query.limit, 0));
  }
}
