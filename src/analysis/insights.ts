import type { AnnotatedReview, Category, Insights, RatingBucket, Sentiment } from '../types';

const TOP_CATEGORY_COUNT = 5;

function ratingBucket(rating: number): RatingBucket {
  if (rating >= 4.5) return '5_star';
  if (rating >= 3.5) return '4_star';
  if (rating >= 2.5) return '3_star';
  if (rating >= 1.5) return '2_star';
  return '1_star';
}

export function emptyInsights(): Insights {
  return {
    totalReviews: 0,
    averageRating: 0,
    categoryBreakdown: {},
    sentimentBreakdown: {},
    topCategories: [],
    ratingDistribution: { '5_star': 0, '4_star': 0, '3_star': 0, '2_star': 0, '1_star': 0 },
  };
}

export class InsightAggregator {
  summarize(reviews: readonly AnnotatedReview[]): Insights {
    const insights = emptyInsights();
    if (reviews.length === 0) return insights;

    const categoryCounts = new Map<Category, number>();
    const sentimentCounts: Partial<Record<Sentiment, number>> = {};
    let ratingSum = 0;

    for (const review of reviews) {
      for (const category of review.categories) {
        categoryCounts.set(category, (categoryCounts.get(category) ?? 0) + 1);
      }
      sentimentCounts[review.sentiment] = (sentimentCounts[review.sentiment] ?? 0) + 1;
      insights.ratingDistribution[ratingBucket(review.rating)]++;
      ratingSum += review.rating;
    }

    // Stable sort keeps first-seen order among equal counts.
    const ranked = [...categoryCounts].sort((a, b) => b[1] - a[1]);

    insights.totalReviews = reviews.length;
    insights.averageRating = ratingSum / reviews.length;
    insights.categoryBreakdown = Object.fromEntries(ranked);
    insights.sentimentBreakdown = sentimentCounts;
    insights.topCategories = ranked.slice(0, TOP_CATEGORY_COUNT).map(([category]) => category);
    return insights;
  }
}
