import type { AnnotatedReview, Review } from "../../../../src/types";
import type { CleanAnnotatedReview, CleanReview } from "../types";

const MAX_TEXT_LENGTH = 5000;
const UNSAFE_CHARS = /[<>"'&]/g;

export function sanitizeText(text: string): string {
  let cleaned = text.split(/\s+/).filter(Boolean).join(" ").replace(UNSAFE_CHARS, "");
  if (cleaned.length > MAX_TEXT_LENGTH) {
    cleaned = `${cleaned.slice(0, MAX_TEXT_LENGTH)}...`;
  }
  return cleaned.trim();
}

export function starDisplay(rating: number): string {
  const stars = Math.floor(rating);
  return `${"⭐".repeat(stars)}${"☆".repeat(5 - stars)} (${rating}/5)`;
}

export function cleanReview(review: Review): CleanReview {
  const rating = Math.max(0, Math.min(5, review.rating));
  return {
    reviewerName: sanitizeText(review.reviewerName),
    rating,
    reviewText: sanitizeText(review.reviewText),
    date: sanitizeText(review.date),
    reviewUrl: review.sourceUrl,
    reviewLink: `View on ${review.platformName}: ${review.sourceUrl}`,
    source: review.source,
    platform: review.platformName,
    starDisplay: starDisplay(rating),
  };
}

export function cleanAnnotatedReview(review: AnnotatedReview): CleanAnnotatedReview {
  return {
    ...cleanReview(review),
    sentiment: review.sentiment,
    categories: review.categories,
    keywordRelevance: review.keywordRelevance,
    relevancePercentage: review.keywordRelevance >= 1 ? "100%" : `${(review.keywordRelevance * 100).toFixed(1)}%`,
  };
}

const hasContent = (review: CleanReview): boolean => review.reviewText !== "" || review.rating > 0;

/** Drops records left with neither text nor rating after sanitizing. */
export function cleanReviews(reviews: readonly Review[]): CleanReview[] {
  return reviews.map(cleanReview).filter(hasContent);
}

export function cleanAnnotatedReviews(reviews: readonly AnnotatedReview[]): CleanAnnotatedReview[] {
  return reviews.map(cleanAnnotatedReview).filter(hasContent);
}
