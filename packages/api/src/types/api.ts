import type { QueryIssue } from "../../../../src/errors";
import type {
  AnnotatedReview,
  CategoryDescription,
  FilterQuery,
  Insights,
  PlatformSummary,
} from "../../../../src/types";

export interface ApiSuccess<T> {
  success: true;
  data: T;
  message: string;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  issues?: QueryIssue[];
  supportedPlatforms?: PlatformSummary[];
}

export interface ApiResult<T> {
  status: number;
  body: ApiSuccess<T> | ErrorResponse;
}

export interface CleanReview {
  reviewerName: string;
  rating: number;
  reviewText: string;
  date: string;
  reviewUrl: string;
  reviewLink: string;
  source: string;
  platform: string;
  starDisplay: string;
}

export interface CleanAnnotatedReview extends CleanReview {
  sentiment: AnnotatedReview["sentiment"];
  categories: AnnotatedReview["categories"];
  keywordRelevance: number;
  relevancePercentage: string;
}

export interface ReviewsData {
  reviews: CleanReview[];
  totalReviews: number;
  platform: string;
  scrapedAt: string;
  originalUrl: string;
}

export interface SearchData {
  reviews: CleanAnnotatedReview[];
  insights: Insights;
  filterApplied: FilterQuery;
  totalFound: number;
  totalScraped: number;
  platform: string;
  scrapedAt: string;
  originalUrl: string;
}

export interface PlatformsData {
  platforms: PlatformSummary[];
  totalPlatforms: number;
}

export interface CategoriesData {
  categories: CategoryDescription[];
  totalCategories: number;
}
