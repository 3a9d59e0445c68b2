import { z } from "zod";
import { CATEGORIES, SENTIMENTS } from "../../../src/types";

const category = z.enum(CATEGORIES);
const sentiment = z.enum(SENTIMENTS);

export const platformSchema = z.object({
  id: z.string(),
  name: z.string(),
  domain: z.string(),
});

export const cleanReviewSchema = z.object({
  reviewerName: z.string(),
  rating: z.number(),
  reviewText: z.string(),
  date: z.string(),
  reviewUrl: z.string(),
  reviewLink: z.string(),
  source: z.string(),
  platform: z.string(),
  starDisplay: z.string(),
});

export const annotatedReviewSchema = cleanReviewSchema.extend({
  sentiment,
  categories: z.array(category),
  keywordRelevance: z.number().min(0).max(1),
  relevancePercentage: z.string(),
});

export const insightsSchema = z.object({
  totalReviews: z.number().int(),
  averageRating: z.number(),
  categoryBreakdown: z.record(category, z.number()),
  sentimentBreakdown: z.record(sentiment, z.number()),
  topCategories: z.array(category),
  ratingDistribution: z.object({
    "5_star": z.number(),
    "4_star": z.number(),
    "3_star": z.number(),
    "2_star": z.number(),
    "1_star": z.number(),
  }),
});

export const reviewsDataSchema = z.object({
  reviews: z.array(cleanReviewSchema),
  totalReviews: z.number().int(),
  platform: z.string(),
  scrapedAt: z.string(),
  originalUrl: z.string(),
});

export const searchDataSchema = z.object({
  reviews: z.array(annotatedReviewSchema),
  insights: insightsSchema,
  filterApplied: z.object({
    keywords: z.array(z.string()),
    categories: z.array(category),
    minRating: z.number(),
    maxRating: z.number(),
    sentiment: sentiment.optional(),
    sortBy: z.string(),
    limit: z.number().int(),
  }),
  totalFound: z.number().int(),
  totalScraped: z.number().int(),
  platform: z.string(),
  scrapedAt: z.string(),
  originalUrl: z.string(),
});

export const platformsDataSchema = z.object({
  platforms: z.array(platformSchema),
  totalPlatforms: z.number().int(),
});

export const errorBodySchema = z.object({
  success: z.literal(false),
  error: z.string(),
  code: z.string(),
});

export type ReviewsData = z.infer<typeof reviewsDataSchema>;
export type SearchData = z.infer<typeof searchDataSchema>;
export type PlatformsData = z.infer<typeof platformsDataSchema>;

export interface SearchOptions {
  platform?: string;
  keywords?: string[];
  categories?: Array<(typeof CATEGORIES)[number]>;
  minRating?: number;
  maxRating?: number;
  sentiment?: (typeof SENTIMENTS)[number];
  sortBy?: string;
  limit?: number;
}
