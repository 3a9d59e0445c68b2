import type { Request, Response } from "express";
import type { ReviewScraper } from "../../../../src/scraper";
import { logger } from "../../../../src/logger";
import type { ApiResult, ReviewsData } from "../types";
import { cleanReviews } from "../utils/format";
import { failure, toErrorResult } from "../utils/errors";

export type QueryInput = Record<string, unknown>;

export function stringParam(query: QueryInput, name: string): string | undefined {
  const value = query[name];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export async function handleReviews(
  scraper: ReviewScraper,
  query: QueryInput,
): Promise<ApiResult<ReviewsData>> {
  const url = stringParam(query, "url");
  if (!url) {
    return failure(400, "Missing required parameter: url", "MISSING_PARAMETER");
  }

  try {
    const result = await scraper.scrape(url, { platform: stringParam(query, "platform") });
    const reviews = cleanReviews(result.reviews);

    logger.info(`Scraped ${reviews.length} reviews`, { url, platform: result.platform });
    return {
      status: 200,
      body: {
        success: true,
        data: {
          reviews,
          totalReviews: reviews.length,
          platform: result.platform,
          scrapedAt: result.scrapedAt,
          originalUrl: url,
        },
        message: `Successfully scraped ${reviews.length} reviews`,
      },
    };
  } catch (err) {
    return toErrorResult(err, "Review scraping");
  }
}

export function reviewsController(scraper: ReviewScraper) {
  return async (req: Request, res: Response): Promise<void> => {
    const { status, body } = await handleReviews(scraper, req.query);
    res.status(status).json(body);
  };
}
