import type { Request, Response } from "express";
import type { ReviewScraper } from "../../../../src/scraper";
import { parseFilterQuery } from "../../../../src/analysis/query";
import type { ApiResult, SearchData } from "../types";
import { cleanAnnotatedReviews } from "../utils/format";
import { failure, toErrorResult } from "../utils/errors";
import jsonToXml from "../utils/jsonToXml";
import { stringParam } from "./reviews";
import type { QueryInput } from "./reviews";

export async function handleSearch(
  scraper: ReviewScraper,
  query: QueryInput,
): Promise<ApiResult<SearchData>> {
  const url = stringParam(query, "url");
  if (!url) {
    return failure(400, "Missing required parameter: url", "MISSING_PARAMETER");
  }

  try {
    // Rejected filters never reach the network.
    const filter = parseFilterQuery(query);
    const result = await scraper.search(url, filter, { platform: stringParam(query, "platform") });
    const reviews = cleanAnnotatedReviews(result.reviews);

    return {
      status: 200,
      body: {
        success: true,
        data: {
          reviews,
          insights: result.insights,
          filterApplied: result.query,
          totalFound: reviews.length,
          totalScraped: result.totalScraped,
          platform: result.platform,
          scrapedAt: result.scrapedAt,
          originalUrl: url,
        },
        message: `Found ${reviews.length} relevant reviews out of ${result.totalScraped} total`,
      },
    };
  } catch (err) {
    return toErrorResult(err, "Review search");
  }
}

export function searchController(scraper: ReviewScraper) {
  return async (req: Request, res: Response): Promise<void> => {
    const { status, body } = await handleSearch(scraper, req.query);

    if (stringParam(req.query, "output") === "xml") {
      res.status(status).type("application/xml").send(jsonToXml(body, "response"));
    } else {
      res.status(status).json(body);
    }
  };
}
