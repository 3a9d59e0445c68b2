import type { Request, Response } from "express";
import type { ReviewScraper } from "../../../../src/scraper";
import type { ApiResult, CategoriesData, PlatformsData } from "../types";

export function handlePlatforms(scraper: ReviewScraper): ApiResult<PlatformsData> {
  const platforms = scraper.platforms();
  return {
    status: 200,
    body: {
      success: true,
      data: { platforms, totalPlatforms: platforms.length },
      message: `Currently supporting ${platforms.length} platforms`,
    },
  };
}

export function handleCategories(scraper: ReviewScraper): ApiResult<CategoriesData> {
  const categories = scraper.categories();
  return {
    status: 200,
    body: {
      success: true,
      data: { categories, totalCategories: categories.length },
      message: "Available review categories for filtering",
    },
  };
}

export function platformsController(scraper: ReviewScraper) {
  return (_req: Request, res: Response): void => {
    const { status, body } = handlePlatforms(scraper);
    res.status(status).json(body);
  };
}

export function categoriesController(scraper: ReviewScraper) {
  return (_req: Request, res: Response): void => {
    const { status, body } = handleCategories(scraper);
    res.status(status).json(body);
  };
}
