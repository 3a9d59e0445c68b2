import express from "express";
import type { Express } from "express";
import type { ReviewScraper } from "../../../src/scraper";
import { reviewsController } from "./controllers/reviews";
import { searchController } from "./controllers/search";
import { categoriesController, platformsController } from "./controllers/catalog";

export function createApp(scraper: ReviewScraper): Express {
  const app = express();
  app.use(express.json());

  app.get("/", (_, res) => {
    res.json({
      service: "review-sift",
      description: "Review extraction with keyword, category and sentiment filtering",
      endpoints: {
        health: "GET /health",
        reviews: "GET /reviews?url=&platform=",
        search: "GET /search?url=&keywords=&categories=&min_rating=&max_rating=&sentiment=&sort_by=&limit=&output=json|xml",
        platforms: "GET /platforms",
        categories: "GET /categories",
      },
      examples: {
        assembly: "/search?url=https://www.walmart.com/ip/standing-desk&keywords=assembly,setup",
        comfort: "/search?url=https://www.target.com/p/chair&categories=comfort,quality&min_rating=4",
      },
    });
  });

  app.get("/health", (_, res) => res.json({ status: "ok", timestamp: new Date().toISOString() }));
  app.get("/platforms", platformsController(scraper));
  app.get("/categories", categoriesController(scraper));
  app.get("/reviews", reviewsController(scraper));
  app.get("/search", searchController(scraper));

  app.use((_, res) => {
    res.status(404).json({ success: false, error: "Endpoint not found", code: "NOT_FOUND" });
  });

  return app;
}

export { handleReviews } from "./controllers/reviews";
export { handleSearch } from "./controllers/search";
export { handlePlatforms, handleCategories } from "./controllers/catalog";
export type * from "./types";
