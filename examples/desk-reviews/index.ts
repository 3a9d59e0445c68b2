import { createReviewScraper, parseFilterQuery } from "../../src";

const scraper = createReviewScraper();

const result = await scraper.search(
  "https://www.walmart.com/ip/standing-desk/123456",
  parseFilterQuery({
    keywords: "assembly,setup",
    min_rating: "3",
    sort_by: "rating",
    limit: "5",
  }),
);

console.log(`${result.totalFound} of ${result.totalScraped} reviews matched`);
console.log(result.insights);
for (const review of result.reviews) {
  console.log(`${review.rating}/5 ${review.reviewerName}: ${review.reviewText}`);
}

await scraper.dispose();
