import { Engine } from "../src/engine";
import type { RawPage, Review } from "../src/types";

export const COSTCO_URL = "https://www.costco.com/standing-desk.product.100.html";

export const COSTCO_PAGE = `
<html>
  <body>
    <div class="review-item">
      <span class="review-author">Dana</span>
      <span class="review-rating" aria-label="5 out of 5 stars">★★★★★</span>
      <p class="review-text">Great desk, assembly took ten minutes</p>
      <time class="review-date" datetime="2024-05-01">May 1, 2024</time>
    </div>
    <div class="review-item">
      <span class="review-author">Sam</span>
      <span class="review-rating">Rated 2 out of 5</span>
      <p class="review-text">Terrible assembly instructions, parts broken</p>
      <span class="review-date">2024-06-12</span>
    </div>
    <div class="review-item">
      <span class="review-rating">4</span>
      <p class="review-text">Solid and sturdy frame</p>
      <span class="review-date">2023-12-30</span>
    </div>
    <div class="review-item">
      <span class="review-author">Lee</span>
      <span class="review-rating">1 star</span>
      <p class="review-text">Arrived damaged in a crushed box</p>
      <span class="review-date">2024-01-15</span>
    </div>
    <div class="review-item">
      <span class="review-author">Blank</span>
    </div>
  </body>
</html>
`;

/** Serves canned responses in order, then repeats the last one. */
export class FakeEngine extends Engine {
  readonly calls: string[] = [];
  disposed = false;

  constructor(private readonly responses: Array<string | Error>) {
    super();
  }

  async fetch(url: string): Promise<RawPage> {
    const response = this.responses[Math.min(this.calls.length, this.responses.length - 1)];
    this.calls.push(url);
    if (response instanceof Error) throw response;
    return { url, status: 200, html: response };
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}

export function makeReview(reviewText: string, rating: number, date = ""): Review {
  return {
    reviewerName: "Tester",
    rating,
    reviewText,
    date,
    sourceUrl: COSTCO_URL,
    source: "costco_scraping",
    platformName: "Costco",
  };
}

export const DESK_REVIEWS: Review[] = [
  makeReview("Great desk, assembly took ten minutes", 5, "2024-05-01"),
  makeReview("Terrible assembly instructions, parts broken", 2, "2024-06-12"),
  makeReview("Solid and sturdy frame", 4, "2023-12-30"),
  makeReview("Arrived damaged in a crushed box", 1, "2024-01-15"),
];
