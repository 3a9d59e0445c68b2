import { describe, it, expect } from "vitest";
import { DEFAULT_QUERY, ReviewFilterRanker, sortReviews } from "../../src/analysis/ranker";
import { SORT_KEYS } from "../../src/types";
import type { AnnotatedReview, FilterQuery, Review, SortKey } from "../../src/types";
import { DESK_REVIEWS, makeReview } from "../helpers";

const query = (overrides: Partial<FilterQuery>): FilterQuery => ({ ...DEFAULT_QUERY, ...overrides });
const texts = (reviews: Array<{ reviewText: string }>) => reviews.map((r) => r.reviewText);

const [GREAT, TERRIBLE, SOLID, DAMAGED] = DESK_REVIEWS.map((r) => r.reviewText);

const sortValue: Record<SortKey, (review: AnnotatedReview) => number | string> = {
  relevance: (review) => review.keywordRelevance,
  rating: (review) => review.rating,
  date: (review) => review.date,
  length: (review) => review.reviewText.length,
};

const notBelow = (a: number | string, b: number | string) =>
  typeof a === "number" && typeof b === "number" ? a >= b : String(a) >= String(b);

const position = (reviews: Review[], review: AnnotatedReview) =>
  reviews.findIndex((r) => r.reviewText === review.reviewText);

describe("ReviewFilterRanker", () => {
  const ranker = new ReviewFilterRanker();

  it("annotates every review without a filter", () => {
    const result = ranker.apply(DESK_REVIEWS);

    expect(texts(result)).toEqual([GREAT, TERRIBLE, SOLID, DAMAGED]);
    expect(result.map((r) => r.sentiment)).toEqual(["positive", "negative", "neutral", "neutral"]);
    expect(result.map((r) => r.categories)).toEqual([
      ["assembly"],
      ["assembly", "durability"],
      ["quality", "durability"],
      ["delivery"],
    ]);
    expect(result.every((r) => r.keywordRelevance === 1)).toBe(true);
  });

  it("keeps ratings inside an inclusive range", () => {
    expect(texts(ranker.apply(DESK_REVIEWS, query({ minRating: 2, maxRating: 4 })))).toEqual([TERRIBLE, SOLID]);
  });

  it("filters by sentiment", () => {
    expect(texts(ranker.apply(DESK_REVIEWS, query({ sentiment: "negative" })))).toEqual([TERRIBLE]);
  });

  it("keeps reviews sharing any requested category", () => {
    expect(texts(ranker.apply(DESK_REVIEWS, query({ categories: ["durability", "delivery"] })))).toEqual([
      TERRIBLE,
      SOLID,
      DAMAGED,
    ]);
  });

  it("keeps reviews above the relevance threshold", () => {
    const result = ranker.apply(DESK_REVIEWS, query({ keywords: ["assembly", "box"] }));

    expect(texts(result)).toEqual([GREAT, TERRIBLE, DAMAGED]);
    expect(result.map((r) => r.keywordRelevance)).toEqual([0.5, 0.5, 0.5]);
  });

  it("drops a review scoring exactly at the threshold", () => {
    const review = makeReview("Reassembly required", 5);
    const keywords = ["assembly", "qqq", "www", "zzz", "vvv"];

    expect(ranker.apply([review], query({ keywords }))).toEqual([]);
  });

  it("requires every filter to pass", () => {
    expect(ranker.apply(DESK_REVIEWS, query({ categories: ["delivery"], keywords: ["assembly"] }))).toEqual([]);
  });

  it("drops a review that mentions none of the keywords", () => {
    const review = makeReview("Not durable at all, broke in a week", 2);
    expect(ranker.apply([review], query({ keywords: ["durability"] }))).toEqual([]);
  });

  it("sorts by the requested key, descending", () => {
    expect(texts(ranker.apply(DESK_REVIEWS, query({ sortBy: "rating" })))).toEqual([GREAT, SOLID, TERRIBLE, DAMAGED]);
    expect(texts(ranker.apply(DESK_REVIEWS, query({ sortBy: "date" })))).toEqual([TERRIBLE, GREAT, DAMAGED, SOLID]);
    expect(texts(ranker.apply(DESK_REVIEWS, query({ sortBy: "length" })))).toEqual([TERRIBLE, GREAT, DAMAGED, SOLID]);
  });

  it("puts the most relevant reviews first", () => {
    const reviews = [makeReview("Sturdy frame", 4), makeReview("Sturdy frame, easy assembly", 4)];
    const result = ranker.apply(reviews, query({ keywords: ["sturdy", "assembly"] }));

    expect(texts(result)).toEqual(["Sturdy frame, easy assembly", "Sturdy frame"]);
    expect(result.map((r) => r.keywordRelevance)).toEqual([1, 0.5]);
  });

  it("keeps input order among tied keys", () => {
    const reviews = "abcdefghijkl".split("").map((letter, i) => makeReview(letter, i % 2 === 0 ? 4 : 3, "2024-01-01"));

    expect(texts(ranker.apply(reviews, query({ sortBy: "rating" })))).toEqual("acegikbdfhjl".split(""));
    expect(texts(ranker.apply(reviews, query({ sortBy: "date" })))).toEqual("abcdefghijkl".split(""));
    expect(texts(ranker.apply(reviews, query({ sortBy: "length" })))).toEqual("abcdefghijkl".split(""));
  });

  it("orders every adjacent pair for each sort key", () => {
    const reviews = [
      ...DESK_REVIEWS,
      makeReview("Easy assembly", 5, "2024-05-01"),
      makeReview("Assembly manual missing", 2, "2024-02-20"),
    ];

    for (const sortBy of SORT_KEYS) {
      const result = ranker.apply(reviews, query({ keywords: ["assembly", "desk"], sortBy }));
      const key = sortValue[sortBy];

      expect(result.length).toBeGreaterThan(1);
      for (let i = 1; i < result.length; i++) {
        const [before, after] = [key(result[i - 1]), key(result[i])];
        expect(notBelow(before, after)).toBe(true);
        if (before === after) {
          expect(position(reviews, result[i - 1])).toBeLessThan(position(reviews, result[i]));
        }
      }
    }
  });

  it("keeps input order for an unknown sort key", () => {
    expect(texts(ranker.apply(DESK_REVIEWS, query({ sortBy: "newest" })))).toEqual([GREAT, TERRIBLE, SOLID, DAMAGED]);
  });

  it("truncates to the limit after sorting", () => {
    const result = ranker.apply(DESK_REVIEWS, query({ sortBy: "rating", limit: 2 }));
    expect(texts(result)).toEqual([GREAT, SOLID]);
  });

  it("returns the same result when applied twice", () => {
    const q = query({ keywords: ["assembly"], sortBy: "rating" });
    expect(ranker.apply(DESK_REVIEWS, q)).toEqual(ranker.apply(DESK_REVIEWS, q));
  });

  it("returns nothing for no input", () => {
    expect(ranker.apply([])).toEqual([]);
  });
});

describe("sortReviews", () => {
  it("does not mutate its input", () => {
    const annotated = new ReviewFilterRanker().apply(DESK_REVIEWS);
    const before = texts(annotated);

    sortReviews(annotated, "rating");

    expect(texts(annotated)).toEqual(before);
  });

  it("ignores inherited property names", () => {
    const annotated = new ReviewFilterRanker().apply(DESK_REVIEWS);
    expect(texts(sortReviews(annotated, "toString"))).toEqual(texts(annotated));
  });
});
