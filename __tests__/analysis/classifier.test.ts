import { describe, it, expect } from "vitest";
import { TextClassifier, tokenize } from "../../src/analysis/classifier";
import { CATEGORIES } from "../../src/types";

describe("tokenize", () => {
  it("lowercases and splits on non-word characters", () => {
    expect([...tokenize("Great, GREAT desk! 10/10")]).toEqual(["great", "desk", "10"]);
  });
});

describe("TextClassifier", () => {
  const classifier = new TextClassifier();

  describe("sentiment", () => {
    it("picks the side with more matching words", () => {
      expect(classifier.sentiment("The assembly was difficult but quality is great")).toBe("positive");
      expect(classifier.sentiment("Terrible assembly instructions, parts broken")).toBe("negative");
    });

    it("is neutral on a tie or no matches", () => {
      expect(classifier.sentiment("great but terrible")).toBe("neutral");
      expect(classifier.sentiment("It is a chair")).toBe("neutral");
      expect(classifier.sentiment("")).toBe("neutral");
    });

    it("ignores case", () => {
      expect(classifier.sentiment("LOVE IT")).toBe("positive");
    });

    it("counts each distinct word once", () => {
      expect(classifier.sentiment("bad bad bad, great and love it")).toBe("positive");
    });
  });

  describe("categories", () => {
    it("returns matches in catalogue order", () => {
      expect(classifier.categories("The assembly was difficult but quality is great")).toEqual([
        "assembly",
        "quality",
      ]);
    });

    it("matches keywords as substrings", () => {
      expect(classifier.categories("Not durable at all, broke in a week")).toEqual(["quality", "durability"]);
    });

    it("returns nothing for empty or unrelated text", () => {
      expect(classifier.categories("")).toEqual([]);
      expect(classifier.categories("Okay")).toEqual([]);
    });
  });

  it("describes every category", () => {
    const described = classifier.describeCategories();

    expect(described.map((c) => c.category)).toEqual([...CATEGORIES]);
    expect(described.every((c) => c.description.length > 0 && c.keywords.length > 0)).toBe(true);
  });
});
