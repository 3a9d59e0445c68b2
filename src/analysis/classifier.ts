import type { Category, CategoryDescription, Sentiment } from '../types';
import { loadLexicons } from './lexicons';
import type { Lexicons } from './lexicons';

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(WORD_PATTERN) ?? []);
}

export class TextClassifier {
  private readonly lexicons: Lexicons;

  constructor(lexicons: Lexicons = loadLexicons()) {
    this.lexicons = lexicons;
  }

  sentiment(text: string): Sentiment {
    if (!text) return 'neutral';

    let positiveCount = 0;
    let negativeCount = 0;
    for (const word of tokenize(text)) {
      if (this.lexicons.positive.has(word)) positiveCount++;
      if (this.lexicons.negative.has(word)) negativeCount++;
    }

    if (positiveCount > negativeCount) return 'positive';
    if (negativeCount > positiveCount) return 'negative';
    return 'neutral';
  }

  /** Categories in catalogue order; each appears at most once. */
  categories(text: string): Category[] {
    if (!text) return [];

    const lower = text.toLowerCase();
    return this.lexicons.categories
      .filter(entry => entry.keywords.some(keyword => lower.includes(keyword)))
      .map(entry => entry.category);
  }

  describeCategories(): CategoryDescription[] {
    return this.lexicons.categories.map(entry => ({
      category: entry.category,
      description: entry.description,
      keywords: [...entry.keywords],
    }));
  }
}
