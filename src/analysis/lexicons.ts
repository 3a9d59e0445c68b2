import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { CATEGORIES } from '../types';
import type { Category } from '../types';

const categoryEntrySchema = z.object({
  description: z.string(),
  keywords: z.array(z.string().min(1)).min(1),
});

const lexiconSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)),
  categories: z.record(z.enum(CATEGORIES), categoryEntrySchema),
});

export interface CategoryLexicon {
  category: Category;
  description: string;
  keywords: readonly string[];
}

export interface Lexicons {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
  categories: readonly CategoryLexicon[];
}

let cached: Lexicons | undefined;

export function loadLexicons(): Lexicons {
  if (cached) return cached;

  const file = fileURLToPath(new URL('../data/lexicons.json', import.meta.url));
  const parsed = lexiconSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
  if (!parsed.success) {
    throw new ConfigError(`Invalid lexicon file ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }

  const { positive, negative, categories } = parsed.data;
  const ordered: CategoryLexicon[] = [];
  for (const category of CATEGORIES) {
    const entry = categories[category];
    if (!entry) {
      throw new ConfigError(`Lexicon file ${file} has no keywords for category "${category}"`);
    }
    ordered.push({
      category,
      description: entry.description,
      keywords: entry.keywords.map(keyword => keyword.toLowerCase()),
    });
  }

  cached = {
    positive: new Set(positive.map(word => word.toLowerCase())),
    negative: new Set(negative.map(word => word.toLowerCase())),
    categories: ordered,
  };
  return cached;
}
