const WORD_CHAR = '[\\p{L}\\p{N}_]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

function countWholeWords(haystack: string, needle: string): number {
  const pattern = new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(needle)}(?!${WORD_CHAR})`, 'gu');
  return haystack.match(pattern)?.length ?? 0;
}

/**
 * Keyword density score in [0, 1].
 *
 * Whole-word hits count twice, hits inside longer words once; the sum is
 * normalised against two hits per keyword.
 */
export class RelevanceScorer {
  score(text: string, keywords: readonly string[]): number {
    if (!text || keywords.length === 0) return 0;

    const lower = text.toLowerCase();
    let totalMatches = 0;

    for (const keyword of keywords) {
      const needle = keyword.toLowerCase();
      if (!needle) continue;

      const exact = countWholeWords(lower, needle);
      const partial = Math.max(countOccurrences(lower, needle) - exact, 0);
      totalMatches += exact * 2 + partial;
    }

    return Math.min(totalMatches / (keywords.length * 2), 1);
  }
}
