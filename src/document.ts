import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

/**
 * The subset of DOM access review extraction depends on.
 */
export interface DocumentNode {
  text(): string;
  attr(name: string): string | undefined;
  selectFirst(selector: string): DocumentNode | undefined;
}

export interface ReviewDocument {
  selectAll(selector: string): DocumentNode[];
}

type Selection = ReturnType<ReturnType<CheerioAPI['root']>['find']>;

class CheerioNode implements DocumentNode {
  constructor(private readonly selection: Selection) {}

  text(): string {
    return this.selection.text();
  }

  attr(name: string): string | undefined {
    return this.selection.attr(name);
  }

  selectFirst(selector: string): DocumentNode | undefined {
    const match = this.selection.find(selector).first();
    return match.length > 0 ? new CheerioNode(match) : undefined;
  }
}

export function loadDocument(html: string): ReviewDocument {
  const $ = cheerio.load(html);

  return {
    selectAll(selector: string): DocumentNode[] {
      const matches = $.root().find(selector);
      return matches.toArray().map((_, index) => new CheerioNode(matches.eq(index)));
    },
  };
}
