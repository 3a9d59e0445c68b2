import type { DocumentNode, ReviewDocument } from './document';
import { MalformedElementError } from './errors';
import { logger } from './logger';
import type { Review, SiteConfig } from './types';

const RATING_PATTERN = /(\d+(?:\.\d+)?)/;

export interface ExtractionContext {
  platformId: string;
  sourceUrl: string;
}

export function parseRating(node: DocumentNode | undefined): number {
  if (!node) return 0;
  const label = node.attr('aria-label');
  const source = label ? label : node.text();
  const match = source.match(RATING_PATTERN);
  return match ? parseFloat(match[1]) : 0;
}

export function parseDate(node: DocumentNode | undefined): string {
  if (!node) return '';
  const datetime = node.attr('datetime');
  return datetime ? datetime.trim() : node.text().trim();
}

function readText(node: DocumentNode | undefined): string {
  return node ? node.text().trim() : '';
}

/**
 * Turns a parsed page into review records using a platform's selectors.
 * Nothing here knows about individual platforms.
 */
export class ReviewExtractor {
  extract(document: ReviewDocument, config: SiteConfig, context: ExtractionContext): Review[] {
    const containers = document.selectAll(config.reviewContainer).slice(0, config.maxReviews);
    const reviews: Review[] = [];

    containers.forEach((container, index) => {
      try {
        const review = this.extractOne(container, config, context);
        if (review) reviews.push(review);
      } catch (error) {
        const failure = new MalformedElementError(
          `Could not read review ${index + 1} on ${config.name}`,
          index,
          error instanceof Error ? error : undefined
        );
        logger.warn(failure.message, {
          code: failure.code,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    });

    logger.info(`Retrieved ${reviews.length} reviews from ${config.name}`, {
      containers: containers.length,
      url: context.sourceUrl,
    });
    return reviews;
  }

  private extractOne(container: DocumentNode, config: SiteConfig, context: ExtractionContext): Review | undefined {
    const reviewerName = readText(container.selectFirst(config.reviewerName)) || 'Anonymous';
    const rating = parseRating(container.selectFirst(config.rating));
    const reviewText = readText(container.selectFirst(config.reviewText));
    const date = parseDate(container.selectFirst(config.date));

    if (!reviewText && rating === 0) {
      return undefined;
    }

    return {
      reviewerName,
      rating,
      reviewText,
      date,
      sourceUrl: context.sourceUrl,
      source: `${context.platformId}_scraping`,
      platformName: config.name,
    };
  }
}
