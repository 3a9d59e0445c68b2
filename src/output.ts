import * as fs from 'fs/promises';
import * as path from 'path';
import type { Insights, SearchResult } from './types';
import { ReviewScraperError } from './errors';
import { formatJsonBatch, formatJsonSingle, formatPercentage } from './json-output';
import type { BatchResult } from './json-output';

export type OutputFormat = 'text' | 'json';

function formatInsights(insights: Insights): string {
  let output = `Average rating: ${insights.averageRating.toFixed(2)}\n`;

  const sentiments = Object.entries(insights.sentimentBreakdown)
    .map(([sentiment, count]) => `${sentiment} ${count}`)
    .join(', ');
  output += `Sentiment: ${sentiments || 'none'}\n`;
  output += `Top categories: ${insights.topCategories.join(', ') || 'none'}\n`;

  const { ratingDistribution: d } = insights;
  output += `Ratings: 5★ ${d['5_star']} | 4★ ${d['4_star']} | 3★ ${d['3_star']} | 2★ ${d['2_star']} | 1★ ${d['1_star']}\n`;
  return output;
}

export function formatOutput(result: SearchResult, format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(formatJsonSingle({ url: result.url, result }), null, 2);
  }

  let output = '\n--- Review Search ---\n\n';
  output += `URL: ${result.url}\n`;
  output += `Platform: ${result.platformName}\n`;
  output += `Found ${result.totalFound} relevant reviews out of ${result.totalScraped} total\n\n`;
  output += formatInsights(result.insights);

  result.reviews.forEach((review, index) => {
    output += `\n[${index + 1}] ${review.reviewerName} · ${review.rating}/5`;
    if (review.date) output += ` · ${review.date}`;
    output += `\n    ${review.sentiment}, relevance ${formatPercentage(review.keywordRelevance)}`;
    if (review.categories.length > 0) output += `, ${review.categories.join(', ')}`;
    output += `\n    ${review.reviewText}\n`;
  });

  output += '\n-----------------------\n';
  return output;
}

export function formatBatchOutput(results: BatchResult[], format: OutputFormat = 'text'): string {
  if (format === 'json') {
    return JSON.stringify(formatJsonBatch(results), null, 2);
  }

  let output = '\n=== BATCH REVIEW RESULTS ===\n\n';
  output += `Total URLs processed: ${results.length}\n`;
  output += `Successful: ${results.filter(r => r.result).length}\n`;
  output += `Failed: ${results.filter(r => !r.result).length}\n`;

  results.forEach(({ url, result, error }, index) => {
    output += `\n--- Page ${index + 1} ---\n`;
    if (!result) {
      output += `URL: ${url}\nERROR: ${error ?? 'Unknown error'}\n`;
    } else {
      output += formatOutput(result);
    }
    output += '\n' + '-'.repeat(50) + '\n';
  });

  return output;
}

export async function saveToFile(output: string, filename: string, format: OutputFormat): Promise<string> {
  const extension = format === 'json' ? '.json' : '.txt';
  const name = filename.endsWith(extension) ? filename : `${filename}${extension}`;

  try {
    const dir = path.join(process.cwd(), 'reports');
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, name), output, 'utf-8');
    return path.join('reports', name);
  } catch (error) {
    throw new ReviewScraperError(
      `Failed to save file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      'FILE_SAVE_FAILED',
      false
    );
  }
}

export async function loadUrlsFromFile(filepath: string): Promise<string[]> {
  try {
    const content = await fs.readFile(filepath, 'utf-8');
    return content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line && !line.startsWith('#'));
  } catch (error) {
    throw new ReviewScraperError(
      `Failed to read URL file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      'FILE_READ_FAILED',
      false
    );
  }
}
