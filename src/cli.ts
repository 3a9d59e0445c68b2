import { pathToFileURL } from 'url';
import type { FilterQuery, ScrapeOptions } from './types';
import { ReviewScraperError } from './errors';
import { createReviewScraper } from './scraper';
import type { ReviewScraper } from './scraper';
import { parseFilterQuery } from './analysis/query';
import type { QueryParams } from './analysis/query';
import { RateLimiter } from './utils';
import { formatBatchOutput, formatOutput, loadUrlsFromFile, saveToFile } from './output';
import type { OutputFormat } from './output';
import type { BatchResult } from './json-output';

export interface CliOptions {
  urls: string[];
  batchFile?: string;
  platform?: string;
  filter: QueryParams;
  format: OutputFormat;
  saveTo?: string;
  listPlatforms: boolean;
  listCategories: boolean;
  help: boolean;
}

export const USAGE = `
Usage: review-sift <url...> [options]

Options:
  --platform <id>         Use this platform's selectors instead of detecting from the URL
  --keywords <a,b>        Keep reviews mentioning these keywords
  --categories <a,b>      Keep reviews in these categories
  --min-rating <n>        Minimum rating (default: 0)
  --max-rating <n>        Maximum rating (default: 5)
  --sentiment <type>      positive, negative or neutral
  --sort <key>            relevance, rating, date or length (default: relevance)
  --limit <n>             Maximum reviews per page (default: 50)
  --format <type>         Output format: text, json (default: text)
  --save <filename>       Save the report under reports/
  --batch <file>          Read URLs from a file, one per line
  --platforms             List supported platforms
  --categories-list       List review categories
  --help                  Show this help message

Examples:
  review-sift https://www.walmart.com/ip/standing-desk --keywords assembly,setup
  review-sift https://www.target.com/p/chair --categories comfort,quality --min-rating 4
  review-sift --batch urls.txt --format json --save desks
`;

const FILTER_FLAGS: Record<string, string> = {
  '--keywords': 'keywords',
  '--categories': 'categories',
  '--min-rating': 'min_rating',
  '--max-rating': 'max_rating',
  '--sentiment': 'sentiment',
  '--sort': 'sort_by',
  '--limit': 'limit',
};

function invalidArgs(message: string): ReviewScraperError {
  return new ReviewScraperError(message, 'INVALID_ARGS', false);
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    urls: [],
    filter: {},
    format: 'text',
    listPlatforms: false,
    listCategories: false,
    help: args.length === 0,
  };

  const valueFor = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw invalidArgs(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (Object.hasOwn(FILTER_FLAGS, arg)) {
      options.filter[FILTER_FLAGS[arg]] = valueFor(arg, i++);
      continue;
    }

    switch (arg) {
      case '--help':
        options.help = true;
        break;

      case '--platform':
        options.platform = valueFor(arg, i++);
        break;

      case '--format': {
        const format = valueFor(arg, i++);
        if (format !== 'text' && format !== 'json') {
          throw invalidArgs(`Invalid format: ${format}. Must be text or json`);
        }
        options.format = format;
        break;
      }

      case '--save':
        options.saveTo = valueFor(arg, i++);
        break;

      case '--batch':
        options.batchFile = valueFor(arg, i++);
        break;

      case '--platforms':
        options.listPlatforms = true;
        break;

      case '--categories-list':
        options.listCategories = true;
        break;

      default:
        if (arg.startsWith('--')) {
          throw invalidArgs(`Unknown option: ${arg}. Use --help for usage information`);
        }
        options.urls.push(arg);
    }
  }

  return options;
}

async function searchOne(
  scraper: ReviewScraper,
  url: string,
  query: FilterQuery,
  options: ScrapeOptions
): Promise<BatchResult> {
  try {
    const result = await scraper.search(url, query, options);
    return { url, result };
  } catch (error) {
    return {
      url,
      error: error instanceof Error ? error.message : String(error),
      code: error instanceof ReviewScraperError ? error.code : undefined,
    };
  }
}

export async function run(args: string[]): Promise<string> {
  const options = parseArgs(args);
  if (options.help) return USAGE;

  const scraper = createReviewScraper();
  try {
    if (options.listPlatforms) {
      return scraper.platforms().map(p => `${p.id.padEnd(18)} ${p.name} (${p.domain})`).join('\n');
    }
    if (options.listCategories) {
      return scraper.categories().map(c => `${c.category.padEnd(18)} ${c.description}`).join('\n');
    }

    // Validate the filter before any page is fetched.
    const query = parseFilterQuery(options.filter);
    const scrapeOptions: ScrapeOptions = { platform: options.platform };

    const urls = options.batchFile ? await loadUrlsFromFile(options.batchFile) : options.urls;
    if (urls.length === 0) {
      throw invalidArgs('No URL provided. Use --help for usage information');
    }

    let output: string;
    if (urls.length === 1 && !options.batchFile) {
      const result = await scraper.search(urls[0], query, scrapeOptions);
      output = formatOutput(result, options.format);
    } else {
      const limiter = new RateLimiter(1, 1000);
      const results = await Promise.all(urls.map(url => limiter.execute(() => searchOne(scraper, url, query, scrapeOptions))));
      output = formatBatchOutput(results, options.format);
    }

    if (options.saveTo) {
      const saved = await saveToFile(output, options.saveTo, options.format);
      output += `\n✓ Report saved to: ${saved}\n`;
    }
    return output;
  } finally {
    await scraper.dispose();
  }
}

const isMain = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  run(process.argv.slice(2))
    .then(output => console.log(output))
    .catch((error: unknown) => {
      if (error instanceof ReviewScraperError) {
        console.error(`\n❌ Error [${error.code}]: ${error.message}\n`);
      } else {
        console.error('\n❌ Unexpected error:', error);
      }
      process.exit(1);
    });
}
