import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { PlatformSummary, SiteConfig } from './types';

const DEFAULT_RATING_SCALE = 5;
const DEFAULT_MAX_REVIEWS = 10;

const siteEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  domain: z.string().trim().min(1),
  reviewContainer: z.string(),
  reviewerName: z.string(),
  rating: z.string(),
  reviewText: z.string(),
  date: z.string(),
  ratingScale: z.number().positive().default(DEFAULT_RATING_SCALE),
  maxReviews: z.number().int().positive().default(DEFAULT_MAX_REVIEWS),
});

export type SiteEntry = z.input<typeof siteEntrySchema>;

/**
 * Read-only table of supported platforms, keyed by platform id.
 *
 * Iteration follows the order of the source table, which is also the
 * precedence used by platform detection.
 */
export class SiteRegistry {
  private readonly configs: ReadonlyMap<string, SiteConfig>;

  constructor(entries: readonly SiteEntry[]) {
    const configs = new Map<string, SiteConfig>();

    entries.forEach((entry, index) => {
      const parsed = siteEntrySchema.safeParse(entry);
      if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigError(`Invalid site entry at position ${index}: ${detail}`);
      }

      const { id, ...config } = parsed.data;
      if (configs.has(id)) {
        throw new ConfigError(`Duplicate site id: ${id}`);
      }
      configs.set(id, Object.freeze({ ...config, domain: config.domain.toLowerCase() }));
    });

    this.configs = configs;
  }

  lookup(platformId: string): SiteConfig | undefined {
    return this.configs.get(platformId);
  }

  has(platformId: string): boolean {
    return this.configs.has(platformId);
  }

  entries(): IterableIterator<[string, SiteConfig]> {
    return this.configs.entries();
  }

  list(): PlatformSummary[] {
    return [...this.configs].map(([id, config]) => ({ id, name: config.name, domain: config.domain }));
  }

  get size(): number {
    return this.configs.size;
  }
}

export function loadSiteEntries(): SiteEntry[] {
  const file = fileURLToPath(new URL('./data/sites.json', import.meta.url));
  const data: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  const parsed = z.array(siteEntrySchema).safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid site table ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

let defaultRegistry: SiteRegistry | undefined;

export function getSiteRegistry(): SiteRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new SiteRegistry(loadSiteEntries());
  }
  return defaultRegistry;
}
