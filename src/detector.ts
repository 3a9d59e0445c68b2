import { logger } from './logger';
import type { SiteRegistry } from './sites';

export class PlatformDetector {
  constructor(private readonly registry: SiteRegistry) {}

  /**
   * Returns the id of the first registered platform whose domain occurs in
   * the URL's host, or undefined when nothing matches or the URL is malformed.
   */
  detect(url: string): string | undefined {
    let host: string;
    try {
      host = new URL(url).host.toLowerCase();
    } catch {
      logger.debug('Could not parse URL for platform detection', { url });
      return undefined;
    }

    for (const [id, config] of this.registry.entries()) {
      if (host.includes(config.domain)) {
        return id;
      }
    }
    return undefined;
  }
}
