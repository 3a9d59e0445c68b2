import { Engine } from '../engine';
import type { EngineOptions, RawPage } from '../types';
import { NetworkError } from '../errors';
import { logger } from '../logger';

const DEFAULT_TIMEOUT = 10000;

export interface HttpEngineConfig {
  userAgent: string;
  timeout?: number;
}

function toNetworkError(error: unknown, url: string, timeout: number): NetworkError {
  const cause = error instanceof Error ? error : undefined;
  if (cause && (cause.name === 'TimeoutError' || cause.name === 'AbortError')) {
    return new NetworkError(`Request to ${url} timed out after ${timeout}ms`, true, undefined, cause);
  }
  return new NetworkError(`Request to ${url} failed: ${cause?.message ?? String(error)}`, true, undefined, cause);
}

async function discardBody(response: Response, url: string): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug('Could not release response body', {
      url,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

export class HttpEngine extends Engine {
  constructor(private readonly config: HttpEngineConfig) {
    super();
  }

  async fetch(url: string, options: EngineOptions = {}): Promise<RawPage> {
    const timeout = options.timeout ?? this.config.timeout ?? DEFAULT_TIMEOUT;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
          ...options.headers,
        },
        redirect: 'follow',
        signal: AbortSignal.timeout(timeout),
      });
    } catch (error) {
      throw toNetworkError(error, url, timeout);
    }

    const { status } = response;
    if (status >= 400) {
      await discardBody(response, url);
    }
    if (status === 429) {
      throw new NetworkError(`Rate limited by ${new URL(url).host}`, true, status);
    }
    if (status >= 500) {
      throw new NetworkError(`Server error ${status}: ${response.statusText}`, true, status);
    }
    if (status >= 400) {
      throw new NetworkError(`HTTP error ${status}: ${response.statusText}`, false, status);
    }

    // The timeout signal stays armed while the body streams in.
    let html: string;
    try {
      html = await response.text();
    } catch (error) {
      throw toNetworkError(error, url, timeout);
    }

    return { url: response.url || url, status, html };
  }

  async dispose(): Promise<void> {}
}
