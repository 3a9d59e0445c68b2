import { ReviewScraperError } from './errors';
import { logger } from './logger';

export class RateLimiter {
  private queue: Array<() => Promise<void>> = [];
  private running = 0;
  private lastRequestTime = 0;

  constructor(
    private maxConcurrent: number = 1,
    private minDelay: number = 1000
  ) { }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      this.queue.push(async () => {
        try {
          const now = Date.now();
          const timeSinceLastRequest = now - this.lastRequestTime;
          if (timeSinceLastRequest < this.minDelay) {
            await sleep(this.minDelay - timeSinceLastRequest);
          }

          this.lastRequestTime = Date.now();
          const result = await fn();
          resolve(result);
        } catch (error) {
          reject(error);
        } finally {
          this.running--;
          this.processQueue();
        }
      });

      this.processQueue();
    });
  }

  private processQueue(): void {
    if (this.running >= this.maxConcurrent || this.queue.length === 0) {
      return;
    }

    this.running++;
    const task = this.queue.shift();
    if (task) {
      void task();
    }
  }
}

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

export async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: { maxRetries: number; baseDelay: number; operation: string; backoff?: 'exponential' | 'linear' }
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof ReviewScraperError) || !error.retryable || attempt >= options.maxRetries) {
        throw error;
      }

      const delay = options.backoff === 'linear'
        ? options.baseDelay * (attempt + 1)
        : options.baseDelay * Math.pow(2, attempt);
      logger.warn(`${options.operation} failed, retrying`, {
        attempt: attempt + 1,
        of: options.maxRetries + 1,
        delayMs: delay,
        reason: error.message,
      });
      await sleep(delay);
    }
  }
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
