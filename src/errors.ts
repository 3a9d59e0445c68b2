import type { PlatformSummary } from './types';

export class ReviewScraperError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ReviewScraperError';
  }
}

export class UnsupportedPlatformError extends ReviewScraperError {
  constructor(message: string, public readonly supportedPlatforms: PlatformSummary[]) {
    super(message, 'UNSUPPORTED_PLATFORM', false);
    this.name = 'UnsupportedPlatformError';
  }
}

export class NetworkError extends ReviewScraperError {
  constructor(message: string, retryable: boolean, public readonly status?: number, cause?: Error) {
    super(message, 'NETWORK_ERROR', retryable, cause);
    this.name = 'NetworkError';
  }
}

export class MalformedElementError extends ReviewScraperError {
  constructor(message: string, public readonly index: number, cause?: Error) {
    super(message, 'MALFORMED_ELEMENT', false, cause);
    this.name = 'MalformedElementError';
  }
}

export interface QueryIssue {
  field: string;
  message: string;
}

export class InvalidQueryError extends ReviewScraperError {
  constructor(message: string, public readonly issues: QueryIssue[] = []) {
    super(message, 'INVALID_QUERY', false);
    this.name = 'InvalidQueryError';
  }
}

export class InvalidUrlError extends ReviewScraperError {
  constructor(message: string) {
    super(message, 'INVALID_URL', false);
    this.name = 'InvalidUrlError';
  }
}

export class ConfigError extends ReviewScraperError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', false);
    this.name = 'ConfigError';
  }
}
