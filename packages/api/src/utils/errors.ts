import {
  InvalidQueryError,
  InvalidUrlError,
  NetworkError,
  ReviewScraperError,
  UnsupportedPlatformError,
} from "../../../../src/errors";
import { logger } from "../../../../src/logger";
import type { ApiResult } from "../types";

export function failure(status: number, error: string, code: string): ApiResult<never> {
  return { status, body: { success: false, error, code } };
}

export function toErrorResult(err: unknown, operation: string): ApiResult<never> {
  if (err instanceof UnsupportedPlatformError) {
    return {
      status: 400,
      body: {
        success: false,
        error: err.message,
        code: err.code,
        supportedPlatforms: err.supportedPlatforms,
      },
    };
  }
  if (err instanceof InvalidQueryError) {
    return {
      status: 400,
      body: { success: false, error: err.message, code: err.code, issues: err.issues },
    };
  }
  if (err instanceof InvalidUrlError) {
    return failure(400, err.message, err.code);
  }
  if (err instanceof NetworkError) {
    logger.warn(`${operation} failed to fetch the page`, { status: err.status, reason: err.message });
    return failure(502, `${operation} failed: ${err.message}`, err.code);
  }

  logger.error(`${operation} failed`, err);
  const code = err instanceof ReviewScraperError ? err.code : "INTERNAL_ERROR";
  return failure(500, `${operation} failed: ${err instanceof Error ? err.message : String(err)}`, code);
}
