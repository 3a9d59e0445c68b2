import { ReviewScraperError } from "../../../src/errors";

export class ApiError extends ReviewScraperError {
  constructor(message: string, code: string, public readonly status: number, cause?: Error) {
    super(message, code, status === 429 || status >= 500, cause);
    this.name = "ApiError";
  }
}
