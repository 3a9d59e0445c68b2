import { z } from "zod";
import { loadConfig } from "../../../src/config";
import { ApiError } from "./errors";
import {
  errorBodySchema,
  platformsDataSchema,
  reviewsDataSchema,
  searchDataSchema,
} from "./types";
import type { PlatformsData, ReviewsData, SearchData, SearchOptions } from "./types";

const envelopeSchema = z.object({ success: z.literal(true), data: z.unknown() });

export class ReviewClient {
  private readonly baseUrl: string;

  constructor(config: { baseUrl?: string } = {}) {
    this.baseUrl = (config.baseUrl ?? loadConfig().apiUrl).replace(/\/+$/, "");
  }

  private async get<T extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string | undefined>,
    schema: T,
  ): Promise<z.infer<T>> {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") query.set(key, value);
    }
    const qs = query.toString();

    const res = await fetch(`${this.baseUrl}${path}${qs ? `?${qs}` : ""}`, {
      headers: { Accept: "application/json" },
    });
    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      throw new ApiError(
        `API error: ${res.status}`,
        res.ok ? "BAD_RESPONSE" : "API_ERROR",
        res.status,
        err instanceof Error ? err : undefined,
      );
    }

    if (!res.ok) {
      const parsed = errorBodySchema.safeParse(json);
      throw parsed.success
        ? new ApiError(parsed.data.error, parsed.data.code, res.status)
        : new ApiError(`API error: ${res.status}`, "API_ERROR", res.status);
    }

    const envelope = envelopeSchema.safeParse(json);
    const data = envelope.success ? schema.safeParse(envelope.data.data) : undefined;
    if (!data?.success) {
      throw new ApiError(`Unexpected response from ${path}`, "BAD_RESPONSE", res.status);
    }
    return data.data;
  }

  async reviews(url: string, platform?: string): Promise<ReviewsData> {
    return this.get("/reviews", { url, platform }, reviewsDataSchema);
  }

  async search(url: string, options: SearchOptions = {}): Promise<SearchData> {
    return this.get(
      "/search",
      {
        url,
        platform: options.platform,
        keywords: options.keywords?.join(","),
        categories: options.categories?.join(","),
        min_rating: options.minRating?.toString(),
        max_rating: options.maxRating?.toString(),
        sentiment: options.sentiment,
        sort_by: options.sortBy,
        limit: options.limit?.toString(),
      },
      searchDataSchema,
    );
  }

  async platforms(): Promise<PlatformsData> {
    return this.get("/platforms", {}, platformsDataSchema);
  }
}
