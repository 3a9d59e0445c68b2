export { ReviewClient } from "./sdk";
export { ApiError } from "./errors";
export type { ReviewsData, SearchData, PlatformsData, SearchOptions } from "./types";
