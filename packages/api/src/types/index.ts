export type {
  ApiSuccess,
  ErrorResponse,
  ApiResult,
  CleanReview,
  CleanAnnotatedReview,
  ReviewsData,
  SearchData,
  PlatformsData,
  CategoriesData,
} from "./api";
