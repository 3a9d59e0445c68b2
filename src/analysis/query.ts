import { z } from 'zod';
import { InvalidQueryError } from '../errors';
import { CATEGORIES, SENTIMENTS } from '../types';
import type { FilterQuery } from '../types';
import { splitList } from '../utils';
import { DEFAULT_QUERY } from './ranker';

export type QueryParams = Record<string, unknown>;

const list = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => {
    if (value === undefined) return [];
    const joined = Array.isArray(value) ? value.join(',') : value;
    return splitList(joined);
  });

const decimal = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` });
        return z.NEVER;
      }
      return parsed;
    });

const querySchema = z
  .object({
    keywords: list,
    categories: list.transform(items => items.map(item => item.toLowerCase())).pipe(z.array(z.enum(CATEGORIES, {
      errorMap: () => ({ message: `must be one of ${CATEGORIES.join(', ')}` }),
    }))),
    min_rating: decimal(DEFAULT_QUERY.minRating).pipe(z.number().min(0).max(5)),
    max_rating: decimal(DEFAULT_QUERY.maxRating).pipe(z.number().min(0).max(5)),
    sentiment: z
      .string()
      .trim()
      .optional()
      .transform(value => (value ? value.toLowerCase() : undefined))
      .pipe(z.enum(SENTIMENTS).optional()),
    sort_by: z
      .string()
      .trim()
      .optional()
      .transform(value => (value ? value.toLowerCase() : DEFAULT_QUERY.sortBy)),
    limit: decimal(DEFAULT_QUERY.limit).pipe(z.number().int().positive()),
  })
  .refine(query => query.min_rating <= query.max_rating, {
    message: 'min_rating must not exceed max_rating',
    path: ['min_rating'],
  });

/**
 * Builds a FilterQuery from request-style parameters (comma separated
 * lists, numbers as strings). Rejects malformed values instead of
 * falling back to defaults.
 */
export function parseFilterQuery(params: QueryParams): FilterQuery {
  const parsed = querySchema.safeParse(params);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      field: issue.path.length > 0 ? String(issue.path[0]) : 'query',
      message: issue.message,
    }));
    throw new InvalidQueryError(
      `Invalid filter: ${issues.map(issue => `${issue.field} ${issue.message}`).join('; ')}`,
      issues
    );
  }

  const { keywords, categories, min_rating, max_rating, sentiment, sort_by, limit } = parsed.data;
  return {
    keywords,
    categories,
    minRating: min_rating,
    maxRating: max_rating,
    sentiment,
    sortBy: sort_by,
    limit,
  };
}
