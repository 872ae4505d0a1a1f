import { InvalidArgumentError } from './errors';

export const TIME_RANGES = ['short_term', 'medium_term', 'long_term'] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export const DEFAULT_TIME_RANGE: TimeRange = 'medium_term';
export const DEFAULT_RESULT_LIMIT = 20;
export const DEFAULT_SEARCH_LIMIT = 10;
export const MIN_RESULT_LIMIT = 1;
export const MAX_RESULT_LIMIT = 50;

export function isTimeRange(value: string): value is TimeRange {
  return (TIME_RANGES as readonly string[]).includes(value);
}

/**
 * Check optional top-items parameters. Absent values are always valid;
 * defaults are applied by the caller.
 */
export function validate(timeRange?: string | null, limit?: number | null): void {
  if (timeRange != null && !isTimeRange(timeRange)) {
    throw new InvalidArgumentError(
      'timeRange',
      `Invalid time range: ${timeRange}. Valid options: ${TIME_RANGES.join(', ')}`,
    );
  }
  if (
    limit != null &&
    (!Number.isInteger(limit) || limit < MIN_RESULT_LIMIT || limit > MAX_RESULT_LIMIT)
  ) {
    throw new InvalidArgumentError(
      'limit',
      `Invalid limit ${limit}. Limit must be between ${MIN_RESULT_LIMIT} and ${MAX_RESULT_LIMIT}`,
    );
  }
}

/** Validate, then fill in defaults. */
export function resolveTopOptions(opts: { timeRange?: string | null; limit?: number | null }): {
  timeRange: TimeRange;
  limit: number;
} {
  const { timeRange, limit } = opts;
  validate(timeRange, limit);
  return {
    timeRange: timeRange != null && isTimeRange(timeRange) ? timeRange : DEFAULT_TIME_RANGE,
    limit: limit ?? DEFAULT_RESULT_LIMIT,
  };
}
