const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateRangePartition {
  partitionId: string;
  since: string; // YYYY-MM-DD, inclusive
  until: string; // YYYY-MM-DD, exclusive
  query: string;
}

export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function daysBetween(begin: Date, end: Date): number {
  return Math.floor((startOfUtcDay(end) - startOfUtcDay(begin)) / DAY_MS);
}

/**
 * Splits `[begin, end]` into at most `poolSize` contiguous sub-ranges with
 * boundaries at `floor(i * days / P)`. The pool is clamped to the number
 * of days so no partition is empty.
 */
export function partitionDateRange(
  query: string,
  begin: Date,
  end: Date,
  poolSize: number
): DateRangePartition[] {
  const days = daysBetween(begin, end);
  if (days < 1) {
    throw new RangeError(`Date range ${toDateString(begin)}..${toDateString(end)} spans no whole day`);
  }
  if (!Number.isInteger(poolSize) || poolSize < 1) {
    throw new RangeError(`Pool size must be a positive integer, got ${poolSize}`);
  }

  const partitions = Math.min(poolSize, days);
  const origin = startOfUtcDay(begin);
  const boundaries = Array.from({ length: partitions + 1 }, (_, i) =>
    toDateString(new Date(origin + Math.floor((i * days) / partitions) * DAY_MS))
  );

  return boundaries.slice(0, -1).map((since, i) => {
    const until = boundaries[i + 1];
    return {
      partitionId: `partition-${i}`,
      since,
      until,
      query: `${query} since:${since} until:${until}`,
    };
  });
}

/** Slight over-allocation so per-partition overshoot still reaches the global limit. */
export function partitionLimit(limit: number | undefined, partitions: number): number | undefined {
  if (limit === undefined || limit <= 0) return undefined;
  return Math.floor(limit / partitions) + 1;
}
