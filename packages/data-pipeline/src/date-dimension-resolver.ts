import { toDateKey } from '@medwarehouse/core';

export type DateKeyResolver = (timestamp: string | null) => number | null;

/**
 * Resolves a timestamp to its `dim_dates` key. Dates outside the populated
 * calendar resolve to null, and so do missing or unparseable timestamps.
 */
export function createDateDimensionResolver(dateKeys: ReadonlySet<number>): DateKeyResolver {
  return (timestamp) => {
    const dateKey = toDateKey(timestamp);
    if (dateKey === null || !dateKeys.has(dateKey)) {
      return null;
    }
    return dateKey;
  };
}
