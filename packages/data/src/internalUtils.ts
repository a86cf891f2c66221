import type { DataRequest, MarketBar } from "@daybook/sdk";
import { MarketBarSchema } from "@daybook/sdk";

/**
 * Shared helpers used across loaders and feeds to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

/**
 * Normalises bars that come from caches or hand-written fixtures.
 * Non-numeric optional fields are dropped; anything else failing {@link MarketBarSchema} rejects the bar.
 */
export const sanitizeBar = (maybeBar: unknown): MarketBar | null => {
  if (maybeBar === null || typeof maybeBar !== "object") {
    return null;
  }

  const { amount, pctChange, ...required } = maybeBar as Record<string, unknown>;
  const parsed = MarketBarSchema.safeParse({
    ...required,
    ...(isFiniteNumber(amount) ? { amount } : {}),
    ...(isFiniteNumber(pctChange) ? { pctChange } : {}),
  });
  return parsed.success ? Object.freeze(parsed.data) : null;
};

/**
 * Filters bars by the optional inclusive start/end dates of a {@link DataRequest}.
 */
export const filterBarsForRequest = (
  bars: ReadonlyArray<MarketBar>,
  request: DataRequest,
): ReadonlyArray<MarketBar> => {
  const { start, end } = request;
  if (!start && !end) {
    return bars;
  }
  return bars.filter((bar) => {
    const afterStart = start ? bar.date >= start : true;
    const beforeEnd = end ? bar.date <= end : true;
    return afterStart && beforeEnd;
  });
};

/**
 * Sorts bars by date and keeps the last bar seen for any repeated date.
 */
export const dedupeAndSort = (bars: Iterable<MarketBar>): MarketBar[] => {
  const byDate = new Map<string, MarketBar>();
  for (const bar of bars) {
    byDate.set(bar.date, bar);
  }
  return Array.from(byDate.values()).sort((a, b) => {
    if (a.date === b.date) {
      return 0;
    }
    return a.date < b.date ? -1 : 1;
  });
};

/**
 * Index of the last element whose date is on or before `asOf`, or -1.
 */
export const lastIndexOnOrBefore = (bars: ReadonlyArray<MarketBar>, asOf: string): number => {
  let lo = 0;
  let hi = bars.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const bar = bars[mid];
    if (bar !== undefined && bar.date <= asOf) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
};
