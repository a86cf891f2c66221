import type { ISODate } from "@daybook/sdk";

import type { BarLoader, InstrumentFeed } from "./InstrumentFeed.js";
import { MemoryFeed } from "./MemoryFeed.js";

export interface DateRange {
  readonly start?: ISODate;
  readonly end?: ISODate;
}

/**
 * Trading days inside the range: every date on which at least one universe member has a bar.
 */
export const buildTradingCalendar = (
  feed: InstrumentFeed,
  universe: ReadonlyArray<string>,
  range: DateRange = {},
): ISODate[] => {
  const dates = new Set<ISODate>();
  for (const instrumentId of universe) {
    for (const date of feed.dates(instrumentId)) {
      if ((range.start && date < range.start) || (range.end && date > range.end)) {
        continue;
      }
      dates.add(date);
    }
  }
  return Array.from(dates).sort();
};

/**
 * Loads each instrument's full series through `loader` into a {@link MemoryFeed}.
 * Range filtering happens at calendar construction so indicator warm-up bars stay available.
 */
export const loadMemoryFeed = async (
  loader: BarLoader,
  universe: ReadonlyArray<string>,
): Promise<MemoryFeed> => {
  const series = await Promise.all(
    universe.map((instrumentId) => loader.loadBars({ instrumentId })),
  );
  return new MemoryFeed(series.flat());
};
