import type { ISODate, IndicatorSet, MarketBar } from "@daybook/sdk";

import { BarNotFoundError, InsufficientHistoryError } from "./errors.js";
import type { InstrumentFeed } from "./InstrumentFeed.js";
import { computeIndicators, MIN_INDICATOR_BARS } from "./indicators.js";
import { dedupeAndSort, lastIndexOnOrBefore, sanitizeBar } from "./internalUtils.js";

interface InstrumentSeries {
  readonly bars: ReadonlyArray<MarketBar>;
  readonly byDate: ReadonlyMap<ISODate, MarketBar>;
  readonly dates: ReadonlyArray<ISODate>;
}

export type BarsByInstrument = Readonly<Record<string, ReadonlyArray<MarketBar>>>;

/**
 * Immutable in-memory time-series store. Bars are validated, frozen and sorted on construction.
 */
export class MemoryFeed implements InstrumentFeed {
  public readonly id = "memory";

  private readonly series: ReadonlyMap<string, InstrumentSeries>;

  public constructor(bars: Iterable<unknown>) {
    const grouped = new Map<string, MarketBar[]>();
    for (const candidate of bars) {
      const bar = sanitizeBar(candidate);
      if (!bar) {
        continue;
      }
      const list = grouped.get(bar.instrumentId) ?? [];
      list.push(bar);
      grouped.set(bar.instrumentId, list);
    }

    const series = new Map<string, InstrumentSeries>();
    for (const [instrumentId, list] of grouped) {
      const sorted = Object.freeze(dedupeAndSort(list));
      series.set(instrumentId, {
        bars: sorted,
        byDate: new Map(sorted.map((bar) => [bar.date, bar])),
        dates: Object.freeze(sorted.map((bar) => bar.date)),
      });
    }
    this.series = series;
  }

  public static fromSeries(barsByInstrument: BarsByInstrument): MemoryFeed {
    return new MemoryFeed(Object.values(barsByInstrument).flat());
  }

  public instruments(): ReadonlyArray<string> {
    return Array.from(this.series.keys()).sort();
  }

  public dates(instrumentId: string): ReadonlyArray<ISODate> {
    return this.series.get(instrumentId)?.dates ?? [];
  }

  public getBar(instrumentId: string, date: ISODate): MarketBar {
    const bar = this.series.get(instrumentId)?.byDate.get(date);
    if (!bar) {
      throw new BarNotFoundError(instrumentId, date);
    }
    return bar;
  }

  public getHistory(instrumentId: string, asOf: ISODate, lookback: number): ReadonlyArray<MarketBar> {
    const bars = this.series.get(instrumentId)?.bars;
    if (!bars || lookback <= 0) {
      return [];
    }
    const end = lastIndexOnOrBefore(bars, asOf);
    if (end < 0) {
      return [];
    }
    return bars.slice(Math.max(0, end - lookback + 1), end + 1);
  }

  public getIndicators(instrumentId: string, date: ISODate, window: number): IndicatorSet {
    this.getBar(instrumentId, date);
    const history = this.getHistory(instrumentId, date, Math.max(window, MIN_INDICATOR_BARS));
    if (history.length < MIN_INDICATOR_BARS) {
      throw new InsufficientHistoryError(instrumentId, date, history.length, MIN_INDICATOR_BARS);
    }
    return Object.freeze(computeIndicators(history));
  }
}
