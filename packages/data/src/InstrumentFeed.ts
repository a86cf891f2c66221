import type { DataRequest, ISODate, IndicatorSet, MarketBar } from "@daybook/sdk";

/**
 * Read side of the immutable time-series store, keyed by instrument and date.
 */
export interface InstrumentFeed {
  readonly id: string;
  /** Ids of every instrument the feed holds. */
  instruments(): ReadonlyArray<string>;
  /** Dates with a bar for the instrument, ascending. */
  dates(instrumentId: string): ReadonlyArray<ISODate>;
  /** @throws BarNotFoundError when the instrument has no bar on `date`. */
  getBar(instrumentId: string, date: ISODate): MarketBar;
  /** The last `lookback` bars dated on or before `asOf`, oldest first. */
  getHistory(instrumentId: string, asOf: ISODate, lookback: number): ReadonlyArray<MarketBar>;
  /**
   * Indicators computed over the last `window` bars dated on or before `date`.
   * @throws InsufficientHistoryError when the window holds too few bars.
   */
  getIndicators(instrumentId: string, date: ISODate, window: number): IndicatorSet;
}

/**
 * Generic contract for loading one instrument's daily series from storage.
 */
export interface BarLoader {
  readonly id: string;
  loadBars(request: DataRequest): Promise<ReadonlyArray<MarketBar>>;
}
