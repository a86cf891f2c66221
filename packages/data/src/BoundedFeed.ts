import type { ISODate, IndicatorSet, MarketBar } from "@daybook/sdk";

import { LookaheadError } from "./errors.js";
import type { InstrumentFeed } from "./InstrumentFeed.js";

/**
 * Wraps a feed so nothing dated after the current as-of date can be read through it.
 * The bound is re-read on every call, so it follows the simulation clock.
 */
export class BoundedFeed implements InstrumentFeed {
  public readonly id: string;

  public constructor(
    private readonly inner: InstrumentFeed,
    private readonly asOf: () => ISODate,
  ) {
    this.id = `bounded:${inner.id}`;
  }

  public instruments(): ReadonlyArray<string> {
    return this.inner.instruments();
  }

  public dates(instrumentId: string): ReadonlyArray<ISODate> {
    const bound = this.asOf();
    return this.inner.dates(instrumentId).filter((date) => date <= bound);
  }

  public getBar(instrumentId: string, date: ISODate): MarketBar {
    this.guard(instrumentId, date);
    return this.inner.getBar(instrumentId, date);
  }

  public getHistory(instrumentId: string, asOf: ISODate, lookback: number): ReadonlyArray<MarketBar> {
    const bound = this.asOf();
    return this.inner.getHistory(instrumentId, asOf < bound ? asOf : bound, lookback);
  }

  public getIndicators(instrumentId: string, date: ISODate, window: number): IndicatorSet {
    this.guard(instrumentId, date);
    return this.inner.getIndicators(instrumentId, date, window);
  }

  private guard(instrumentId: string, date: ISODate): void {
    const bound = this.asOf();
    if (date > bound) {
      throw new LookaheadError(instrumentId, date, bound);
    }
  }
}
