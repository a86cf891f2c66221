import type { ISODate } from "@daybook/sdk";

import type { TradingCalendar } from "./clock.js";
import { fromMinorUnits, roundMoney, toMinorUnits } from "./money.js";
import type { Lot, Position, Valuation } from "./types.js";

/**
 * Query side of the ledger. Everything returned is a frozen copy.
 */
export interface ReadonlyLedger {
  readonly initialCash: number;
  cash(): number;
  /** Number of fills applied so far; the last transaction's sequence. */
  sequence(): number;
  position(instrumentId: string): Position | null;
  positions(): ReadonlyArray<Position>;
  settledQuantity(instrumentId: string, asOf: ISODate): number;
  /**
   * Values holdings at `prices`; an instrument without a price is valued at its average cost.
   */
  markToMarket(prices: Readonly<Record<string, number>>): Valuation;
}

export interface LedgerOptions {
  readonly initialCash: number;
  readonly calendar: TradingCalendar;
  readonly settlementLagDays: number;
}

export interface Fill {
  readonly instrumentId: string;
  readonly quantity: number;
  readonly price: number;
  readonly date: ISODate;
  /** Signed: -(notional + costs) for buys, notional - costs for sells. */
  readonly cashDelta: number;
}

export interface AppliedFill {
  readonly sequence: number;
  readonly cashAfter: number;
  readonly realizedPnl: number;
}

interface MutableLot {
  quantity: number;
  readonly price: number;
  readonly acquiredOn: ISODate;
  readonly settlesOn: ISODate | null;
}

interface PositionState {
  quantity: number;
  averageCost: number;
  lots: MutableLot[];
}

const isSettled = (lot: MutableLot, asOf: ISODate): boolean =>
  lot.settlesOn !== null && lot.settlesOn <= asOf;

const freezePosition = (instrumentId: string, state: PositionState): Position =>
  Object.freeze({
    instrumentId,
    quantity: state.quantity,
    averageCost: state.averageCost,
    lots: Object.freeze(state.lots.map((lot): Lot => Object.freeze({ ...lot }))),
  });

/**
 * Cash and holdings of one run. Cash is kept in integer minor units.
 * Mutation happens only through order execution.
 */
export class PortfolioLedger implements ReadonlyLedger {
  public readonly initialCash: number;

  private cashMinor: number;
  private seq = 0;
  private readonly holdings = new Map<string, PositionState>();
  private readonly calendar: TradingCalendar;
  private readonly settlementLagDays: number;

  public constructor(options: LedgerOptions) {
    this.cashMinor = toMinorUnits(options.initialCash);
    this.initialCash = fromMinorUnits(this.cashMinor);
    this.calendar = options.calendar;
    this.settlementLagDays = options.settlementLagDays;
  }

  public cash(): number {
    return fromMinorUnits(this.cashMinor);
  }

  public sequence(): number {
    return this.seq;
  }

  public position(instrumentId: string): Position | null {
    const state = this.holdings.get(instrumentId);
    return state ? freezePosition(instrumentId, state) : null;
  }

  public positions(): ReadonlyArray<Position> {
    return Object.freeze(
      Array.from(this.holdings.entries())
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([instrumentId, state]) => freezePosition(instrumentId, state)),
    );
  }

  public settledQuantity(instrumentId: string, asOf: ISODate): number {
    const state = this.holdings.get(instrumentId);
    if (!state) {
      return 0;
    }
    return state.lots.reduce((total, lot) => (isSettled(lot, asOf) ? total + lot.quantity : total), 0);
  }

  public markToMarket(prices: Readonly<Record<string, number>>): Valuation {
    let marketValueMinor = 0;
    for (const [instrumentId, state] of this.holdings) {
      const price = prices[instrumentId] ?? state.averageCost;
      marketValueMinor += toMinorUnits(price * state.quantity);
    }
    return {
      cash: fromMinorUnits(this.cashMinor),
      marketValue: fromMinorUnits(marketValueMinor),
      equity: fromMinorUnits(this.cashMinor + marketValueMinor),
    };
  }

  /**
   * Adds a lot and debits cash. The lot settles `settlementLagDays` trading days after `fill.date`.
   * @throws Error when cash would go negative.
   */
  public applyBuy(fill: Fill): AppliedFill {
    const deltaMinor = toMinorUnits(fill.cashDelta);
    if (this.cashMinor + deltaMinor < 0) {
      throw new Error(`Buy of ${fill.quantity} ${fill.instrumentId} would overdraw cash`);
    }
    const state = this.holdings.get(fill.instrumentId) ?? { quantity: 0, averageCost: 0, lots: [] };
    const quantity = state.quantity + fill.quantity;
    state.averageCost = (state.averageCost * state.quantity + fill.price * fill.quantity) / quantity;
    state.quantity = quantity;
    state.lots.push({
      quantity: fill.quantity,
      price: fill.price,
      acquiredOn: fill.date,
      settlesOn: this.calendar.offset(fill.date, this.settlementLagDays),
    });
    this.holdings.set(fill.instrumentId, state);
    this.cashMinor += deltaMinor;
    this.seq += 1;
    return { sequence: this.seq, cashAfter: fromMinorUnits(this.cashMinor), realizedPnl: 0 };
  }

  /**
   * Removes settled shares oldest lot first and credits cash. Average cost is unchanged;
   * a position sold down to zero is removed.
   * @throws Error when fewer than `fill.quantity` shares are settled on `fill.date`.
   */
  public applySell(fill: Fill): AppliedFill {
    const state = this.holdings.get(fill.instrumentId);
    const settled = this.settledQuantity(fill.instrumentId, fill.date);
    if (!state || settled < fill.quantity) {
      throw new Error(
        `Sell of ${fill.quantity} ${fill.instrumentId} exceeds settled quantity ${settled}`,
      );
    }

    let remaining = fill.quantity;
    for (const lot of state.lots) {
      if (remaining === 0) {
        break;
      }
      if (!isSettled(lot, fill.date)) {
        continue;
      }
      const taken = Math.min(lot.quantity, remaining);
      lot.quantity -= taken;
      remaining -= taken;
    }
    state.lots = state.lots.filter((lot) => lot.quantity > 0);
    state.quantity -= fill.quantity;

    const realizedPnl = roundMoney((fill.price - state.averageCost) * fill.quantity);
    if (state.quantity === 0) {
      this.holdings.delete(fill.instrumentId);
    }

    this.cashMinor += toMinorUnits(fill.cashDelta);
    this.seq += 1;
    return { sequence: this.seq, cashAfter: fromMinorUnits(this.cashMinor), realizedPnl };
  }
}
