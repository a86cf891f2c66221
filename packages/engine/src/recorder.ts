import type {
  ISODate,
  PerformanceSnapshot,
  Rejection,
  RunSummary,
  Transaction,
} from "@daybook/sdk";
import { calculateMetricsSummary, type EquityPoint } from "@daybook/metrics";

import { fromMinorUnits, toMinorUnits } from "./money.js";

export interface DayValuation {
  readonly date: ISODate;
  readonly cash: number;
  readonly marketValue: number;
}

/**
 * Append-only record of a run: one performance snapshot per day plus every fill and rejection.
 */
export class RunRecorder {
  private readonly daily: PerformanceSnapshot[] = [];
  private readonly fills: Transaction[] = [];
  private readonly refusals: Rejection[] = [];
  private peakEquity = Number.NEGATIVE_INFINITY;

  public constructor(public readonly initialCash: number) {}

  public recordDay(valuation: DayValuation): PerformanceSnapshot {
    const last = this.daily[this.daily.length - 1];
    if (last && valuation.date <= last.date) {
      throw new Error(`Snapshot for ${valuation.date} does not follow ${last.date}`);
    }
    const equity = fromMinorUnits(toMinorUnits(valuation.cash) + toMinorUnits(valuation.marketValue));
    this.peakEquity = Math.max(this.peakEquity, equity);
    const snapshot: PerformanceSnapshot = Object.freeze({
      date: valuation.date,
      cash: valuation.cash,
      marketValue: valuation.marketValue,
      equity,
      cumulativeReturn: equity / this.initialCash - 1,
      drawdown: this.peakEquity > 0 ? (this.peakEquity - equity) / this.peakEquity : 0,
    });
    this.daily.push(snapshot);
    return snapshot;
  }

  public recordTransaction(transaction: Transaction): void {
    const last = this.fills[this.fills.length - 1];
    if (last && transaction.sequence <= last.sequence) {
      throw new Error(`Transaction sequence ${transaction.sequence} does not follow ${last.sequence}`);
    }
    this.fills.push(transaction);
  }

  public recordRejection(rejection: Rejection): void {
    this.refusals.push(rejection);
  }

  public snapshots(): ReadonlyArray<PerformanceSnapshot> {
    return Object.freeze([...this.daily]);
  }

  public transactions(): ReadonlyArray<Transaction> {
    return Object.freeze([...this.fills]);
  }

  public rejections(): ReadonlyArray<Rejection> {
    return Object.freeze([...this.refusals]);
  }

  /**
   * Derives the run summary from the recorded sequences only.
   */
  public summarize(riskFreeRate = 0): RunSummary {
    const curve: EquityPoint[] = this.daily.map((snapshot) => ({
      date: snapshot.date,
      equity: snapshot.equity,
    }));
    const metrics = calculateMetricsSummary(curve, riskFreeRate);
    const finalEquity = this.daily[this.daily.length - 1]?.equity ?? this.initialCash;
    const returns = this.daily.map((snapshot) => snapshot.cumulativeReturn);
    const buyCount = this.fills.filter((transaction) => transaction.side === "buy").length;

    return Object.freeze({
      initialCash: this.initialCash,
      finalEquity,
      totalPnl: fromMinorUnits(toMinorUnits(finalEquity) - toMinorUnits(this.initialCash)),
      totalReturn: finalEquity / this.initialCash - 1,
      annualizedVolatility: metrics.annualizedVolatility,
      sharpe: metrics.sharpe,
      sortino: metrics.sortino,
      maxDrawdown: metrics.maxDrawdown,
      cagr: metrics.cagr,
      maxReturn: returns.length > 0 ? Math.max(...returns) : 0,
      minReturn: returns.length > 0 ? Math.min(...returns) : 0,
      tradingDays: this.daily.length,
      tradeCount: this.fills.length,
      buyCount,
      sellCount: this.fills.length - buyCount,
      rejectionCount: this.refusals.length,
    });
  }
}
