import { randomUUID } from "node:crypto";

import type {
  DecisionMaker,
  DecisionSnapshot,
  ISODate,
  IndicatorSet,
  InstrumentSnapshot,
  MarketBar,
  Order,
  PerformanceSnapshot,
  PositionView,
  Rejection,
  RejectionReason,
  RunConfig,
  RunSummary,
  TradeEstimate,
  Transaction,
} from "@daybook/sdk";
import { OrderSchema, createRunConfig } from "@daybook/sdk";
import { BoundedFeed, isFeedError, type InstrumentFeed } from "@daybook/data";
import { createLogger, type Logger } from "@daybook/logger";

import { SimulationClock, TradingCalendar, type ClockState } from "./clock.js";
import { estimateCashImpact } from "./costModel.js";
import { InvalidStateError } from "./errors.js";
import {
  createRejection,
  executeOrder,
  fillPriceOf,
  type ExecutionContext,
  type ExecutionOutcome,
  type RejectedOrderFields,
} from "./execution.js";
import { PortfolioLedger, type ReadonlyLedger } from "./ledger.js";
import { roundMoney, toMinorUnits } from "./money.js";
import { RunRecorder } from "./recorder.js";
import type { DayReport, RunResult } from "./types.js";

export interface SimulationOptions {
  /** A {@link RunConfig} or raw input for one; validated and frozen on construction. */
  readonly config: unknown;
  readonly feed: InstrumentFeed;
  readonly decisionMaker: DecisionMaker;
  readonly logger?: Logger;
  readonly runId?: string;
}

export const makeRunId = (runName: string): string => {
  const slug = runName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
  const timestamp = new Date()
    .toISOString()
    .replace(/[^0-9]+/g, "")
    .slice(0, 14);
  const base = slug.length > 0 ? slug : "run";
  return `${base}-${timestamp}-${randomUUID().slice(0, 8)}`;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Best-effort fields of something that failed the order schema, for the rejection log. */
const describeCandidate = (candidate: unknown): RejectedOrderFields => {
  const fields: Record<string, unknown> =
    candidate !== null && typeof candidate === "object" ? { ...candidate } : {};
  return {
    instrumentId: typeof fields.instrumentId === "string" ? fields.instrumentId : "",
    side: fields.side === "buy" || fields.side === "sell" ? fields.side : "unknown",
    quantity: typeof fields.quantity === "number" ? fields.quantity : 0,
  };
};

/**
 * Day-stepped driver: advances the clock, shows the decision maker a bounded snapshot,
 * executes its orders in submission order and records the day.
 */
export class Simulation {
  public readonly runId: string;
  public readonly config: RunConfig;

  private readonly calendar: TradingCalendar;
  private readonly clock: SimulationClock;
  private readonly ledgerState: PortfolioLedger;
  private readonly recorder: RunRecorder;
  private readonly feed: BoundedFeed;
  private readonly decisionMaker: DecisionMaker;
  private readonly logger: Logger;
  private readonly execution: Omit<ExecutionContext, "date">;
  private asOf: ISODate | null = null;
  private busy = false;
  private started = false;
  private finished = false;

  public constructor(options: SimulationOptions) {
    this.config = createRunConfig(options.config);
    this.runId = options.runId ?? makeRunId(this.config.runName);
    this.calendar = new TradingCalendar(this.config.calendar);
    this.clock = new SimulationClock(this.calendar);
    this.ledgerState = new PortfolioLedger({
      initialCash: this.config.initialCash,
      calendar: this.calendar,
      settlementLagDays: this.config.settlementLagDays,
    });
    this.recorder = new RunRecorder(this.ledgerState.initialCash);
    this.feed = new BoundedFeed(options.feed, () => this.requireAsOf());
    this.decisionMaker = options.decisionMaker;
    this.logger = (options.logger ?? createLogger("engine")).child({ runId: this.runId });
    this.execution = {
      lotSize: this.config.lotSize,
      costs: this.config.costs,
      fillPrice: this.config.fillPrice,
    };
  }

  public get ledger(): ReadonlyLedger {
    return this.ledgerState;
  }

  public get state(): ClockState {
    return this.clock.state;
  }

  public get dayIndex(): number {
    return this.clock.dayIndex;
  }

  /**
   * Processes exactly one trading day.
   * @throws EndOfCalendarError after the last day; InvalidStateError when completed or re-entered.
   */
  public async step(): Promise<DayReport> {
    this.enter("step");
    try {
      return await this.processDay();
    } finally {
      this.busy = false;
    }
  }

  /**
   * Steps through the remaining calendar, completes the clock and returns the run record.
   * A calendar already exhausted by {@link step} is finished once without processing more days.
   */
  public async run(): Promise<RunResult> {
    this.enter("run", !this.finished);
    try {
      while (this.clock.hasNext()) {
        await this.processDay();
      }
      if (this.clock.state !== "completed") {
        this.clock.complete();
      }
      return await this.finish();
    } finally {
      this.busy = false;
    }
  }

  public snapshots(): ReadonlyArray<PerformanceSnapshot> {
    return this.recorder.snapshots();
  }

  public transactions(): ReadonlyArray<Transaction> {
    return this.recorder.transactions();
  }

  public rejections(): ReadonlyArray<Rejection> {
    return this.recorder.rejections();
  }

  public summarize(): RunSummary {
    return this.recorder.summarize(this.config.riskFreeRate);
  }

  private enter(operation: string, allowCompleted = false): void {
    if (this.busy) {
      throw new InvalidStateError(`${operation}() called while a trading day is in progress`);
    }
    if (this.clock.state === "completed" && !allowCompleted) {
      throw new InvalidStateError(`${operation}() called on a completed run`);
    }
    this.busy = true;
  }

  private requireAsOf(): ISODate {
    if (this.asOf === null) {
      throw new InvalidStateError("No trading day has started");
    }
    return this.asOf;
  }

  private async processDay(): Promise<DayReport> {
    if (!this.started) {
      this.started = true;
      await this.start();
    }

    const date = this.clock.advance();
    this.asOf = date;
    const dayIndex = this.clock.dayIndex;
    const snapshot = this.buildSnapshot(date, dayIndex);

    let orders: ReadonlyArray<Order> = [];
    let decisionError: string | undefined;
    try {
      const decided = await this.decisionMaker.decide(snapshot);
      if (!Array.isArray(decided)) {
        throw new TypeError("decide() must return an array of orders");
      }
      orders = decided;
    } catch (error) {
      decisionError = errorMessage(error);
      this.logger.warn("Decision maker failed; no orders today", { date, error });
    }

    const transactions: Transaction[] = [];
    const rejections: Rejection[] = [];
    for (const order of orders) {
      const outcome = this.processOrder(order, date);
      if (outcome.status === "filled") {
        this.recorder.recordTransaction(outcome.transaction);
        transactions.push(outcome.transaction);
        this.logger.info("Order filled", {
          date,
          sequence: outcome.transaction.sequence,
          instrumentId: outcome.transaction.instrumentId,
          side: outcome.transaction.side,
          quantity: outcome.transaction.quantity,
          price: outcome.transaction.price,
          cashAfter: outcome.transaction.cashAfter,
        });
      } else {
        this.recorder.recordRejection(outcome.rejection);
        rejections.push(outcome.rejection);
        this.logger.info("Order rejected", {
          date,
          instrumentId: outcome.rejection.instrumentId,
          reason: outcome.rejection.reason,
          detail: outcome.rejection.message,
        });
      }
    }

    const valuation = this.ledgerState.markToMarket(this.pricesAsOf(date));
    const performance = this.recorder.recordDay({
      date,
      cash: valuation.cash,
      marketValue: valuation.marketValue,
    });
    this.logger.debug("Day recorded", {
      date,
      dayIndex,
      equity: performance.equity,
      orders: orders.length,
      fills: transactions.length,
      rejections: rejections.length,
    });

    return Object.freeze({
      date,
      dayIndex,
      orders: Object.freeze([...orders]),
      transactions: Object.freeze(transactions),
      rejections: Object.freeze(rejections),
      snapshot: performance,
      ...(decisionError === undefined ? {} : { decisionError }),
    });
  }

  private async start(): Promise<void> {
    const info = Object.freeze({
      runId: this.runId,
      universe: this.config.universe,
      firstDate: this.calendar.first ?? "",
      lastDate: this.calendar.last ?? "",
      tradingDays: this.calendar.length,
      initialCash: this.ledgerState.initialCash,
      lotSize: this.config.lotSize,
    });
    this.logger.info("Simulation started", {
      decisionMaker: this.decisionMaker.name,
      firstDate: info.firstDate,
      lastDate: info.lastDate,
      tradingDays: info.tradingDays,
      initialCash: info.initialCash,
    });
    try {
      await this.decisionMaker.onStart?.(info);
    } catch (error) {
      this.logger.warn("Decision maker onStart failed", { error });
    }
  }

  private async finish(): Promise<RunResult> {
    this.finished = true;
    const summary = this.summarize();
    const lastDate = this.asOf;
    const positions = lastDate === null ? [] : this.positionViews(lastDate);
    try {
      await this.decisionMaker.onFinish?.(summary);
    } catch (error) {
      this.logger.warn("Decision maker onFinish failed", { error });
    }
    this.logger.info("Simulation finished", {
      finalEquity: summary.finalEquity,
      totalReturn: summary.totalReturn,
      maxDrawdown: summary.maxDrawdown,
      trades: summary.tradeCount,
      rejections: summary.rejectionCount,
    });
    return Object.freeze({
      runId: this.runId,
      config: this.config,
      snapshots: this.recorder.snapshots(),
      transactions: this.recorder.transactions(),
      rejections: this.recorder.rejections(),
      summary,
      positions: Object.freeze(positions),
    });
  }

  private processOrder(candidate: Order, date: ISODate): ExecutionOutcome {
    const reject = (
      fields: RejectedOrderFields,
      reason: RejectionReason,
      message: string,
    ): ExecutionOutcome => ({
      status: "rejected",
      rejection: createRejection(fields, date, reason, message),
    });

    const parsed = OrderSchema.safeParse(candidate);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      return reject(describeCandidate(candidate), "malformed_order", issues);
    }
    const order = parsed.data;
    if (order.date !== date) {
      return reject(order, "stale_order", `Order dated ${order.date} submitted on ${date}`);
    }
    if (!this.config.universe.includes(order.instrumentId)) {
      return reject(order, "unknown_instrument", `${order.instrumentId} is not in the run's universe`);
    }
    const bar = this.barOn(order.instrumentId, date);
    if (!bar) {
      return reject(order, "price_unavailable", `No price for ${order.instrumentId} on ${date}`);
    }
    return executeOrder(order, this.ledgerState, bar, { ...this.execution, date });
  }

  private barOn(instrumentId: string, date: ISODate): MarketBar | null {
    try {
      return this.feed.getBar(instrumentId, date);
    } catch (error) {
      if (isFeedError(error, "NOT_FOUND")) {
        return null;
      }
      throw error;
    }
  }

  private indicatorsOn(instrumentId: string, date: ISODate): IndicatorSet | null {
    try {
      return this.feed.getIndicators(instrumentId, date, this.config.indicatorWindow);
    } catch (error) {
      if (isFeedError(error, "INSUFFICIENT_HISTORY")) {
        return null;
      }
      throw error;
    }
  }

  /** Latest close on or before `date` for each held instrument. */
  private pricesAsOf(date: ISODate): Record<string, number> {
    const prices: Record<string, number> = {};
    for (const position of this.ledgerState.positions()) {
      const latest = this.feed.getHistory(position.instrumentId, date, 1)[0];
      if (latest) {
        prices[position.instrumentId] = latest.close;
      }
    }
    return prices;
  }

  /** Views of held positions in ledger order (by instrument id). */
  private positionViews(date: ISODate): PositionView[] {
    const prices = this.pricesAsOf(date);
    return this.ledgerState.positions().map((position) => {
      const settledQuantity = this.ledgerState.settledQuantity(position.instrumentId, date);
      const lastPrice = prices[position.instrumentId] ?? position.averageCost;
      return Object.freeze({
        instrumentId: position.instrumentId,
        quantity: position.quantity,
        settledQuantity,
        pendingQuantity: position.quantity - settledQuantity,
        averageCost: position.averageCost,
        lastPrice,
        marketValue: roundMoney(lastPrice * position.quantity),
        unrealizedPnl: roundMoney((lastPrice - position.averageCost) * position.quantity),
      });
    });
  }

  private buildSnapshot(date: ISODate, dayIndex: number): DecisionSnapshot {
    const instruments: Record<string, InstrumentSnapshot> = {};
    for (const instrumentId of this.config.universe) {
      const bar = this.barOn(instrumentId, date);
      if (!bar) {
        this.logger.warn("No bar for instrument; omitted from snapshot", { date, instrumentId });
        continue;
      }
      instruments[instrumentId] = Object.freeze({
        bar,
        indicators: this.indicatorsOn(instrumentId, date),
      });
    }

    const valuation = this.ledgerState.markToMarket(this.pricesAsOf(date));
    const cashMinor = toMinorUnits(valuation.cash);
    const feed = this.feed;
    const universe = this.config.universe;
    const execution = this.execution;

    return Object.freeze({
      runId: this.runId,
      date,
      dayIndex,
      initialCash: this.ledgerState.initialCash,
      cash: valuation.cash,
      marketValue: valuation.marketValue,
      equity: valuation.equity,
      lotSize: this.config.lotSize,
      universe,
      positions: Object.freeze(
        Object.fromEntries(this.positionViews(date).map((view) => [view.instrumentId, view])),
      ),
      instruments: Object.freeze(instruments),
      history(instrumentId: string, lookback: number): ReadonlyArray<MarketBar> {
        if (!universe.includes(instrumentId)) {
          return [];
        }
        return Object.freeze([...feed.getHistory(instrumentId, date, lookback)]);
      },
      estimate(order: Pick<Order, "instrumentId" | "side" | "quantity">): TradeEstimate | null {
        const bar = instruments[order.instrumentId]?.bar;
        if (!bar) {
          return null;
        }
        const price = fillPriceOf(bar, execution.fillPrice);
        const impact = estimateCashImpact(price, order.quantity, order.side, execution.costs);
        return Object.freeze({
          instrumentId: order.instrumentId,
          side: order.side,
          quantity: order.quantity,
          price,
          ...impact,
          affordable: order.side === "sell" || cashMinor + toMinorUnits(impact.cashDelta) >= 0,
        });
      },
    });
  }
}
