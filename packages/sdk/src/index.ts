// Source of truth for the shapes exchanged between the engine, feeds and decision makers.

import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** Calendar date in `YYYY-MM-DD` form. Lexicographic order is chronological order. */
export type ISODate = string;

export type OrderSide = "buy" | "sell";

/** Which price of the order's day an order fills at. */
export type FillPriceRule = "close" | "open";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/u;

export const isIsoDate = (value: unknown): value is ISODate =>
  typeof value === "string" &&
  ISO_DATE_PATTERN.test(value) &&
  !Number.isNaN(Date.parse(`${value}T00:00:00Z`));

/** Runtime validator for {@link ISODate}. */
export const IsoDateSchema = z.string().refine(isIsoDate, { message: "expected a YYYY-MM-DD date" });

/** -----------------------------------------------------------------------
 *  Market data
 *  -------------------------------------------------------------------- */

/**
 * One trading day of an instrument. Immutable once it leaves the feed.
 */
export interface MarketBar {
  readonly instrumentId: string;
  readonly date: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  /** Traded value for the day, when the source carries it. */
  readonly amount?: number;
  /** Percentage change of close against the previous close (2.5 means +2.5%). */
  readonly pctChange?: number;
}

/** Runtime validator for {@link MarketBar}. */
export const MarketBarSchema = z.object({
  instrumentId: z.string().min(1),
  date: IsoDateSchema,
  open: z.number().finite().nonnegative(),
  high: z.number().finite().nonnegative(),
  low: z.number().finite().nonnegative(),
  close: z.number().finite().nonnegative(),
  volume: z.number().finite().nonnegative(),
  amount: z.number().finite().nonnegative().optional(),
  pctChange: z.number().finite().optional(),
});

/**
 * Derived indicator values for one instrument as of one date.
 * Numeric fields are `null` when the available history is shorter than their window.
 */
export interface IndicatorSet {
  readonly instrumentId: string;
  readonly date: ISODate;
  readonly close: number;
  readonly volume: number;
  readonly pctChange: number;
  readonly ma5: number | null;
  readonly ma10: number | null;
  readonly ma20: number | null;
  readonly ma60: number | null;
  readonly ema12: number | null;
  readonly ema26: number | null;
  readonly macd: number | null;
  readonly macdSignal: number | null;
  readonly macdHist: number | null;
  readonly macdGoldenCross: boolean;
  readonly macdDeathCross: boolean;
  readonly rsi14: number | null;
  readonly kdjK: number | null;
  readonly kdjD: number | null;
  readonly kdjJ: number | null;
  readonly bollUpper: number | null;
  readonly bollMiddle: number | null;
  readonly bollLower: number | null;
  readonly priceAboveMa5: boolean | null;
  readonly priceAboveMa20: boolean | null;
  readonly ma5AboveMa20: boolean | null;
}

/**
 * Request for one instrument's daily series, optionally clipped to a date range.
 */
export interface DataRequest {
  readonly instrumentId: string;
  /** Inclusive start date. */
  readonly start?: ISODate;
  /** Inclusive end date. */
  readonly end?: ISODate;
}

/** Runtime validator for {@link DataRequest}. */
export const DataRequestSchema = z.object({
  instrumentId: z.string().min(1),
  start: IsoDateSchema.optional(),
  end: IsoDateSchema.optional(),
});

/** -----------------------------------------------------------------------
 *  Orders, fills and rejections
 *  -------------------------------------------------------------------- */

/**
 * Instruction proposed by a decision maker for the current simulation date.
 */
export interface Order {
  readonly instrumentId: string;
  readonly side: OrderSide;
  /** Shares; must be a positive multiple of the run's lot size. */
  readonly quantity: number;
  /** The simulation date the order was issued on. */
  readonly date: ISODate;
  /** Free-text rationale carried into the transaction log. */
  readonly reason?: string;
}

/** Runtime validator for {@link Order}. Quantity rules are enforced at execution. */
export const OrderSchema = z.object({
  instrumentId: z.string().min(1),
  side: z.enum(["buy", "sell"]),
  quantity: z.number().finite(),
  date: IsoDateSchema,
  reason: z.string().optional(),
});

/**
 * Immutable record of an executed order. Amounts are in currency units.
 */
export interface Transaction {
  /** Ledger sequence number; strictly increasing across the run. */
  readonly sequence: number;
  readonly date: ISODate;
  readonly instrumentId: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly price: number;
  readonly notional: number;
  readonly commission: number;
  readonly stampDuty: number;
  /** commission + stampDuty */
  readonly totalCost: number;
  /** Signed change to cash: negative for buys, positive for sells. */
  readonly cashDelta: number;
  readonly cashAfter: number;
  /** (price - average cost) x quantity for sells; 0 for buys. */
  readonly realizedPnl: number;
  readonly reason: string;
}

export type RejectionReason =
  | "malformed_order"
  | "stale_order"
  | "unknown_instrument"
  | "price_unavailable"
  | "invalid_quantity"
  | "insufficient_funds"
  | "insufficient_settled_shares";

/**
 * An order that failed validation. Rejections never mutate the ledger.
 */
export interface Rejection {
  readonly date: ISODate;
  readonly instrumentId: string;
  readonly side: OrderSide | "unknown";
  readonly quantity: number;
  readonly reason: RejectionReason;
  readonly message: string;
}

/** -----------------------------------------------------------------------
 *  Run recording
 *  -------------------------------------------------------------------- */

export interface PerformanceSnapshot {
  readonly date: ISODate;
  readonly cash: number;
  readonly marketValue: number;
  /** cash + marketValue */
  readonly equity: number;
  /** equity / initialCash - 1 */
  readonly cumulativeReturn: number;
  /** Fractional decline from the running equity peak (0 at a new high). */
  readonly drawdown: number;
}

export interface RunSummary {
  readonly initialCash: number;
  readonly finalEquity: number;
  readonly totalPnl: number;
  readonly totalReturn: number;
  readonly annualizedVolatility: number;
  readonly sharpe: number;
  readonly sortino: number;
  /** Largest peak-to-trough decline as a positive fraction. */
  readonly maxDrawdown: number;
  readonly cagr: number;
  readonly maxReturn: number;
  readonly minReturn: number;
  readonly tradingDays: number;
  readonly tradeCount: number;
  readonly buyCount: number;
  readonly sellCount: number;
  readonly rejectionCount: number;
}

/** -----------------------------------------------------------------------
 *  Decision maker contract
 *  -------------------------------------------------------------------- */

export interface PositionView {
  readonly instrumentId: string;
  readonly quantity: number;
  /** Shares that have cleared settlement and may be sold today. */
  readonly settledQuantity: number;
  readonly pendingQuantity: number;
  readonly averageCost: number;
  readonly lastPrice: number;
  readonly marketValue: number;
  readonly unrealizedPnl: number;
}

export interface InstrumentSnapshot {
  readonly bar: MarketBar;
  readonly indicators: IndicatorSet | null;
}

/**
 * Cost preview for a hypothetical order at today's fill price.
 */
export interface TradeEstimate {
  readonly instrumentId: string;
  readonly side: OrderSide;
  readonly quantity: number;
  readonly price: number;
  readonly notional: number;
  readonly commission: number;
  readonly stampDuty: number;
  readonly totalCost: number;
  readonly cashDelta: number;
  /** For buys: whether cash covers notional plus costs right now. Always true for sells. */
  readonly affordable: boolean;
}

/**
 * Read-only view of the run handed to a decision maker once per trading day.
 * Everything reachable from it is dated on or before `date`.
 */
export interface DecisionSnapshot {
  readonly runId: string;
  readonly date: ISODate;
  readonly dayIndex: number;
  readonly initialCash: number;
  readonly cash: number;
  readonly marketValue: number;
  readonly equity: number;
  readonly lotSize: number;
  readonly universe: ReadonlyArray<string>;
  readonly positions: Readonly<Record<string, PositionView>>;
  /** Instruments with a bar today. Missing instruments had no data for the date. */
  readonly instruments: Readonly<Record<string, InstrumentSnapshot>>;
  /** Up to `lookback` most recent bars dated on or before today. */
  history(instrumentId: string, lookback: number): ReadonlyArray<MarketBar>;
  /** Prices an order at today's fill price without placing it. Null when there is no bar today. */
  estimate(order: Pick<Order, "instrumentId" | "side" | "quantity">): TradeEstimate | null;
}

export interface RunStartInfo {
  readonly runId: string;
  readonly universe: ReadonlyArray<string>;
  readonly firstDate: ISODate;
  readonly lastDate: ISODate;
  readonly tradingDays: number;
  readonly initialCash: number;
  readonly lotSize: number;
}

/**
 * Anything that observes a snapshot and proposes orders for that day.
 * The engine awaits `decide` and executes the returned orders in order.
 */
export interface DecisionMaker {
  readonly name: string;
  onStart?(info: RunStartInfo): void | Promise<void>;
  decide(snapshot: DecisionSnapshot): ReadonlyArray<Order> | Promise<ReadonlyArray<Order>>;
  onFinish?(summary: RunSummary): void | Promise<void>;
}

export type DecisionMakerFactory<P> = (params: P) => DecisionMaker;

/** -----------------------------------------------------------------------
 *  RunConfig
 *  -------------------------------------------------------------------- */

/** Runtime validator for the per-order cost schedule. */
export const CostScheduleSchema = z.object({
  /** Broker commission as a fraction of notional (0.0003 = 3 bps). */
  commissionRate: z.number().min(0).max(1).default(0.0003),
  /** Sell-side tax as a fraction of notional. */
  stampDutyRate: z.number().min(0).max(1).default(0.001),
  /** Floor applied to the commission of every order. */
  minimumFee: z.number().nonnegative().default(5),
});

export type CostSchedule = z.infer<typeof CostScheduleSchema>;

/**
 * Full definition of one simulation run.
 * - `calendar` is the ordered list of trading days the clock walks through.
 * - `settlementLagDays` counts calendar entries, not calendar days.
 */
export const RunConfigSchema = z.object({
  runName: z.string().min(1).default("simulation"),
  initialCash: z.number().positive().finite(),
  universe: z
    .array(z.string().min(1))
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, { message: "instrument ids must be unique" }),
  calendar: z
    .array(IsoDateSchema)
    .min(1)
    .superRefine((dates, ctx) => {
      for (let i = 1; i < dates.length; i += 1) {
        const prev = dates[i - 1];
        const current = dates[i];
        if (prev !== undefined && current !== undefined && current <= prev) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `calendar must be strictly increasing (${prev} then ${current})`,
            path: [i],
          });
        }
      }
    }),
  costs: CostScheduleSchema.default({}),
  lotSize: z.number().int().positive().default(100),
  settlementLagDays: z.number().int().min(0).default(1),
  fillPrice: z.enum(["close", "open"]).default("close"),
  /** Annual risk-free rate used for Sharpe and Sortino. */
  riskFreeRate: z.number().min(0).max(1).default(0),
  /** Bars of history fed into indicator calculation. */
  indicatorWindow: z.number().int().min(20).default(60),
});

export type RunConfigInput = z.input<typeof RunConfigSchema>;

export type RunConfig = Readonly<
  Omit<z.output<typeof RunConfigSchema>, "universe" | "calendar" | "costs"> & {
    readonly universe: ReadonlyArray<string>;
    readonly calendar: ReadonlyArray<ISODate>;
    readonly costs: Readonly<CostSchedule>;
  }
>;

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @returns The parsed payload, with schema defaults applied.
 * @throws Error listing every issue when validation fails.
 */
export function assertValid<Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown,
  label = "payload",
): z.output<Schema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new Error(`Invalid ${label}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Validates, fills defaults and freezes a run configuration.
 */
export const createRunConfig = (input: unknown): RunConfig => {
  const parsed = assertValid(RunConfigSchema, input, "RunConfig");
  return Object.freeze({
    ...parsed,
    universe: Object.freeze([...parsed.universe]),
    calendar: Object.freeze([...parsed.calendar]),
    costs: Object.freeze({ ...parsed.costs }),
  });
};

/** -----------------------------------------------------------------------
 *  Re-exports grouped for convenience
 *  -------------------------------------------------------------------- */

/** Namespaced access to the primary schemas. */
export const Schemas = {
  DataRequest: DataRequestSchema,
  MarketBar: MarketBarSchema,
  Order: OrderSchema,
  CostSchedule: CostScheduleSchema,
  RunConfig: RunConfigSchema,
};

export * as decisionMakers from "./decision-makers/index.js";
export {
  builtinDecisionMakers,
  createBuiltinDecisionMaker,
  isBuiltinDecisionMaker,
  type BuiltinDecisionMakerKey,
  type DecisionMakerModule,
} from "./decision-makers/registry.js";
