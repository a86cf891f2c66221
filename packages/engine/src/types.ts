import type {
  ISODate,
  Order,
  PerformanceSnapshot,
  PositionView,
  Rejection,
  RunConfig,
  RunSummary,
  Transaction,
} from "@daybook/sdk";

/**
 * Shares bought in one fill. Sellable once `settlesOn` is on or before the as-of date.
 */
export interface Lot {
  readonly quantity: number;
  readonly price: number;
  readonly acquiredOn: ISODate;
  /** Null when the settlement day lies beyond the calendar. */
  readonly settlesOn: ISODate | null;
}

export interface Position {
  readonly instrumentId: string;
  readonly quantity: number;
  /** Weighted-average fill price of the shares held; fees excluded. */
  readonly averageCost: number;
  readonly lots: ReadonlyArray<Lot>;
}

export interface Valuation {
  readonly cash: number;
  readonly marketValue: number;
  readonly equity: number;
}

/**
 * What happened on one trading day.
 */
export interface DayReport {
  readonly date: ISODate;
  readonly dayIndex: number;
  readonly orders: ReadonlyArray<Order>;
  readonly transactions: ReadonlyArray<Transaction>;
  readonly rejections: ReadonlyArray<Rejection>;
  readonly snapshot: PerformanceSnapshot;
  /** Set when the decision maker failed; no orders were taken that day. */
  readonly decisionError?: string;
}

export interface RunResult {
  readonly runId: string;
  readonly config: RunConfig;
  readonly snapshots: ReadonlyArray<PerformanceSnapshot>;
  readonly transactions: ReadonlyArray<Transaction>;
  readonly rejections: ReadonlyArray<Rejection>;
  readonly summary: RunSummary;
  readonly positions: ReadonlyArray<PositionView>;
}
