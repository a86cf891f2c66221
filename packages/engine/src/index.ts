export { computeTradeCost, estimateCashImpact } from "./costModel.js";
export type { CashImpact, TradeCost } from "./costModel.js";
export { SimulationClock, TradingCalendar } from "./clock.js";
export type { ClockState } from "./clock.js";
export {
  EndOfCalendarError,
  InvalidStateError,
  SimulationError,
  isSimulationError,
} from "./errors.js";
export type { SimulationErrorCode } from "./errors.js";
export { createRejection, executeOrder, fillPriceOf } from "./execution.js";
export type { ExecutionContext, ExecutionOutcome, RejectedOrderFields } from "./execution.js";
export { PortfolioLedger } from "./ledger.js";
export type { AppliedFill, Fill, LedgerOptions, ReadonlyLedger } from "./ledger.js";
export { MINOR_UNITS, fromMinorUnits, roundMoney, toMinorUnits } from "./money.js";
export { RunRecorder } from "./recorder.js";
export type { DayValuation } from "./recorder.js";
export { Simulation, makeRunId } from "./simulation.js";
export type { SimulationOptions } from "./simulation.js";
export type { DayReport, Lot, Position, RunResult, Valuation } from "./types.js";
