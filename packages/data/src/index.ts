export type { BarLoader, InstrumentFeed } from "./InstrumentFeed.js";
export {
  BarNotFoundError,
  FeedError,
  InsufficientHistoryError,
  LookaheadError,
  isFeedError,
} from "./errors.js";
export type { FeedErrorCode } from "./errors.js";
export { MemoryFeed } from "./MemoryFeed.js";
export type { BarsByInstrument } from "./MemoryFeed.js";
export { BoundedFeed } from "./BoundedFeed.js";
export { CsvSource, createCsvSource, parseCsv, DEFAULT_DATASETS_DIR } from "./CsvSource.js";
export type { CsvSourceOptions } from "./CsvSource.js";
export { buildTradingCalendar, loadMemoryFeed } from "./calendar.js";
export type { DateRange } from "./calendar.js";
export {
  MIN_INDICATOR_BARS,
  bollingerBands,
  computeIndicators,
  emaSeries,
  kdjSeries,
  relativeStrengthIndex,
  simpleMovingAverage,
} from "./indicators.js";
export type { BollingerBands, KdjPoint } from "./indicators.js";
