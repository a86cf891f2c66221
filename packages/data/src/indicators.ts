import type { IndicatorSet, MarketBar } from "@daybook/sdk";

/** Fewest bars a feed accepts before it computes indicators; MACD is reported from here on. */
export const MIN_INDICATOR_BARS = 20;

const MACD_FAST = 12;
const MACD_SLOW = 26;
const MACD_SIGNAL = 9;
const RSI_PERIOD = 14;
const KDJ_PERIOD = 9;
const KDJ_K_SMOOTHING = 3;
const KDJ_D_SMOOTHING = 3;
const BOLL_PERIOD = 20;
const BOLL_WIDTH = 2;

const mean = (values: ReadonlyArray<number>): number =>
  values.reduce((acc, value) => acc + value, 0) / values.length;

/**
 * Mean of the last `period` values, or null when fewer are available.
 */
export const simpleMovingAverage = (
  values: ReadonlyArray<number>,
  period: number,
): number | null => {
  if (period <= 0 || values.length < period) {
    return null;
  }
  return mean(values.slice(-period));
};

/**
 * Recursive exponential average seeded with the first value (alpha = 2 / (span + 1)).
 */
export const emaSeries = (values: ReadonlyArray<number>, span: number): number[] => {
  return smoothSeries(values, 2 / (span + 1));
};

const smoothSeries = (values: ReadonlyArray<number>, alpha: number): number[] => {
  const out: number[] = [];
  let previous: number | null = null;
  for (const value of values) {
    const next: number = previous === null ? value : alpha * value + (1 - alpha) * previous;
    out.push(next);
    previous = next;
  }
  return out;
};

/**
 * Relative strength index from simple averages of the last `period` gains and losses.
 * Returns 100 when there were no losses and null when price did not move at all.
 */
export const relativeStrengthIndex = (
  closes: ReadonlyArray<number>,
  period = RSI_PERIOD,
): number | null => {
  if (closes.length < period + 1) {
    return null;
  }
  const recent = closes.slice(-(period + 1));
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < recent.length; i += 1) {
    const delta = (recent[i] ?? 0) - (recent[i - 1] ?? 0);
    if (delta > 0) {
      gains += delta;
    } else {
      losses -= delta;
    }
  }
  if (losses === 0) {
    return gains === 0 ? null : 100;
  }
  const rs = gains / period / (losses / period);
  return 100 - 100 / (1 + rs);
};

export interface KdjPoint {
  readonly k: number;
  readonly d: number;
  readonly j: number;
}

/**
 * Stochastic KDJ. RSV uses the rolling high/low of up to `period` bars; a flat range scores 50.
 */
export const kdjSeries = (
  bars: ReadonlyArray<Pick<MarketBar, "high" | "low" | "close">>,
  period = KDJ_PERIOD,
  kSmoothing = KDJ_K_SMOOTHING,
  dSmoothing = KDJ_D_SMOOTHING,
): KdjPoint[] => {
  const rsv = bars.map((bar, index) => {
    const window = bars.slice(Math.max(0, index - period + 1), index + 1);
    const lowest = Math.min(...window.map((item) => item.low));
    const highest = Math.max(...window.map((item) => item.high));
    const range = highest - lowest;
    return range === 0 ? 50 : ((bar.close - lowest) / range) * 100;
  });
  const k = smoothSeries(rsv, 1 / kSmoothing);
  const d = smoothSeries(k, 1 / dSmoothing);
  return k.map((kValue, index) => {
    const dValue = d[index] ?? kValue;
    return { k: kValue, d: dValue, j: 3 * kValue - 2 * dValue };
  });
};

export interface BollingerBands {
  readonly upper: number;
  readonly middle: number;
  readonly lower: number;
}

/**
 * Bands at `width` sample standard deviations around the `period` moving average.
 */
export const bollingerBands = (
  closes: ReadonlyArray<number>,
  period = BOLL_PERIOD,
  width = BOLL_WIDTH,
): BollingerBands | null => {
  if (period < 2 || closes.length < period) {
    return null;
  }
  const window = closes.slice(-period);
  const middle = mean(window);
  const variance =
    window.reduce((acc, value) => acc + (value - middle) * (value - middle), 0) / (period - 1);
  const std = Math.sqrt(variance);
  return { upper: middle + width * std, middle, lower: middle - width * std };
};

const compare = (left: number | null, right: number | null): boolean | null =>
  left === null || right === null ? null : left > right;

/**
 * Computes the indicator set as of the last bar in `bars` (oldest first).
 */
export const computeIndicators = (bars: ReadonlyArray<MarketBar>): IndicatorSet => {
  const latest = bars[bars.length - 1];
  if (!latest) {
    throw new Error("computeIndicators requires at least one bar");
  }
  const previous = bars[bars.length - 2];
  const closes = bars.map((bar) => bar.close);

  const ma5 = simpleMovingAverage(closes, 5);
  const ma10 = simpleMovingAverage(closes, 10);
  const ma20 = simpleMovingAverage(closes, 20);
  const ma60 = simpleMovingAverage(closes, 60);

  const fast = emaSeries(closes, MACD_FAST);
  const slow = emaSeries(closes, MACD_SLOW);
  const macdLine = fast.map((value, index) => value - (slow[index] ?? value));
  const signalLine = emaSeries(macdLine, MACD_SIGNAL);
  const last = closes.length - 1;
  const hasMacd = closes.length >= MIN_INDICATOR_BARS;
  const hasCross = closes.length > MIN_INDICATOR_BARS;

  const macd = hasMacd ? (macdLine[last] ?? null) : null;
  const macdSignal = hasMacd ? (signalLine[last] ?? null) : null;
  const prevMacd = macdLine[last - 1];
  const prevSignal = signalLine[last - 1];
  let macdGoldenCross = false;
  let macdDeathCross = false;
  if (
    hasCross &&
    macd !== null &&
    macdSignal !== null &&
    prevMacd !== undefined &&
    prevSignal !== undefined
  ) {
    macdGoldenCross = prevMacd < prevSignal && macd > macdSignal;
    macdDeathCross = prevMacd > prevSignal && macd < macdSignal;
  }

  const kdj = closes.length >= KDJ_PERIOD ? kdjSeries(bars)[last] : undefined;
  const boll = bollingerBands(closes);

  const pctChange =
    latest.pctChange ??
    (previous && previous.close > 0 ? (latest.close / previous.close - 1) * 100 : 0);

  return {
    instrumentId: latest.instrumentId,
    date: latest.date,
    close: latest.close,
    volume: latest.volume,
    pctChange,
    ma5,
    ma10,
    ma20,
    ma60,
    ema12: closes.length >= MACD_FAST ? (fast[last] ?? null) : null,
    ema26: hasMacd ? (slow[last] ?? null) : null,
    macd,
    macdSignal,
    macdHist: macd !== null && macdSignal !== null ? macd - macdSignal : null,
    macdGoldenCross,
    macdDeathCross,
    rsi14: relativeStrengthIndex(closes),
    kdjK: kdj?.k ?? null,
    kdjD: kdj?.d ?? null,
    kdjJ: kdj?.j ?? null,
    bollUpper: boll?.upper ?? null,
    bollMiddle: boll?.middle ?? null,
    bollLower: boll?.lower ?? null,
    priceAboveMa5: compare(latest.close, ma5),
    priceAboveMa20: compare(latest.close, ma20),
    ma5AboveMa20: compare(ma5, ma20),
  };
};
