import { strict as assert } from "node:assert";
import test from "node:test";

import type { MarketBar } from "@daybook/sdk";

import {
  bollingerBands,
  computeIndicators,
  emaSeries,
  kdjSeries,
  relativeStrengthIndex,
  simpleMovingAverage,
} from "../src/indicators.js";

const barsFromCloses = (closes: ReadonlyArray<number>): MarketBar[] =>
  closes.map((close, index) => ({
    instrumentId: "600000",
    date: new Date(Date.UTC(2024, 0, 1 + index)).toISOString().slice(0, 10),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 500,
  }));

const rising = (length: number): number[] => Array.from({ length }, (_, index) => index + 1);

test("simpleMovingAverage averages the trailing window", () => {
  assert.equal(simpleMovingAverage([1, 2, 3, 4, 5], 5), 3);
  assert.equal(simpleMovingAverage([1, 2, 3, 4, 5, 6], 2), 5.5);
  assert.equal(simpleMovingAverage([1, 2], 5), null);
});

test("emaSeries seeds with the first value", () => {
  assert.deepEqual(emaSeries([1, 2, 4], 3), [1, 1.5, 2.75]);
  assert.deepEqual(emaSeries([], 3), []);
});

test("relativeStrengthIndex is 100 without losses and null without movement", () => {
  assert.equal(relativeStrengthIndex(rising(15)), 100);
  assert.equal(relativeStrengthIndex(Array.from({ length: 15 }, () => 10)), null);
  assert.equal(relativeStrengthIndex(rising(14)), null);
});

test("relativeStrengthIndex balances equal gains and losses at 50", () => {
  const zigzag = Array.from({ length: 15 }, (_, index) => (index % 2 === 0 ? 10 : 11));
  assert.equal(relativeStrengthIndex(zigzag), 50);
});

test("kdjSeries scores a flat range at 50", () => {
  const flat = Array.from({ length: 10 }, () => ({ high: 10, low: 10, close: 10 }));
  const last = kdjSeries(flat).at(-1);
  assert.ok(last);
  for (const value of [last.k, last.d, last.j]) {
    assert.ok(Math.abs(value - 50) < 1e-9);
  }
});

test("kdjSeries stays at 100 while the close is pinned at the high", () => {
  const pinned = Array.from({ length: 30 }, (_, index) => ({
    high: 10 + index,
    low: 5 + index,
    close: 10 + index,
  }));
  const last = kdjSeries(pinned).at(-1);
  assert.ok(last);
  assert.ok(Math.abs(last.k - 100) < 1e-9);
  assert.ok(Math.abs(last.d - 100) < 1e-9);
});

test("bollingerBands collapse onto the mean for a constant series", () => {
  assert.deepEqual(bollingerBands(Array.from({ length: 20 }, () => 10)), {
    upper: 10,
    middle: 10,
    lower: 10,
  });
  assert.equal(bollingerBands([1, 2, 3]), null);
});

test("bollingerBands use the sample standard deviation", () => {
  const bands = bollingerBands([1, 3], 2, 2);
  assert.ok(bands);
  assert.equal(bands.middle, 2);
  assert.ok(Math.abs(bands.upper - (2 + 2 * Math.SQRT2)) < 1e-12);
});

test("computeIndicators fills moving averages for a rising series", () => {
  const indicators = computeIndicators(barsFromCloses(rising(30)));
  assert.equal(indicators.date, "2024-01-30");
  assert.equal(indicators.close, 30);
  assert.equal(indicators.ma5, 28);
  assert.equal(indicators.ma10, 25.5);
  assert.equal(indicators.ma20, 20.5);
  assert.equal(indicators.ma60, null);
  assert.equal(indicators.rsi14, 100);
  assert.equal(indicators.priceAboveMa5, true);
  assert.equal(indicators.ma5AboveMa20, true);
  assert.ok(indicators.macd !== null && indicators.macd > 0);
  assert.equal(indicators.pctChange, (30 / 29 - 1) * 100);
});

test("computeIndicators reports MACD from the twentieth bar", () => {
  const indicators = computeIndicators(barsFromCloses(rising(20)));
  const closes = rising(20);
  const fast = emaSeries(closes, 12);
  const slow = emaSeries(closes, 26);
  assert.equal(indicators.ema12, fast[19]);
  assert.equal(indicators.ema26, slow[19]);
  assert.equal(indicators.macd, (fast[19] ?? 0) - (slow[19] ?? 0));
  assert.notEqual(indicators.macdSignal, null);
  assert.notEqual(indicators.macdHist, null);
  assert.equal(indicators.macdGoldenCross, false);
});

test("computeIndicators leaves MACD fields null below twenty bars", () => {
  const indicators = computeIndicators(barsFromCloses(rising(19)));
  assert.notEqual(indicators.ema12, null);
  assert.equal(indicators.ema26, null);
  assert.equal(indicators.macd, null);
  assert.equal(indicators.macdSignal, null);
  assert.equal(indicators.macdHist, null);
  assert.equal(indicators.macdGoldenCross, false);
  assert.equal(indicators.macdDeathCross, false);
});

test("computeIndicators prefers a reported pctChange", () => {
  const bars = barsFromCloses(rising(20));
  const last = bars[bars.length - 1];
  assert.ok(last);
  bars[bars.length - 1] = { ...last, pctChange: 2.5 };
  assert.equal(computeIndicators(bars).pctChange, 2.5);
});

test("computeIndicators flags a MACD golden cross after a decline turns", () => {
  const closes = [...Array.from({ length: 40 }, (_, index) => 60 - index), 40, 45, 52, 60];
  const crossings: number[] = [];
  for (let end = 27; end <= closes.length; end += 1) {
    const indicators = computeIndicators(barsFromCloses(closes.slice(0, end)));
    if (indicators.macdGoldenCross) {
      crossings.push(end);
    }
    assert.equal(indicators.macdDeathCross, false);
  }
  assert.equal(crossings.length, 1);
});

test("computeIndicators requires at least one bar", () => {
  assert.throws(() => computeIndicators([]), /requires at least one bar/);
});
