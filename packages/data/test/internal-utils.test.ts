import { strict as assert } from "node:assert";
import test from "node:test";

import type { DataRequest, MarketBar } from "@daybook/sdk";

import {
  dedupeAndSort,
  filterBarsForRequest,
  lastIndexOnOrBefore,
  sanitizeBar,
  slugify,
} from "../src/internalUtils.js";

const createBar = (date: string, close: number): MarketBar => ({
  instrumentId: "600000",
  date,
  open: close,
  high: close + 1,
  low: close - 1,
  close,
  volume: 1000,
});

// ============================================================================
// slugify tests
// ============================================================================

test("slugify lowercases and replaces special characters", () => {
  assert.equal(slugify("SH600000"), "sh600000");
  assert.equal(slugify("000001.SZ"), "000001_sz");
  assert.equal(slugify("foo---bar"), "foo_bar");
});

test("slugify removes leading and trailing underscores", () => {
  assert.equal(slugify("_foo_"), "foo");
  assert.equal(slugify(""), "");
});

// ============================================================================
// sanitizeBar tests
// ============================================================================

test("sanitizeBar returns a frozen copy of a valid bar", () => {
  const bar = createBar("2024-01-02", 10);
  const result = sanitizeBar(bar);
  assert.deepEqual(result, bar);
  assert.ok(Object.isFrozen(result));
});

test("sanitizeBar keeps optional amount and pctChange when numeric", () => {
  const result = sanitizeBar({ ...createBar("2024-01-02", 10), amount: 10_000, pctChange: 1.5 });
  assert.equal(result?.amount, 10_000);
  assert.equal(result?.pctChange, 1.5);
});

test("sanitizeBar drops extra properties and non-numeric optionals", () => {
  const result = sanitizeBar({ ...createBar("2024-01-02", 10), amount: "n/a", note: "extra" });
  assert.ok(result);
  assert.deepEqual(Object.keys(result).sort(), [
    "close",
    "date",
    "high",
    "instrumentId",
    "low",
    "open",
    "volume",
  ]);
});

test("sanitizeBar rejects non-objects", () => {
  assert.equal(sanitizeBar(null), null);
  assert.equal(sanitizeBar(undefined), null);
  assert.equal(sanitizeBar("2024-01-02"), null);
});

test("sanitizeBar rejects malformed dates", () => {
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), date: "2024-01-02T00:00:00.000Z" }), null);
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), date: 20240102 }), null);
});

test("sanitizeBar rejects missing or non-finite prices", () => {
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), open: "10" }), null);
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), close: Number.NaN }), null);
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), volume: undefined }), null);
});

test("sanitizeBar rejects negative prices and volumes", () => {
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), close: -10 }), null);
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), open: -0.01 }), null);
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), volume: -1 }), null);
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), high: Number.POSITIVE_INFINITY }), null);
});

test("sanitizeBar rejects an empty instrument id", () => {
  assert.equal(sanitizeBar({ ...createBar("2024-01-02", 10), instrumentId: "" }), null);
});

// ============================================================================
// filterBarsForRequest tests
// ============================================================================

const bars: MarketBar[] = [
  createBar("2024-01-02", 10),
  createBar("2024-01-03", 11),
  createBar("2024-01-04", 12),
];

test("filterBarsForRequest keeps inclusive boundaries", () => {
  const request: DataRequest = { instrumentId: "600000", start: "2024-01-03", end: "2024-01-03" };
  const result = filterBarsForRequest(bars, request);
  assert.deepEqual(
    result.map((bar) => bar.date),
    ["2024-01-03"],
  );
});

test("filterBarsForRequest returns everything without a range", () => {
  assert.equal(filterBarsForRequest(bars, { instrumentId: "600000" }), bars);
});

test("filterBarsForRequest honours an open-ended start", () => {
  const result = filterBarsForRequest(bars, { instrumentId: "600000", start: "2024-01-03" });
  assert.deepEqual(
    result.map((bar) => bar.date),
    ["2024-01-03", "2024-01-04"],
  );
});

// ============================================================================
// dedupeAndSort / lastIndexOnOrBefore tests
// ============================================================================

test("dedupeAndSort orders by date and keeps the last duplicate", () => {
  const result = dedupeAndSort([
    createBar("2024-01-04", 12),
    createBar("2024-01-02", 10),
    createBar("2024-01-04", 13),
  ]);
  assert.deepEqual(
    result.map((bar) => [bar.date, bar.close]),
    [
      ["2024-01-02", 10],
      ["2024-01-04", 13],
    ],
  );
});

test("lastIndexOnOrBefore finds the as-of position", () => {
  assert.equal(lastIndexOnOrBefore(bars, "2024-01-01"), -1);
  assert.equal(lastIndexOnOrBefore(bars, "2024-01-02"), 0);
  assert.equal(lastIndexOnOrBefore(bars, "2024-01-03"), 1);
  assert.equal(lastIndexOnOrBefore(bars, "2024-01-10"), 2);
  assert.equal(lastIndexOnOrBefore([], "2024-01-10"), -1);
});
