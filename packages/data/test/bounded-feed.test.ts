import { strict as assert } from "node:assert";
import test from "node:test";

import type { MarketBar } from "@daybook/sdk";

import { BoundedFeed } from "../src/BoundedFeed.js";
import { LookaheadError } from "../src/errors.js";
import { MemoryFeed } from "../src/MemoryFeed.js";

const isoDay = (offset: number): string =>
  new Date(Date.UTC(2024, 0, 1 + offset)).toISOString().slice(0, 10);

const bars: MarketBar[] = Array.from({ length: 30 }, (_, index) => ({
  instrumentId: "600000",
  date: isoDay(index),
  open: 10 + index,
  high: 11 + index,
  low: 9 + index,
  close: 10 + index,
  volume: 1000,
}));

const setup = (initial: string) => {
  let asOf = initial;
  const feed = new BoundedFeed(new MemoryFeed(bars), () => asOf);
  return {
    feed,
    moveTo: (next: string) => {
      asOf = next;
    },
  };
};

test("BoundedFeed serves bars up to the as-of date", () => {
  const { feed } = setup(isoDay(5));
  assert.equal(feed.getBar("600000", isoDay(5)).close, 15);
  assert.equal(feed.getBar("600000", isoDay(0)).close, 10);
  assert.equal(feed.id, "bounded:memory");
});

test("BoundedFeed rejects bars dated after the as-of date", () => {
  const { feed } = setup(isoDay(5));
  assert.throws(
    () => feed.getBar("600000", isoDay(6)),
    (error: unknown) =>
      error instanceof LookaheadError &&
      error.code === "LOOKAHEAD" &&
      error.date === isoDay(6) &&
      error.asOf === isoDay(5),
  );
});

test("BoundedFeed clips history and dates to the as-of date", () => {
  const { feed } = setup(isoDay(3));
  assert.deepEqual(
    feed.getHistory("600000", isoDay(20), 10).map((bar) => bar.date),
    [isoDay(0), isoDay(1), isoDay(2), isoDay(3)],
  );
  assert.equal(feed.dates("600000").length, 4);
  assert.deepEqual(feed.instruments(), ["600000"]);
});

test("BoundedFeed follows the as-of supplier as it advances", () => {
  const { feed, moveTo } = setup(isoDay(19));
  assert.throws(() => feed.getIndicators("600000", isoDay(20), 60), LookaheadError);
  moveTo(isoDay(20));
  assert.equal(feed.getIndicators("600000", isoDay(20), 60).close, 30);
  assert.equal(feed.getHistory("600000", isoDay(29), 1)[0]?.date, isoDay(20));
});
