import { strict as assert } from "node:assert";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import type { DataRequest } from "@daybook/sdk";

import { CsvSource, parseCsv } from "../src/CsvSource.js";

const SAMPLE_CSV =
  `trade_date,open,high,low,close,volume,amount,pct_change\n` +
  `2024-01-02,10.0,10.5,9.8,10.2,1000,10200,\n` +
  `2024-01-03,10.2,10.6,10.1,10.4,1200,12480,1.96\n` +
  `2024-01-02,10.0,10.5,9.8,10.2,1000,10200,\n` +
  `2024-01-05,10.5,10.9,10.4,10.8,1500,16200,2.86\n` +
  `2024-01-04,10.4,10.6,10.3,10.5,1400,14700,0.96`;

test("CsvSource loads, dedupes, sorts, and caches bars", async (t) => {
  const datasetsDir = await mkdtemp(join(tmpdir(), "csv-source-"));
  const cacheDir = join(datasetsDir, ".cache");
  const datasetPath = join(datasetsDir, "600000.csv");

  await writeFile(datasetPath, SAMPLE_CSV, { encoding: "utf-8" });

  const source = new CsvSource({ datasetsDir, cacheDir });

  const request: DataRequest = {
    instrumentId: "600000",
    start: "2024-01-02",
    end: "2024-01-06",
  };

  const result = await source.loadBars(request);
  assert.deepEqual(
    result.map((bar) => bar.date),
    ["2024-01-02", "2024-01-03", "2024-01-04", "2024-01-05"],
    "should be deduped and sorted by date",
  );
  assert.equal(result[0]?.instrumentId, "600000");
  assert.equal(result[0]?.pctChange, undefined);
  assert.equal(result[1]?.pctChange, 1.96);
  assert.equal(result[1]?.amount, 12480);

  const cachedResult = await source.loadBars({ ...request, start: "2024-01-03" });
  assert.equal(cachedResult.length, 3, "cache should reuse parsed data with range filtering");
  assert.equal(cachedResult[0]?.date, "2024-01-03");

  const cacheContent: unknown = JSON.parse(
    await readFile(join(cacheDir, "600000.json"), { encoding: "utf-8" }),
  );
  assert.ok(cacheContent !== null && typeof cacheContent === "object" && "bars" in cacheContent);
  assert.ok(Array.isArray(cacheContent.bars));
  assert.equal(cacheContent.bars.length, 4, "cache stores full bar set");

  await t.test("cache invalidates after dataset change", async () => {
    await writeFile(datasetPath, `${SAMPLE_CSV}\n2024-01-06,10.8,11.0,10.7,10.9,1600,17440,0.93`, {
      encoding: "utf-8",
    });

    const updated = await source.loadBars(request);
    assert.equal(updated.length, 5, "cache invalidated after dataset mtime change");
  });
});

test("CsvSource returns no bars for a missing dataset", async () => {
  const datasetsDir = await mkdtemp(join(tmpdir(), "csv-source-missing-"));
  const source = new CsvSource({ datasetsDir });
  assert.deepEqual(await source.loadBars({ instrumentId: "000001" }), []);
});

test("CsvSource rebuilds a corrupt cache from the CSV", async () => {
  const datasetsDir = await mkdtemp(join(tmpdir(), "csv-source-corrupt-"));
  const cacheDir = join(datasetsDir, ".cache");
  await writeFile(join(datasetsDir, "600000.csv"), SAMPLE_CSV, { encoding: "utf-8" });
  const source = new CsvSource({ datasetsDir, cacheDir });
  await source.loadBars({ instrumentId: "600000" });
  await writeFile(join(cacheDir, "600000.json"), "{not json", { encoding: "utf-8" });

  const result = await source.loadBars({ instrumentId: "600000" });
  assert.equal(result.length, 4);
});

test("parseCsv maps headers regardless of column order and skips bad rows", () => {
  const content =
    "Close,Date,Volume,Open,High,Low\n" +
    "10.2,2024-01-02,1000,10,10.5,9.8\n" +
    "oops,2024-01-03,1000,10,10.5,9.8\n" +
    "10.4,2024-01-04T00:00:00.000Z,1200,10.2,10.6,10.1\n";
  const bars = parseCsv(content, "000001");
  assert.deepEqual(
    bars.map((bar) => [bar.date, bar.open, bar.close]),
    [
      ["2024-01-02", 10, 10.2],
      ["2024-01-04", 10.2, 10.4],
    ],
  );
});

test("parseCsv rejects a header without required columns", () => {
  assert.throws(
    () => parseCsv("date,close\n2024-01-02,10\n", "000001"),
    /CSV for 000001 must have columns date, open, high, low, close, volume/,
  );
});

test("parseCsv returns nothing for empty content", () => {
  assert.deepEqual(parseCsv("", "000001"), []);
});
