import { strict as assert } from "node:assert";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { createSilentLogger } from "@daybook/logger";

import { DEFAULT_INITIAL_CASH, loadRunnerConfig } from "../src/config.js";
import { createRunWriter, runFromConfig } from "../src/runner.js";

const SAMPLE_DATA = `date,open,high,low,close,volume
2024-03-04,10,10.3,9.8,10,50000
2024-03-05,10,10.6,9.9,10.5,52000
2024-03-06,10.5,10.9,10.4,10.8,51000
2024-03-07,10.8,10.8,10.1,10.2,48000
2024-03-08,10.2,10.7,10.1,10.6,47000`;

const FIXED_NOW = new Date("2024-03-09T08:00:00.000Z");

interface Workspace {
  readonly root: string;
  readonly datasetsDir: string;
  readonly runsDir: string;
  readonly customDir: string;
}

const withWorkspace = async (t: test.TestContext): Promise<Workspace> => {
  const root = await mkdtemp(join(tmpdir(), "daybook-runner-"));
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });
  const datasetsDir = join(root, "datasets");
  await mkdir(datasetsDir, { recursive: true });
  await writeFile(join(datasetsDir, "600000.csv"), SAMPLE_DATA, "utf-8");
  return {
    root,
    datasetsDir,
    runsDir: join(root, "runs"),
    customDir: join(root, "custom"),
  };
};

const envFor = (workspace: Workspace, overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv => ({
  SIM_UNIVERSE: "600000",
  SIM_DATASETS_DIR: workspace.datasetsDir,
  SIM_RUNS_DIR: workspace.runsDir,
  SIM_CUSTOM_DIR: workspace.customDir,
  ...overrides,
});

const readJson = async (path: string): Promise<unknown> =>
  JSON.parse(await readFile(path, { encoding: "utf-8" }));

// ============================================================================
// Environment configuration
// ============================================================================

test("loadRunnerConfig coerces SIM_* variables and leaves unset settings to the defaults", () => {
  const config = loadRunnerConfig({
    SIM_UNIVERSE: " 600000, 000001 ,",
    SIM_INITIAL_CASH: "250000",
    SIM_LOT_SIZE: "",
    SIM_FILL_PRICE: "open",
    SIM_COMMISSION_RATE: "0.0002",
    SIM_DECISION_MAKER: "sma_crossover",
    SIM_DECISION_MAKER_PARAMS: '{"fastLength":3,"slowLength":8}',
    SIM_START: "2024-01-01",
  });

  assert.equal(config.runName, "simulation");
  assert.deepEqual(config.universe, ["600000", "000001"]);
  assert.equal(config.initialCash, 250_000);
  assert.equal(config.start, "2024-01-01");
  assert.equal(config.end, undefined);
  assert.deepEqual(config.decisionMaker, {
    key: "sma_crossover",
    params: { fastLength: 3, slowLength: 8 },
  });
  assert.deepEqual(config.settings, {
    costs: { commissionRate: 0.0002 },
    fillPrice: "open",
  });
});

test("loadRunnerConfig applies defaults for an almost empty environment", () => {
  const config = loadRunnerConfig({ SIM_UNIVERSE: "600000" });
  assert.equal(config.initialCash, DEFAULT_INITIAL_CASH);
  assert.deepEqual(config.decisionMaker, { key: "buy_and_hold", params: {} });
  assert.deepEqual(config.settings, { costs: {} });
  assert.ok(config.runsDir.endsWith(join("storage", "runs")));
});

test("loadRunnerConfig reports every invalid variable", () => {
  assert.throws(
    () => loadRunnerConfig({ SIM_INITIAL_CASH: "-5", SIM_FILL_PRICE: "vwap" }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.match(error.message, /^Invalid runner environment: /);
      assert.match(error.message, /SIM_UNIVERSE: Required/);
      assert.match(error.message, /SIM_INITIAL_CASH: Number must be greater than 0/);
      assert.match(error.message, /SIM_FILL_PRICE: /);
      return true;
    },
  );
});

test("loadRunnerConfig rejects params that are not a JSON object", () => {
  assert.throws(
    () => loadRunnerConfig({ SIM_UNIVERSE: "600000", SIM_DECISION_MAKER_PARAMS: "[1, 2]" }),
    /SIM_DECISION_MAKER_PARAMS: must be a JSON object/,
  );
  assert.throws(
    () => loadRunnerConfig({ SIM_UNIVERSE: "600000", SIM_DECISION_MAKER_PARAMS: "{oops" }),
    /SIM_DECISION_MAKER_PARAMS: not valid JSON/,
  );
});

test("loadRunnerConfig rejects a start after the end", () => {
  assert.throws(
    () => loadRunnerConfig({ SIM_UNIVERSE: "600000", SIM_START: "2024-02-01", SIM_END: "2024-01-01" }),
    /SIM_START 2024-02-01 is after SIM_END 2024-01-01/,
  );
});

// ============================================================================
// End-to-end runs
// ============================================================================

test("runFromConfig runs the simulation and writes result and manifest", async (t) => {
  const workspace = await withWorkspace(t);
  const config = loadRunnerConfig(envFor(workspace, { SIM_RUN_NAME: "march" }));

  const { result, runDir } = await runFromConfig(config, {
    logger: createSilentLogger(),
    writeRun: createRunWriter({ runsDir: workspace.runsDir, now: () => FIXED_NOW }),
    runId: "march-run",
  });

  assert.equal(runDir, join(workspace.runsDir, "march-run"));
  assert.equal(result.snapshots.length, 5);
  assert.equal(result.summary.buyCount, 1);
  // 999 lots of 100 at 10.00 plus the 0.03% commission.
  assert.equal(result.transactions[0]?.quantity, 99_900);
  assert.equal(result.transactions[0]?.cashAfter, 700.3);

  const manifest = await readJson(join(runDir, "manifest.json"));
  assert.deepEqual(manifest, {
    runId: "march-run",
    summary: JSON.parse(JSON.stringify(result.summary)),
    decisionMaker: { key: "buy_and_hold", name: "buy_and_hold", params: {} },
    universe: ["600000"],
    period: { firstDate: "2024-03-04", lastDate: "2024-03-08", tradingDays: 5 },
    artifacts: { result: join(runDir, "result.json") },
    engine: { version: "0.1.0" },
    metadata: { name: "march", createdAt: "2024-03-09T08:00:00.000Z", status: "completed" },
  });

  const saved = await readJson(join(runDir, "result.json"));
  assert.deepEqual(saved, JSON.parse(JSON.stringify(result)));
});

test("runFromConfig narrows the calendar to SIM_START and SIM_END", async (t) => {
  const workspace = await withWorkspace(t);
  const config = loadRunnerConfig(
    envFor(workspace, { SIM_START: "2024-03-05", SIM_END: "2024-03-07" }),
  );
  const { result } = await runFromConfig(config, {
    logger: createSilentLogger(),
    runId: "narrow",
  });
  assert.deepEqual(result.config.calendar, ["2024-03-05", "2024-03-06", "2024-03-07"]);
  assert.equal(result.transactions[0]?.date, "2024-03-05");
});

test("runFromConfig fails when an instrument has no dataset", async (t) => {
  const workspace = await withWorkspace(t);
  const config = loadRunnerConfig(envFor(workspace, { SIM_UNIVERSE: "600000,999999" }));
  await assert.rejects(
    runFromConfig(config, { logger: createSilentLogger() }),
    /No bars found for 999999 in /,
  );
});

test("runFromConfig fails when the range holds no trading days", async (t) => {
  const workspace = await withWorkspace(t);
  const config = loadRunnerConfig(
    envFor(workspace, { SIM_START: "2025-01-01", SIM_END: "2025-01-31" }),
  );
  await assert.rejects(
    runFromConfig(config, { logger: createSilentLogger() }),
    /No trading days between 2025-01-01 and 2025-01-31/,
  );
});

test("runFromConfig fails on an unknown decision maker before running", async (t) => {
  const workspace = await withWorkspace(t);
  const config = loadRunnerConfig(envFor(workspace, { SIM_DECISION_MAKER: "mystery" }));
  let written = false;
  await assert.rejects(
    runFromConfig(config, {
      logger: createSilentLogger(),
      writeRun: async () => {
        written = true;
        return "";
      },
    }),
    /Unknown decision maker "mystery"/,
  );
  assert.equal(written, false);
});
