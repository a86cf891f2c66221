import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { DecisionMaker, ISODate, RunSummary } from "@daybook/sdk";
import { CsvSource, buildTradingCalendar, loadMemoryFeed } from "@daybook/data";
import { Simulation, type RunResult } from "@daybook/engine";
import { createLogger, type Logger } from "@daybook/logger";

import type { RunnerConfig } from "./config.js";
import { resolveDecisionMaker } from "./decisionMakerLoader.js";
import { DEFAULT_RUNS_DIR } from "./paths.js";

export const ENGINE_VERSION = "0.1.0";

interface Manifest {
  readonly runId: string;
  readonly summary: RunSummary;
  readonly decisionMaker: {
    readonly key: string;
    readonly name: string;
    readonly params: Readonly<Record<string, unknown>>;
  };
  readonly universe: ReadonlyArray<string>;
  readonly period: {
    readonly firstDate: ISODate;
    readonly lastDate: ISODate;
    readonly tradingDays: number;
  };
  readonly artifacts: {
    readonly result: string;
  };
  readonly engine: {
    readonly version: string;
  };
  readonly metadata: {
    readonly name: string;
    readonly createdAt: string;
    readonly status: "completed";
  };
}

interface ManifestWriterOptions {
  readonly runsDir?: string;
  readonly now?: () => Date;
}

export type RunWriter = (
  result: RunResult,
  decisionMaker: Manifest["decisionMaker"],
) => Promise<string>;

const writeJson = async (path: string, payload: unknown): Promise<void> => {
  await writeFile(path, `${JSON.stringify(payload, null, 2)}\n`, { encoding: "utf-8" });
};

/**
 * Writes `result.json` and `manifest.json` under `<runsDir>/<runId>/` and returns that directory.
 */
export const createRunWriter = (options: ManifestWriterOptions = {}): RunWriter => {
  const runsDir = options.runsDir ?? DEFAULT_RUNS_DIR;
  const now = options.now ?? (() => new Date());
  return async (result, decisionMaker) => {
    const runDir = join(runsDir, result.runId);
    await mkdir(runDir, { recursive: true });

    const resultPath = join(runDir, "result.json");
    await writeJson(resultPath, result);

    const calendar = result.config.calendar;
    const manifest: Manifest = {
      runId: result.runId,
      summary: result.summary,
      decisionMaker,
      universe: result.config.universe,
      period: {
        firstDate: calendar[0] ?? "",
        lastDate: calendar[calendar.length - 1] ?? "",
        tradingDays: calendar.length,
      },
      artifacts: { result: resultPath },
      engine: { version: ENGINE_VERSION },
      metadata: {
        name: result.config.runName,
        createdAt: now().toISOString(),
        status: "completed",
      },
    };
    await writeJson(join(runDir, "manifest.json"), manifest);
    return runDir;
  };
};

export interface RunnerDependencies {
  readonly logger?: Logger;
  readonly writeRun?: RunWriter;
  readonly resolveDecisionMaker?: (key: string, params: unknown) => Promise<DecisionMaker>;
  readonly runId?: string;
}

export interface RunOutcome {
  readonly result: RunResult;
  readonly runDir: string;
}

/**
 * Loads the universe from CSV, builds the trading calendar, runs the decision maker
 * over it and persists the result.
 */
export const runFromConfig = async (
  config: RunnerConfig,
  deps: RunnerDependencies = {},
): Promise<RunOutcome> => {
  const logger = deps.logger ?? createLogger("services/sim-runner");
  const writeRun = deps.writeRun ?? createRunWriter({ runsDir: config.runsDir });
  const resolve =
    deps.resolveDecisionMaker ??
    ((key: string, params: unknown) =>
      resolveDecisionMaker(key, params, { dir: config.customDir, logger }));

  const source = new CsvSource({ datasetsDir: config.datasetsDir });
  const feed = await loadMemoryFeed(source, config.universe);
  const missing = config.universe.filter((instrumentId) => feed.dates(instrumentId).length === 0);
  if (missing.length > 0) {
    throw new Error(`No bars found for ${missing.join(", ")} in ${config.datasetsDir}`);
  }

  const calendar = buildTradingCalendar(feed, config.universe, {
    start: config.start,
    end: config.end,
  });
  if (calendar.length === 0) {
    throw new Error(
      `No trading days between ${config.start ?? "the first bar"} and ${config.end ?? "the last bar"}`,
    );
  }

  const decisionMaker = await resolve(config.decisionMaker.key, config.decisionMaker.params);
  logger.info("Running simulation", {
    decisionMaker: decisionMaker.name,
    universe: config.universe,
    firstDate: calendar[0],
    lastDate: calendar[calendar.length - 1],
  });

  const simulation = new Simulation({
    config: {
      ...config.settings,
      runName: config.runName,
      initialCash: config.initialCash,
      universe: config.universe,
      calendar,
    },
    feed,
    decisionMaker,
    logger: deps.logger ?? createLogger("engine"),
    ...(deps.runId === undefined ? {} : { runId: deps.runId }),
  });
  const result = await simulation.run();
  const runDir = await writeRun(result, {
    key: config.decisionMaker.key,
    name: decisionMaker.name,
    params: config.decisionMaker.params,
  });

  logger.info("Run written", {
    runId: result.runId,
    runDir,
    finalEquity: result.summary.finalEquity,
    totalReturn: result.summary.totalReturn,
  });
  return { result, runDir };
};
