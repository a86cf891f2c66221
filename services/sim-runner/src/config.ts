import { config as loadEnv } from "dotenv";
import { join } from "node:path";
import { z } from "zod";

import { IsoDateSchema, assertValid, type ISODate, type RunConfigInput } from "@daybook/sdk";

import { DEFAULT_CUSTOM_DIR, DEFAULT_DATASETS_DIR, DEFAULT_RUNS_DIR, REPO_ROOT } from "./paths.js";

/** Loads the repository `.env` first, then one in the working directory. Existing variables win. */
export const loadEnvironment = (): void => {
  loadEnv({ path: join(REPO_ROOT, ".env") });
  loadEnv();
};

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalNumber = <Schema extends z.ZodTypeAny>(schema: Schema) =>
  z.preprocess(blankToUndefined, schema.optional());

const instrumentList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )
  .pipe(z.array(z.string()).min(1, "SIM_UNIVERSE must name at least one instrument"));

const jsonObject = z.string().transform((value, ctx): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
    });
    return z.NEVER;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON object" });
    return z.NEVER;
  }
  return { ...parsed };
});

export const RunnerEnvSchema = z.object({
  SIM_RUN_NAME: z.string().min(1).default("simulation"),
  SIM_UNIVERSE: instrumentList,
  SIM_START: z.preprocess(blankToUndefined, IsoDateSchema.optional()),
  SIM_END: z.preprocess(blankToUndefined, IsoDateSchema.optional()),
  SIM_INITIAL_CASH: optionalNumber(z.coerce.number().positive().finite()),
  SIM_DECISION_MAKER: z.string().min(1).default("buy_and_hold"),
  SIM_DECISION_MAKER_PARAMS: jsonObject.default("{}"),
  SIM_LOT_SIZE: optionalNumber(z.coerce.number().int().positive()),
  SIM_SETTLEMENT_LAG_DAYS: optionalNumber(z.coerce.number().int().min(0)),
  SIM_FILL_PRICE: z.preprocess(blankToUndefined, z.enum(["close", "open"]).optional()),
  SIM_COMMISSION_RATE: optionalNumber(z.coerce.number().min(0).max(1)),
  SIM_STAMP_DUTY_RATE: optionalNumber(z.coerce.number().min(0).max(1)),
  SIM_MINIMUM_FEE: optionalNumber(z.coerce.number().nonnegative()),
  SIM_RISK_FREE_RATE: optionalNumber(z.coerce.number().min(0).max(1)),
  SIM_INDICATOR_WINDOW: optionalNumber(z.coerce.number().int().min(20)),
  SIM_DATASETS_DIR: z.string().min(1).default(DEFAULT_DATASETS_DIR),
  SIM_RUNS_DIR: z.string().min(1).default(DEFAULT_RUNS_DIR),
  SIM_CUSTOM_DIR: z.string().min(1).default(DEFAULT_CUSTOM_DIR),
});

export const DEFAULT_INITIAL_CASH = 1_000_000;

export interface RunnerConfig {
  readonly runName: string;
  readonly universe: ReadonlyArray<string>;
  readonly start?: ISODate;
  readonly end?: ISODate;
  readonly initialCash: number;
  readonly decisionMaker: {
    readonly key: string;
    readonly params: Readonly<Record<string, unknown>>;
  };
  /** Run settings left unset fall through to the RunConfig defaults. */
  readonly settings: Omit<RunConfigInput, "runName" | "initialCash" | "universe" | "calendar">;
  readonly datasetsDir: string;
  readonly runsDir: string;
  readonly customDir: string;
}

/**
 * Reads `SIM_*` variables into a runner configuration.
 * @throws Error listing every invalid variable.
 */
export const loadRunnerConfig = (env: NodeJS.ProcessEnv = process.env): RunnerConfig => {
  const parsed = assertValid(RunnerEnvSchema, env, "runner environment");
  if (parsed.SIM_START && parsed.SIM_END && parsed.SIM_START > parsed.SIM_END) {
    throw new Error(
      `Invalid runner environment: SIM_START ${parsed.SIM_START} is after SIM_END ${parsed.SIM_END}`,
    );
  }

  const costs = {
    ...(parsed.SIM_COMMISSION_RATE === undefined ? {} : { commissionRate: parsed.SIM_COMMISSION_RATE }),
    ...(parsed.SIM_STAMP_DUTY_RATE === undefined ? {} : { stampDutyRate: parsed.SIM_STAMP_DUTY_RATE }),
    ...(parsed.SIM_MINIMUM_FEE === undefined ? {} : { minimumFee: parsed.SIM_MINIMUM_FEE }),
  };

  return Object.freeze({
    runName: parsed.SIM_RUN_NAME,
    universe: Object.freeze(parsed.SIM_UNIVERSE),
    start: parsed.SIM_START,
    end: parsed.SIM_END,
    initialCash: parsed.SIM_INITIAL_CASH ?? DEFAULT_INITIAL_CASH,
    decisionMaker: Object.freeze({
      key: parsed.SIM_DECISION_MAKER,
      params: Object.freeze(parsed.SIM_DECISION_MAKER_PARAMS),
    }),
    settings: Object.freeze({
      costs,
      ...(parsed.SIM_LOT_SIZE === undefined ? {} : { lotSize: parsed.SIM_LOT_SIZE }),
      ...(parsed.SIM_SETTLEMENT_LAG_DAYS === undefined
        ? {}
        : { settlementLagDays: parsed.SIM_SETTLEMENT_LAG_DAYS }),
      ...(parsed.SIM_FILL_PRICE === undefined ? {} : { fillPrice: parsed.SIM_FILL_PRICE }),
      ...(parsed.SIM_RISK_FREE_RATE === undefined ? {} : { riskFreeRate: parsed.SIM_RISK_FREE_RATE }),
      ...(parsed.SIM_INDICATOR_WINDOW === undefined
        ? {}
        : { indicatorWindow: parsed.SIM_INDICATOR_WINDOW }),
    }),
    datasetsDir: parsed.SIM_DATASETS_DIR,
    runsDir: parsed.SIM_RUNS_DIR,
    customDir: parsed.SIM_CUSTOM_DIR,
  });
};
