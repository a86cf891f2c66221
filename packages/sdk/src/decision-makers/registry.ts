import type { z } from "zod";

import type { DecisionMaker } from "../index.js";
import * as buyAndHold from "./buy_and_hold.js";
import * as rsiReversion from "./rsi_reversion.js";
import * as smaCrossover from "./sma_crossover.js";

export type BuiltinDecisionMakerKey =
  | typeof buyAndHold.name
  | typeof smaCrossover.name
  | typeof rsiReversion.name;

export interface DecisionMakerModule {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly schema: z.ZodTypeAny;
  create(params: unknown): DecisionMaker;
}

export const builtinDecisionMakers: Record<BuiltinDecisionMakerKey, DecisionMakerModule> = {
  [buyAndHold.name]: {
    name: buyAndHold.name,
    title: "Buy and Hold",
    description: "Splits cash evenly across the universe on the first day and never sells.",
    schema: buyAndHold.schema,
    create: (params) => buyAndHold.factory(buyAndHold.schema.parse(params)),
  },
  [smaCrossover.name]: {
    name: smaCrossover.name,
    title: "SMA Crossover",
    description: "Buys on a fast-over-slow moving average cross, exits on the reverse cross.",
    schema: smaCrossover.schema,
    create: (params) => smaCrossover.factory(smaCrossover.schema.parse(params)),
  },
  [rsiReversion.name]: {
    name: rsiReversion.name,
    title: "RSI Reversion",
    description: "Buys oversold instruments and sells settled holdings once overbought.",
    schema: rsiReversion.schema,
    create: (params) => rsiReversion.factory(rsiReversion.schema.parse(params)),
  },
};

export const isBuiltinDecisionMaker = (value: string): value is BuiltinDecisionMakerKey =>
  Object.prototype.hasOwnProperty.call(builtinDecisionMakers, value);

/**
 * Instantiates a built-in decision maker; `params` is validated by its schema.
 */
export const createBuiltinDecisionMaker = (
  key: string,
  params: unknown = {},
): DecisionMaker => {
  if (!isBuiltinDecisionMaker(key)) {
    throw new Error(`Unknown decision maker "${key}"`);
  }
  return builtinDecisionMakers[key].create(params);
};
