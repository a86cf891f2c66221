import { z } from "zod";

import type { DecisionMakerFactory, DecisionSnapshot, Order } from "../index.js";
import { affordableQuantity, makeOrder, settledQuantity } from "./helpers.js";

export const name = "sma_crossover" as const;

export const schema = z
  .object({
    fastLength: z.number().int().min(1),
    slowLength: z.number().int().min(2),
    /** Lots bought on each bullish cross. */
    lots: z.number().int().positive().default(1),
  })
  .superRefine((value, ctx) => {
    if (value.fastLength >= value.slowLength) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fastLength must be less than slowLength",
        path: ["fastLength"],
      });
    }
  });

export type SmaCrossoverParams = z.infer<typeof schema>;

interface InstrumentState {
  readonly closes: number[];
  prevFast: number | null;
  prevSlow: number | null;
}

const average = (values: ReadonlyArray<number>): number =>
  values.reduce((acc, value) => acc + value, 0) / values.length;

export const factory: DecisionMakerFactory<SmaCrossoverParams> = (params) => {
  const states = new Map<string, InstrumentState>();

  const stateFor = (instrumentId: string): InstrumentState => {
    let state = states.get(instrumentId);
    if (!state) {
      state = { closes: [], prevFast: null, prevSlow: null };
      states.set(instrumentId, state);
    }
    return state;
  };

  return {
    name,
    onStart() {
      states.clear();
    },
    decide(snapshot: DecisionSnapshot): Order[] {
      const orders: Order[] = [];
      let cash = snapshot.cash;

      for (const instrumentId of snapshot.universe) {
        const instrument = snapshot.instruments[instrumentId];
        if (!instrument) {
          continue;
        }
        const state = stateFor(instrumentId);
        state.closes.push(instrument.bar.close);
        if (state.closes.length > params.slowLength) {
          state.closes.shift();
        }
        if (state.closes.length < params.slowLength) {
          continue;
        }

        const fastAvg = average(state.closes.slice(-params.fastLength));
        const slowAvg = average(state.closes);
        const { prevFast, prevSlow } = state;
        state.prevFast = fastAvg;
        state.prevSlow = slowAvg;
        if (prevFast === null || prevSlow === null) {
          continue;
        }

        if (prevFast <= prevSlow && fastAvg > slowAvg) {
          const quantity = affordableQuantity(snapshot, instrumentId, cash, params.lots);
          const estimate = snapshot.estimate({ instrumentId, side: "buy", quantity });
          if (quantity > 0 && estimate) {
            cash += estimate.cashDelta;
            orders.push(
              makeOrder(snapshot, instrumentId, "buy", quantity, "fast_sma_crossed_above_slow"),
            );
          }
        } else if (prevFast >= prevSlow && fastAvg < slowAvg) {
          const quantity = settledQuantity(snapshot, instrumentId);
          if (quantity > 0) {
            orders.push(
              makeOrder(snapshot, instrumentId, "sell", quantity, "fast_sma_crossed_below_slow"),
            );
          }
        }
      }

      return orders;
    },
  };
};
