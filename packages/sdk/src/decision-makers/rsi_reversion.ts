import { z } from "zod";

import type { DecisionMakerFactory, DecisionSnapshot, Order } from "../index.js";
import { affordableQuantity, makeOrder, settledQuantity } from "./helpers.js";

export const name = "rsi_reversion" as const;

export const schema = z
  .object({
    oversold: z.number().min(0).max(100).default(30),
    overbought: z.number().min(0).max(100).default(70),
    lots: z.number().int().positive().default(1),
  })
  .refine((value) => value.oversold < value.overbought, {
    message: "oversold must be below overbought",
    path: ["oversold"],
  });

export type RsiReversionParams = z.infer<typeof schema>;

/**
 * Buys oversold instruments it does not hold and exits settled holdings once overbought.
 */
export const factory: DecisionMakerFactory<RsiReversionParams> = (params) => ({
  name,
  decide(snapshot: DecisionSnapshot): Order[] {
    const orders: Order[] = [];
    let cash = snapshot.cash;

    for (const instrumentId of snapshot.universe) {
      const rsi = snapshot.instruments[instrumentId]?.indicators?.rsi14;
      if (rsi === undefined || rsi === null) {
        continue;
      }
      const held = snapshot.positions[instrumentId]?.quantity ?? 0;

      if (rsi < params.oversold && held === 0) {
        const quantity = affordableQuantity(snapshot, instrumentId, cash, params.lots);
        const estimate = snapshot.estimate({ instrumentId, side: "buy", quantity });
        if (quantity > 0 && estimate) {
          cash += estimate.cashDelta;
          orders.push(makeOrder(snapshot, instrumentId, "buy", quantity, "rsi_below_oversold"));
        }
      } else if (rsi > params.overbought) {
        const quantity = settledQuantity(snapshot, instrumentId);
        if (quantity > 0) {
          orders.push(makeOrder(snapshot, instrumentId, "sell", quantity, "rsi_above_overbought"));
        }
      }
    }

    return orders;
  },
});
