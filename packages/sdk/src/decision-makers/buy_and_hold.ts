import { z } from "zod";

import type { DecisionMakerFactory, DecisionSnapshot, Order } from "../index.js";
import { affordableQuantity, makeOrder } from "./helpers.js";

export const name = "buy_and_hold" as const;

export const schema = z.object({
  /** Fraction of starting cash to deploy on the first day. */
  allocation: z.number().gt(0).max(1).default(1),
});

export type BuyAndHoldParams = z.infer<typeof schema>;

export const factory: DecisionMakerFactory<BuyAndHoldParams> = (params) => {
  let invested = false;

  return {
    name,
    onStart() {
      invested = false;
    },
    decide(snapshot: DecisionSnapshot): Order[] {
      if (invested) {
        return [];
      }
      const tradable = snapshot.universe.filter((id) => snapshot.instruments[id] !== undefined);
      if (tradable.length === 0) {
        return [];
      }
      invested = true;

      const budget = (snapshot.cash * params.allocation) / tradable.length;
      const orders: Order[] = [];
      for (const instrumentId of tradable) {
        const quantity = affordableQuantity(snapshot, instrumentId, budget);
        if (quantity > 0) {
          orders.push(makeOrder(snapshot, instrumentId, "buy", quantity, "initial_allocation"));
        }
      }
      return orders;
    },
  };
};
