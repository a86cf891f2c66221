import { z } from "zod";

import type { DecisionMaker, DecisionSnapshot, Order } from "@daybook/sdk";

export const metadata = {
  name: "channel_breakout",
  description: "Buys when the close clears the prior N-day high and exits below the prior N-day low",
  version: "1.0.0",
  tags: ["breakout", "trend-following"],
};

const ParamsSchema = z.object({
  lookback: z.number().int().min(2).default(10),
  lots: z.number().int().positive().default(1),
});

export function createDecisionMaker(params: unknown): DecisionMaker {
  const { lookback, lots } = ParamsSchema.parse(params ?? {});

  return {
    name: metadata.name,
    decide(snapshot: DecisionSnapshot): Order[] {
      const orders: Order[] = [];
      for (const instrumentId of snapshot.universe) {
        const today = snapshot.instruments[instrumentId]?.bar;
        if (!today) {
          continue;
        }
        const prior = snapshot.history(instrumentId, lookback + 1).slice(0, -1);
        if (prior.length < lookback) {
          continue;
        }
        const high = Math.max(...prior.map((bar) => bar.high));
        const low = Math.min(...prior.map((bar) => bar.low));
        const held = snapshot.positions[instrumentId];

        if (!held && today.close > high) {
          const quantity = lots * snapshot.lotSize;
          if (snapshot.estimate({ instrumentId, side: "buy", quantity })?.affordable) {
            orders.push({
              instrumentId,
              side: "buy",
              quantity,
              date: snapshot.date,
              reason: `close ${today.close} above ${lookback}-day high ${high}`,
            });
          }
        } else if (held && held.settledQuantity > 0 && today.close < low) {
          orders.push({
            instrumentId,
            side: "sell",
            quantity: held.settledQuantity,
            date: snapshot.date,
            reason: `close ${today.close} below ${lookback}-day low ${low}`,
          });
        }
      }
      return orders;
    },
  };
}
