import type { DecisionSnapshot, Order, OrderSide } from "../index.js";

export const makeOrder = (
  snapshot: DecisionSnapshot,
  instrumentId: string,
  side: OrderSide,
  quantity: number,
  reason: string,
): Order => ({
  instrumentId,
  side,
  quantity,
  date: snapshot.date,
  reason,
});

/**
 * Largest buy quantity, in whole lots, whose notional plus costs fits in `budget`.
 */
export const affordableQuantity = (
  snapshot: DecisionSnapshot,
  instrumentId: string,
  budget: number,
  maxLots = Number.POSITIVE_INFINITY,
): number => {
  const bar = snapshot.instruments[instrumentId]?.bar;
  if (!bar || bar.close <= 0 || budget <= 0) {
    return 0;
  }
  let lots = Math.min(maxLots, Math.floor(budget / (bar.close * snapshot.lotSize)));
  while (lots > 0) {
    const quantity = lots * snapshot.lotSize;
    const estimate = snapshot.estimate({ instrumentId, side: "buy", quantity });
    if (estimate && estimate.affordable && -estimate.cashDelta <= budget) {
      return quantity;
    }
    lots -= 1;
  }
  return 0;
};

export const settledQuantity = (snapshot: DecisionSnapshot, instrumentId: string): number =>
  snapshot.positions[instrumentId]?.settledQuantity ?? 0;
