import type { CostSchedule, OrderSide } from "@daybook/sdk";

import { fromMinorUnits, toMinorUnits } from "./money.js";

export interface TradeCost {
  readonly commission: number;
  readonly stampDuty: number;
  /** commission + stampDuty */
  readonly total: number;
}

/**
 * Commission is `max(notional x commissionRate, minimumFee)`; stamp duty applies to sells only.
 * Each component is rounded to the minor unit before it is summed.
 */
export const computeTradeCost = (
  notional: number,
  side: OrderSide,
  costs: Readonly<CostSchedule>,
): TradeCost => {
  const commission = Math.max(
    toMinorUnits(notional * costs.commissionRate),
    toMinorUnits(costs.minimumFee),
  );
  const stampDuty = side === "sell" ? toMinorUnits(notional * costs.stampDutyRate) : 0;
  return {
    commission: fromMinorUnits(commission),
    stampDuty: fromMinorUnits(stampDuty),
    total: fromMinorUnits(commission + stampDuty),
  };
};

export interface CashImpact {
  readonly notional: number;
  readonly commission: number;
  readonly stampDuty: number;
  readonly totalCost: number;
  /** Signed change to cash: -(notional + costs) for buys, notional - costs for sells. */
  readonly cashDelta: number;
}

export const estimateCashImpact = (
  price: number,
  quantity: number,
  side: OrderSide,
  costs: Readonly<CostSchedule>,
): CashImpact => {
  const notionalMinor = toMinorUnits(price * quantity);
  const notional = fromMinorUnits(notionalMinor);
  const cost = computeTradeCost(notional, side, costs);
  const costMinor = toMinorUnits(cost.total);
  const cashDeltaMinor = side === "buy" ? -(notionalMinor + costMinor) : notionalMinor - costMinor;
  return {
    notional,
    commission: cost.commission,
    stampDuty: cost.stampDuty,
    totalCost: cost.total,
    cashDelta: fromMinorUnits(cashDeltaMinor),
  };
};
