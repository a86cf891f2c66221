import type {
  CostSchedule,
  FillPriceRule,
  ISODate,
  MarketBar,
  Order,
  OrderSide,
  Rejection,
  RejectionReason,
  Transaction,
} from "@daybook/sdk";

import { estimateCashImpact } from "./costModel.js";
import type { PortfolioLedger } from "./ledger.js";
import { toMinorUnits } from "./money.js";

export interface ExecutionContext {
  readonly date: ISODate;
  readonly lotSize: number;
  readonly costs: Readonly<CostSchedule>;
  readonly fillPrice: FillPriceRule;
}

export type ExecutionOutcome =
  | { readonly status: "filled"; readonly transaction: Transaction }
  | { readonly status: "rejected"; readonly rejection: Rejection };

export interface RejectedOrderFields {
  readonly instrumentId: string;
  readonly side: OrderSide | "unknown";
  readonly quantity: number;
}

export const createRejection = (
  order: RejectedOrderFields,
  date: ISODate,
  reason: RejectionReason,
  message: string,
): Rejection =>
  Object.freeze({
    date,
    instrumentId: order.instrumentId,
    side: order.side,
    quantity: order.quantity,
    reason,
    message,
  });

export const fillPriceOf = (bar: MarketBar, rule: FillPriceRule): number =>
  rule === "open" ? bar.open : bar.close;

const rejected = (
  order: Order,
  context: ExecutionContext,
  reason: RejectionReason,
  message: string,
): ExecutionOutcome => ({
  status: "rejected",
  rejection: createRejection(order, context.date, reason, message),
});

/**
 * Validates and fills one order against the ledger at the bar's fill price.
 * The first failing check wins and leaves the ledger untouched.
 */
export const executeOrder = (
  order: Order,
  ledger: PortfolioLedger,
  bar: MarketBar,
  context: ExecutionContext,
): ExecutionOutcome => {
  const { quantity, side, instrumentId } = order;
  if (!Number.isInteger(quantity) || quantity <= 0 || quantity % context.lotSize !== 0) {
    return rejected(
      order,
      context,
      "invalid_quantity",
      `Quantity ${quantity} is not a positive multiple of the lot size ${context.lotSize}`,
    );
  }

  const price = fillPriceOf(bar, context.fillPrice);
  const impact = estimateCashImpact(price, quantity, side, context.costs);

  if (side === "buy") {
    const required = -impact.cashDelta;
    if (toMinorUnits(ledger.cash()) < toMinorUnits(required)) {
      return rejected(
        order,
        context,
        "insufficient_funds",
        `Buying ${quantity} ${instrumentId} needs ${required.toFixed(2)} but cash is ${ledger.cash().toFixed(2)}`,
      );
    }
  } else {
    const settled = ledger.settledQuantity(instrumentId, context.date);
    if (settled < quantity) {
      return rejected(
        order,
        context,
        "insufficient_settled_shares",
        `Selling ${quantity} ${instrumentId} but only ${settled} settled shares are available`,
      );
    }
  }

  const fill = { instrumentId, quantity, price, date: context.date, cashDelta: impact.cashDelta };
  const applied = side === "buy" ? ledger.applyBuy(fill) : ledger.applySell(fill);

  return {
    status: "filled",
    transaction: Object.freeze({
      sequence: applied.sequence,
      date: context.date,
      instrumentId,
      side,
      quantity,
      price,
      notional: impact.notional,
      commission: impact.commission,
      stampDuty: impact.stampDuty,
      totalCost: impact.totalCost,
      cashDelta: impact.cashDelta,
      cashAfter: applied.cashAfter,
      realizedPnl: applied.realizedPnl,
      reason: order.reason ?? "",
    }),
  };
};
