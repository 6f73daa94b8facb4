import type {
  EngineConfig,
  EquityPoint,
  ExitReason,
  OpenPosition,
  PositionEvent,
  PricePoint,
  SignalSeries,
  Trade,
} from "@signal-bench/sdk";

import { derivePositionEvents } from "./positions.js";

export type SimulationConfig = Pick<EngineConfig, "initialCapital" | "commissionRate" | "liquidateAtEnd">;

export interface SimulationResult {
  readonly events: PositionEvent[];
  readonly trades: Trade[];
  readonly openPosition: OpenPosition | null;
  readonly equityCurve: EquityPoint[];
}

interface Lot {
  readonly entryTimestamp: string;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly entryFee: number;
  /** Cash committed at entry, fee included. */
  readonly allocation: number;
}

const openLot = (price: PricePoint, cash: number, commissionRate: number): Lot => {
  const entryFee = cash * commissionRate;
  return {
    entryTimestamp: price.timestamp,
    entryPrice: price.close,
    quantity: (cash - entryFee) / price.close,
    entryFee,
    allocation: cash,
  };
};

const closeLot = (
  lot: Lot,
  price: PricePoint,
  commissionRate: number,
  exitReason: ExitReason,
  sequence: number,
): { trade: Trade; proceeds: number } => {
  const gross = lot.quantity * price.close;
  const exitFee = gross * commissionRate;
  const proceeds = gross - exitFee;
  const pnl = proceeds - lot.allocation;
  return {
    proceeds,
    trade: {
      id: `trade-${sequence}`,
      direction: "long",
      entryTimestamp: lot.entryTimestamp,
      entryPrice: lot.entryPrice,
      exitTimestamp: price.timestamp,
      exitPrice: price.close,
      quantity: lot.quantity,
      entryFee: lot.entryFee,
      exitFee,
      pnl,
      returnPct: (pnl / lot.allocation) * 100,
      exitReason,
    },
  };
};

/**
 * Long-only, full-capital simulation filled at each bar's close. Emits one
 * equity point per bar; equity always equals cash plus holdings marked at the
 * bar's close. The price series must already satisfy the data contract.
 *
 * With `liquidateAtEnd`, an entry on the last bar is still filled and then
 * closed on that same bar, so the trade log shows a round trip that loses
 * both commissions and no position is left open.
 */
export const simulate = (
  prices: ReadonlyArray<PricePoint>,
  signals: SignalSeries,
  config: SimulationConfig,
): SimulationResult => {
  const events = derivePositionEvents(prices, signals);
  const eventsByIndex = new Map(events.map((event) => [event.index, event]));
  const { commissionRate } = config;
  const lastIndex = prices.length - 1;

  const trades: Trade[] = [];
  const equityCurve: EquityPoint[] = [];
  let cash = config.initialCapital;
  let lot: Lot | null = null;

  for (let index = 0; index < prices.length; index += 1) {
    const price = prices[index];
    const event = eventsByIndex.get(index);

    if (event?.kind === "enter") {
      lot = openLot(price, cash, commissionRate);
      cash = 0;
    }
    if (lot && (event?.kind === "exit" || (index === lastIndex && config.liquidateAtEnd))) {
      const reason: ExitReason = event?.kind === "exit" ? "signal" : "liquidation";
      const closed = closeLot(lot, price, commissionRate, reason, trades.length + 1);
      trades.push(closed.trade);
      cash += closed.proceeds;
      lot = null;
      if (reason === "liquidation") {
        events.push({ index, timestamp: price.timestamp, kind: "exit", price: price.close });
      }
    }

    const holdingsValue = lot ? lot.quantity * price.close : 0;
    equityCurve.push({ timestamp: price.timestamp, cash, holdingsValue, equity: cash + holdingsValue });
  }

  return {
    events,
    trades,
    openPosition: lot ? markOpenPosition(lot, prices[lastIndex]) : null,
    equityCurve,
  };
};

// Unrealized P&L excludes the commission a future exit would pay.
const markOpenPosition = (lot: Lot, last: PricePoint): OpenPosition => ({
  entryTimestamp: lot.entryTimestamp,
  entryPrice: lot.entryPrice,
  quantity: lot.quantity,
  entryFee: lot.entryFee,
  cost: lot.allocation,
  markPrice: last.close,
  unrealizedPnl: lot.quantity * last.close - lot.allocation,
});
