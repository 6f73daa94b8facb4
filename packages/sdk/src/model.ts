/** -----------------------------------------------------------------------
 *  Shared primitives
 *  -------------------------------------------------------------------- */

/** ISO-8601 date string (UTC recommended). */
export type ISODate = string;

/**
 * One OHLCV bar. Series are ordered by strictly increasing timestamp and are
 * only ever read by the engine.
 */
export interface PricePoint {
  readonly timestamp: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** Per-bar directional opinion emitted by a strategy. */
export const Signal = {
  Buy: 1,
  Sell: -1,
  Neutral: 0,
} as const;

export type Signal = (typeof Signal)[keyof typeof Signal];

export interface SignalPoint {
  readonly timestamp: ISODate;
  readonly signal: Signal;
}

/** One entry per input bar, derived only from bars up to and including it. */
export type SignalSeries = ReadonlyArray<SignalPoint>;

/** -----------------------------------------------------------------------
 *  Simulation output
 *  -------------------------------------------------------------------- */

/** A transition of the FLAT/LONG position state machine. */
export interface PositionEvent {
  readonly index: number;
  readonly timestamp: ISODate;
  readonly kind: "enter" | "exit";
  readonly price: number;
}

export type ExitReason = "signal" | "liquidation";

/** A closed round trip. `pnl` is net of entry and exit commission. */
export interface Trade {
  readonly id: string;
  readonly direction: "long";
  readonly entryTimestamp: ISODate;
  readonly entryPrice: number;
  readonly exitTimestamp: ISODate;
  readonly exitPrice: number;
  readonly quantity: number;
  readonly entryFee: number;
  readonly exitFee: number;
  readonly pnl: number;
  /** Realized P&L as a percentage of the capital committed at entry. */
  readonly returnPct: number;
  readonly exitReason: ExitReason;
}

/** A trade still open after the last bar, marked to that bar's close. */
export interface OpenPosition {
  readonly entryTimestamp: ISODate;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly entryFee: number;
  /** Cash committed at entry, commission included. */
  readonly cost: number;
  readonly markPrice: number;
  readonly unrealizedPnl: number;
}

export interface EquityPoint {
  readonly timestamp: ISODate;
  readonly cash: number;
  readonly holdingsValue: number;
  /** Always `cash + holdingsValue`. */
  readonly equity: number;
}

export interface PerformanceReport {
  readonly initialCapital: number;
  readonly finalCapital: number;
  readonly totalReturnPct: number;
  /** Largest peak-to-trough decline of the equity curve, as a positive percentage. */
  readonly maxDrawdownPct: number;
  /** Closed trades only. */
  readonly tradeCount: number;
  /** NaN when no trade has closed. */
  readonly winRatePct: number;
  /** Infinity with profits and no losses; NaN with neither. */
  readonly profitLossRatio: number;
  readonly annualReturnPct: number;
  readonly sharpe: number;
  readonly sortino: number;
  /** Share of bars with an open position, in percent. */
  readonly exposurePct: number;
}
