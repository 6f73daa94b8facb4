import type { EquityPoint, PerformanceReport, Trade } from "@signal-bench/sdk";

/** The part of an equity point the return-based metrics read. */
export type EquitySample = Pick<EquityPoint, "timestamp" | "equity">;

const MS_PER_YEAR = 365.25 * 24 * 60 * 60 * 1000;
const DEFAULT_PERIODS_PER_YEAR = 365;

export const calculateReturns = (points: ReadonlyArray<EquitySample>): number[] => {
  if (points.length < 2) {
    return [];
  }
  const returns: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    const prev = points[i - 1];
    const current = points[i];
    if (prev.equity <= 0) {
      continue;
    }
    returns.push((current.equity - prev.equity) / prev.equity);
  }
  return returns;
};

const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};

const standardDeviation = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const avg = mean(values);
  const variance =
    values.reduce((acc, value) => {
      const diff = value - avg;
      return acc + diff * diff;
    }, 0) / values.length;
  return Math.sqrt(variance);
};

/**
 * Annualised Sharpe ratio of per-bar returns. `riskFreeRate` is annual and is
 * spread evenly over `periodsPerYear`. A flat curve yields 0.
 */
export const calculateSharpe = (
  points: ReadonlyArray<EquitySample>,
  riskFreeRate = 0,
  periodsPerYear = DEFAULT_PERIODS_PER_YEAR,
): number => {
  const returns = calculateReturns(points);
  if (returns.length === 0) {
    return 0;
  }
  const excessReturns = returns.map((value) => value - riskFreeRate / periodsPerYear);
  const std = standardDeviation(excessReturns);
  if (std === 0) {
    return 0;
  }
  return (mean(excessReturns) / std) * Math.sqrt(periodsPerYear);
};

export const calculateSortino = (
  points: ReadonlyArray<EquitySample>,
  riskFreeRate = 0,
  periodsPerYear = DEFAULT_PERIODS_PER_YEAR,
): number => {
  const returns = calculateReturns(points);
  if (returns.length === 0) {
    return 0;
  }
  const excessReturns = returns.map((value) => value - riskFreeRate / periodsPerYear);
  const downside = excessReturns.filter((value) => value < 0);
  if (downside.length === 0) {
    return 0;
  }
  const downsideVariance =
    downside.reduce((acc, value) => acc + value * value, 0) / downside.length;
  const downsideStd = Math.sqrt(downsideVariance);
  if (downsideStd === 0) {
    return 0;
  }
  return (mean(excessReturns) / downsideStd) * Math.sqrt(periodsPerYear);
};

/** Largest peak-to-trough decline as a positive fraction (0.25 = 25%). */
export const calculateMaxDrawdown = (points: ReadonlyArray<EquitySample>): number => {
  if (points.length === 0) {
    return 0;
  }
  let peak = points[0].equity;
  let maxDrawdown = 0;
  for (const point of points) {
    if (point.equity > peak) {
      peak = point.equity;
    }
    if (peak > 0) {
      const drawdown = (peak - point.equity) / peak;
      if (drawdown > maxDrawdown) {
        maxDrawdown = drawdown;
      }
    }
  }
  return maxDrawdown;
};

export const calculateCagr = (points: ReadonlyArray<EquitySample>): number => {
  if (points.length < 2) {
    return 0;
  }
  const start = points[0];
  const end = points[points.length - 1];
  if (start.equity <= 0 || end.equity <= 0) {
    return 0;
  }
  const startTime = Date.parse(start.timestamp);
  const endTime = Date.parse(end.timestamp);
  if (!Number.isFinite(startTime) || !Number.isFinite(endTime) || startTime >= endTime) {
    return 0;
  }
  const years = (endTime - startTime) / MS_PER_YEAR;
  return Math.pow(end.equity / start.equity, 1 / years) - 1;
};

/** Winning share of closed trades, in percent. NaN when nothing has closed. */
export const calculateWinRate = (trades: ReadonlyArray<Pick<Trade, "pnl">>): number => {
  if (trades.length === 0) {
    return Number.NaN;
  }
  const winners = trades.filter((trade) => trade.pnl > 0).length;
  return (winners / trades.length) * 100;
};

/**
 * Gross profit over gross loss. Infinity when there are profits but no losses,
 * NaN when there are neither.
 */
export const calculateProfitLossRatio = (trades: ReadonlyArray<Pick<Trade, "pnl">>): number => {
  const grossProfit = trades.filter((t) => t.pnl > 0).reduce((sum, t) => sum + t.pnl, 0);
  const grossLoss = Math.abs(trades.filter((t) => t.pnl < 0).reduce((sum, t) => sum + t.pnl, 0));

  if (grossLoss === 0) {
    return grossProfit > 0 ? Number.POSITIVE_INFINITY : Number.NaN;
  }
  return grossProfit / grossLoss;
};

const calculateExposure = (points: ReadonlyArray<EquityPoint>): number => {
  if (points.length === 0) {
    return 0;
  }
  const holding = points.filter((point) => point.holdingsValue > 0).length;
  return (holding / points.length) * 100;
};

/** ---- report ---- */

export interface PerformanceInput {
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  /** Closed trades only; an open position shows up in the curve, not here. */
  readonly trades: ReadonlyArray<Trade>;
  readonly initialCapital: number;
}

export interface AnalyzeOptions {
  readonly periodsPerYear?: number;
  readonly riskFreeRate?: number;
}

/**
 * Reduces a finished run to its frozen {@link PerformanceReport}. Pure; an
 * empty curve reports the initial capital as final capital.
 */
export const analyzePerformance = (
  input: PerformanceInput,
  options: AnalyzeOptions = {},
): PerformanceReport => {
  const { equityCurve, trades, initialCapital } = input;
  const periodsPerYear = options.periodsPerYear ?? DEFAULT_PERIODS_PER_YEAR;
  const riskFreeRate = options.riskFreeRate ?? 0;
  const last = equityCurve.at(-1);
  const finalCapital = last ? last.equity : initialCapital;

  return Object.freeze({
    initialCapital,
    finalCapital,
    totalReturnPct: (finalCapital / initialCapital - 1) * 100,
    maxDrawdownPct: calculateMaxDrawdown(equityCurve) * 100,
    tradeCount: trades.length,
    winRatePct: calculateWinRate(trades),
    profitLossRatio: calculateProfitLossRatio(trades),
    annualReturnPct: calculateCagr(equityCurve) * 100,
    sharpe: calculateSharpe(equityCurve, riskFreeRate, periodsPerYear),
    sortino: calculateSortino(equityCurve, riskFreeRate, periodsPerYear),
    exposurePct: calculateExposure(equityCurve),
  });
};
