import { strict as assert } from "node:assert";
import test from "node:test";

import type { EquityPoint, Trade } from "@signal-bench/sdk";

import {
  analyzePerformance,
  calculateCagr,
  calculateMaxDrawdown,
  calculateProfitLossRatio,
  calculateReturns,
  calculateSharpe,
  calculateSortino,
  calculateWinRate,
  type EquitySample,
} from "../src/index.js";

const close = (actual: number, expected: number, eps = 1e-9): void => {
  assert.ok(Math.abs(actual - expected) < eps, `expected ${expected}, received ${actual}`);
};

const samplePoints: EquitySample[] = [
  { timestamp: "2024-01-01T00:00:00.000Z", equity: 100_000 },
  { timestamp: "2024-01-02T00:00:00.000Z", equity: 101_000 },
  { timestamp: "2024-01-03T00:00:00.000Z", equity: 99_500 },
  { timestamp: "2024-01-04T00:00:00.000Z", equity: 102_000 },
];

const flatPoints: EquitySample[] = [
  { timestamp: "2024-01-01T00:00:00.000Z", equity: 100 },
  { timestamp: "2024-01-02T00:00:00.000Z", equity: 100 },
  { timestamp: "2024-01-03T00:00:00.000Z", equity: 100 },
];

const tradeWithPnl = (pnl: number): Pick<Trade, "pnl"> => ({ pnl });

// ============================================================================
// per-bar returns and risk-adjusted ratios
// ============================================================================

test("calculateReturns computes sequential fractional returns", () => {
  const returns = calculateReturns(samplePoints);
  assert.equal(returns.length, 3);
  close(returns[0], 0.01);
  close(returns[1], -1_500 / 101_000);
  close(returns[2], 2_500 / 99_500);
});

test("calculateReturns skips steps from non-positive equity", () => {
  assert.deepEqual(calculateReturns([]), []);
  assert.deepEqual(
    calculateReturns([
      { timestamp: "2024-01-01T00:00:00.000Z", equity: 0 },
      { timestamp: "2024-01-02T00:00:00.000Z", equity: 100 },
    ]),
    [],
  );
});

test("calculateSharpe is zero for a flat curve or too few points", () => {
  assert.equal(calculateSharpe(flatPoints), 0);
  assert.equal(calculateSharpe([samplePoints[0]]), 0);
});

test("calculateSharpe annualises by the supplied periods per year", () => {
  const daily = calculateSharpe(samplePoints, 0, 365);
  const weekly = calculateSharpe(samplePoints, 0, 52);
  assert.ok(daily > 0);
  close(daily / weekly, Math.sqrt(365 / 52));
});

test("calculateSortino is zero without downside returns", () => {
  const rising: EquitySample[] = [
    { timestamp: "2024-01-01T00:00:00.000Z", equity: 100 },
    { timestamp: "2024-01-02T00:00:00.000Z", equity: 110 },
    { timestamp: "2024-01-03T00:00:00.000Z", equity: 121 },
  ];
  assert.equal(calculateSortino(rising), 0);
});

test("calculateSortino divides by downside deviation only", () => {
  const returns = calculateReturns(samplePoints);
  const avg = (returns[0] + returns[1] + returns[2]) / 3;
  const expected = (avg / Math.abs(returns[1])) * Math.sqrt(365);
  close(calculateSortino(samplePoints), expected);
});

// ============================================================================
// drawdown and growth
// ============================================================================

test("calculateMaxDrawdown reports the largest decline as a positive fraction", () => {
  close(calculateMaxDrawdown(samplePoints), 1_500 / 101_000);
  assert.equal(calculateMaxDrawdown([]), 0);
  assert.equal(calculateMaxDrawdown(flatPoints), 0);
});

test("calculateMaxDrawdown keeps the deepest of several drawdowns", () => {
  const points: EquitySample[] = [100, 90, 120, 84, 130, 117].map((equity, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, idx + 1)).toISOString(),
    equity,
  }));
  close(calculateMaxDrawdown(points), 0.3);
});

test("calculateCagr compounds over exactly one year", () => {
  const points: EquitySample[] = [
    { timestamp: "2024-01-01T00:00:00.000Z", equity: 100 },
    { timestamp: "2024-12-31T06:00:00.000Z", equity: 121 },
  ];
  close(calculateCagr(points), 0.21);
});

test("calculateCagr is zero when the span is not positive", () => {
  assert.equal(
    calculateCagr([
      { timestamp: "2024-01-01T00:00:00.000Z", equity: 100 },
      { timestamp: "2024-01-01T00:00:00.000Z", equity: 120 },
    ]),
    0,
  );
  assert.equal(calculateCagr([samplePoints[0]]), 0);
});

// ============================================================================
// trade statistics
// ============================================================================

test("calculateWinRate counts strictly positive trades", () => {
  assert.equal(calculateWinRate([10, -5, 0, 20].map(tradeWithPnl)), 50);
  assert.ok(Number.isNaN(calculateWinRate([])));
});

test("calculateProfitLossRatio divides gross profit by gross loss", () => {
  assert.equal(calculateProfitLossRatio([10, -5, 20].map(tradeWithPnl)), 6);
  assert.equal(calculateProfitLossRatio([10].map(tradeWithPnl)), Number.POSITIVE_INFINITY);
  assert.ok(Number.isNaN(calculateProfitLossRatio([])));
  assert.ok(Number.isNaN(calculateProfitLossRatio([0].map(tradeWithPnl))));
  assert.equal(calculateProfitLossRatio([-4].map(tradeWithPnl)), 0);
});

// ============================================================================
// analyzePerformance
// ============================================================================

const timestamps = [0, 1, 2, 3, 4].map((idx) => new Date(Date.UTC(2024, 0, 1 + idx)).toISOString());

const roundTripCurve: EquityPoint[] = [
  { timestamp: timestamps[0], cash: 1_000, holdingsValue: 0, equity: 1_000 },
  { timestamp: timestamps[1], cash: 1_000, holdingsValue: 0, equity: 1_000 },
  { timestamp: timestamps[2], cash: 0, holdingsValue: 1_000, equity: 1_000 },
  { timestamp: timestamps[3], cash: 0, holdingsValue: 1_200, equity: 1_200 },
  { timestamp: timestamps[4], cash: 1_200, holdingsValue: 0, equity: 1_200 },
];

const roundTrip: Trade = {
  id: "trade-1",
  direction: "long",
  entryTimestamp: timestamps[2],
  entryPrice: 100,
  exitTimestamp: timestamps[4],
  exitPrice: 120,
  quantity: 10,
  entryFee: 0,
  exitFee: 0,
  pnl: 200,
  returnPct: 20,
  exitReason: "signal",
};

test("analyzePerformance summarises a single winning round trip", () => {
  const report = analyzePerformance({
    equityCurve: roundTripCurve,
    trades: [roundTrip],
    initialCapital: 1_000,
  });

  assert.equal(report.initialCapital, 1_000);
  assert.equal(report.finalCapital, 1_200);
  close(report.totalReturnPct, 20);
  assert.equal(report.maxDrawdownPct, 0);
  assert.equal(report.tradeCount, 1);
  assert.equal(report.winRatePct, 100);
  assert.equal(report.profitLossRatio, Number.POSITIVE_INFINITY);
  assert.equal(report.exposurePct, 40);
  assert.equal(report.sortino, 0);
  assert.ok(report.sharpe > 0);
  assert.ok(report.annualReturnPct > 0);
});

test("analyzePerformance freezes the report", () => {
  const report = analyzePerformance({ equityCurve: roundTripCurve, trades: [], initialCapital: 1_000 });
  assert.ok(Object.isFrozen(report));
});

test("analyzePerformance reports undefined trade statistics without trades", () => {
  const report = analyzePerformance({ equityCurve: [], trades: [], initialCapital: 500 });
  assert.equal(report.finalCapital, 500);
  assert.equal(report.totalReturnPct, 0);
  assert.equal(report.tradeCount, 0);
  assert.ok(Number.isNaN(report.winRatePct));
  assert.ok(Number.isNaN(report.profitLossRatio));
  assert.equal(report.exposurePct, 0);
});
