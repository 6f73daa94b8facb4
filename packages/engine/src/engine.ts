import { randomUUID } from "node:crypto";

import { createLogger, type Logger } from "@signal-bench/logger";
import { analyzePerformance } from "@signal-bench/metrics";
import {
  EngineConfigSchema,
  assertValid,
  type BacktestRequest,
  type EngineConfig,
  type EquityPoint,
  type InsufficientDataWarning,
  type OpenPosition,
  type PerformanceReport,
  type PositionEvent,
  type SignalSeries,
  type StrategyParams,
  type StrategyRegistry,
  type Trade,
} from "@signal-bench/sdk";

import { simulate } from "./simulate.js";
import { validatePriceSeries } from "./validation.js";

export interface EngineDeps {
  readonly registry: StrategyRegistry;
  readonly logger?: Logger;
  readonly generateRunId?: (request: BacktestRequest) => string;
}

export interface RunLabel {
  readonly runName: string;
  readonly symbol: string;
  readonly strategyCode: string;
}

export interface RunIdentity extends RunLabel {
  readonly runId: string;
}

export interface SkippedBacktest extends RunIdentity {
  readonly status: "skipped";
  readonly warning: InsufficientDataWarning;
}

export interface CompletedBacktest extends RunIdentity {
  readonly status: "completed";
  readonly params: StrategyParams;
  readonly config: EngineConfig;
  readonly signals: SignalSeries;
  readonly events: ReadonlyArray<PositionEvent>;
  readonly trades: ReadonlyArray<Trade>;
  readonly openPosition: OpenPosition | null;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly report: PerformanceReport;
}

export type BacktestOutcome = SkippedBacktest | CompletedBacktest;

const defaultLogger = createLogger("engine");

const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");

export const makeRunId = (label: string, now: Date = new Date()): string => {
  const timestamp = now
    .toISOString()
    .replace(/[^0-9]+/g, "")
    .slice(0, 14);
  const slug = slugify(label);
  const base = slug.length > 0 ? slug : "run";
  return `${base}-${timestamp}-${randomUUID().slice(0, 8)}`;
};

export const runNameOf = (request: BacktestRequest): string =>
  request.runName ?? `${request.symbol} ${request.strategy.code}`;

/**
 * Runs one backtest synchronously: configuration and strategy parameters are
 * checked before any price is read, then the series is validated, signals are
 * computed once over the whole series and the simulation fills at bar closes.
 *
 * @throws ConfigurationError for invalid capital, commission, strategy code or parameters.
 * @throws DataContractViolation for a malformed price series.
 */
export function runBacktest(request: BacktestRequest, deps: EngineDeps): BacktestOutcome {
  const logger = deps.logger ?? defaultLogger;
  const config = assertValid(EngineConfigSchema, request.config, "EngineConfig");
  const strategy = deps.registry.resolve(request.strategy.code, request.strategy.params);
  validatePriceSeries(request.prices);

  const runName = runNameOf(request);
  const identity: RunIdentity = {
    runId: deps.generateRunId ? deps.generateRunId(request) : makeRunId(runName),
    runName,
    symbol: request.symbol,
    strategyCode: strategy.code,
  };

  logger.info("Backtest started", {
    runId: identity.runId,
    symbol: identity.symbol,
    strategy: identity.strategyCode,
    rows: request.prices.length,
  });

  const outcome = strategy.apply(request.prices);
  if (outcome.kind === "insufficient_data") {
    logger.warn("Backtest skipped", {
      runId: identity.runId,
      required: outcome.required,
      actual: outcome.actual,
    });
    return { ...identity, status: "skipped", warning: outcome };
  }

  const simulation = simulate(request.prices, outcome.signals, config);
  const report = analyzePerformance(
    {
      equityCurve: simulation.equityCurve,
      trades: simulation.trades,
      initialCapital: config.initialCapital,
    },
    { periodsPerYear: config.periodsPerYear, riskFreeRate: config.riskFreeRate },
  );

  logger.info("Backtest completed", {
    runId: identity.runId,
    trades: report.tradeCount,
    finalCapital: report.finalCapital,
    totalReturnPct: report.totalReturnPct,
  });

  return {
    ...identity,
    status: "completed",
    params: strategy.params,
    config,
    signals: outcome.signals,
    events: simulation.events,
    trades: simulation.trades,
    openPosition: simulation.openPosition,
    equityCurve: simulation.equityCurve,
    report,
  };
}
