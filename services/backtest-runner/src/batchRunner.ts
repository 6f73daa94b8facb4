import type { IPriceSource } from "@signal-bench/data";
import { parsePeriod } from "@signal-bench/data";
import {
  createSweepJobs,
  runBacktests,
  type BatchOutcome,
  type ParameterGrid,
} from "@signal-bench/engine";
import type { Logger } from "@signal-bench/logger";
import { formatInsufficientData, formatPerformanceReport } from "@signal-bench/report";
import {
  parseEngineConfig,
  type BacktestRequest,
  type EngineConfigInput,
  type StrategyRegistry,
} from "@signal-bench/sdk";

export interface BatchRunRequest {
  readonly strategy: string;
  /** Raw `name=value` overrides; coerced by the registry. */
  readonly params: Readonly<Record<string, string>>;
  /** Empty for a single run per symbol. */
  readonly sweep: ParameterGrid;
  readonly symbols: ReadonlyArray<string>;
  readonly interval: string;
  /** Lookback such as "3m"; the whole stored series when omitted. */
  readonly period?: string;
  readonly config: EngineConfigInput;
}

export interface BatchRunnerDeps {
  readonly registry: StrategyRegistry;
  readonly priceSource: IPriceSource;
  readonly logger: Logger;
  /** Receives one rendered message per run, in job order. */
  readonly write: (text: string) => void | Promise<void>;
  readonly now?: () => Date;
}

export type BatchRunner = (
  request: BatchRunRequest,
  signal?: AbortSignal,
) => Promise<BatchOutcome[]>;

export const formatOutcome = (outcome: BatchOutcome, strategyName: string): string => {
  switch (outcome.status) {
    case "completed": {
      const first = outcome.equityCurve[0];
      const last = outcome.equityCurve[outcome.equityCurve.length - 1];
      return formatPerformanceReport(outcome.report, {
        symbol: outcome.symbol,
        strategyName,
        params: outcome.params,
        period: { start: first.timestamp, end: last.timestamp },
      });
    }
    case "skipped":
      return formatInsufficientData(outcome.warning, { symbol: outcome.symbol });
    case "failed":
      return `## ${outcome.symbol} backtest failed\n\n${outcome.error.message}\n`;
    case "aborted":
      return `## ${outcome.symbol} backtest aborted\n`;
  }
};

/**
 * Loads every symbol, runs the strategy (or sweep) over each and writes one
 * message per run. Configuration and the strategy selection are checked once
 * up front so a typo fails the whole invocation before any data is read.
 */
export const createBatchRunner =
  (deps: BatchRunnerDeps): BatchRunner =>
  async (request, signal) => {
    parseEngineConfig(request.config);
    const strategyName = deps.registry.resolve(request.strategy, request.params).descriptor().name;
    const range = request.period ? parsePeriod(request.period, (deps.now ?? (() => new Date()))()) : {};

    const jobs: BacktestRequest[] = [];
    for (const symbol of request.symbols) {
      const prices = await deps.priceSource.loadPrices({
        symbol,
        interval: request.interval,
        ...range,
      });
      deps.logger.debug("Loaded prices", { symbol, rows: prices.length });

      const template: BacktestRequest = {
        symbol,
        strategy: { code: request.strategy, params: request.params },
        prices,
        config: request.config,
      };
      jobs.push(...(Object.keys(request.sweep).length > 0 ? createSweepJobs(template, request.sweep) : [template]));
    }

    const outcomes = await runBacktests(
      jobs,
      { registry: deps.registry, logger: deps.logger },
      {
        signal,
        onOutcome: (outcome) => deps.write(formatOutcome(outcome, strategyName)),
      },
    );

    const count = (status: BatchOutcome["status"]): number =>
      outcomes.filter((outcome) => outcome.status === status).length;
    deps.logger.info("Batch finished", {
      runs: outcomes.length,
      completed: count("completed"),
      skipped: count("skipped"),
      failed: count("failed"),
      aborted: count("aborted"),
    });
    return outcomes;
  };
