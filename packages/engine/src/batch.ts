import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import { createLogger } from "@signal-bench/logger";
import {
  isRunScopedError,
  type BacktestRequest,
  type ConfigurationError,
  type DataContractViolation,
} from "@signal-bench/sdk";

import { runBacktest, runNameOf, type BacktestOutcome, type EngineDeps, type RunLabel } from "./engine.js";

export interface FailedBacktest extends RunLabel {
  readonly status: "failed";
  readonly error: ConfigurationError | DataContractViolation;
}

export interface AbortedBacktest extends RunLabel {
  readonly status: "aborted";
}

export type BatchOutcome = BacktestOutcome | FailedBacktest | AbortedBacktest;

export interface BatchOptions {
  /** Checked between runs; a run in progress always finishes. */
  readonly signal?: AbortSignal;
  /** Called with each outcome as soon as it is known, in job order. */
  readonly onOutcome?: (outcome: BatchOutcome) => void | Promise<void>;
}

const defaultLogger = createLogger("engine/batch");

const labelOf = (job: BacktestRequest): RunLabel => ({
  runName: runNameOf(job),
  symbol: job.symbol,
  strategyCode: job.strategy.code,
});

/**
 * Runs independent backtests one after another, yielding to the event loop
 * between runs. Configuration and data-contract failures are recorded on the
 * failing run; any other error propagates. Once `signal` aborts, the remaining
 * jobs are returned as `aborted`.
 */
export async function runBacktests(
  jobs: ReadonlyArray<BacktestRequest>,
  deps: EngineDeps,
  options: BatchOptions = {},
): Promise<BatchOutcome[]> {
  const logger = deps.logger ?? defaultLogger;
  const outcomes: BatchOutcome[] = [];

  const record = async (outcome: BatchOutcome): Promise<void> => {
    outcomes.push(outcome);
    if (options.onOutcome) {
      await options.onOutcome(outcome);
    }
  };

  for (const job of jobs) {
    if (options.signal?.aborted) {
      await record({ ...labelOf(job), status: "aborted" });
      continue;
    }

    try {
      await record(runBacktest(job, deps));
    } catch (error) {
      if (!isRunScopedError(error)) {
        throw error;
      }
      logger.error("Backtest failed", { ...labelOf(job), error });
      await record({ ...labelOf(job), status: "failed", error });
    }

    await yieldToEventLoop();
  }

  const aborted = outcomes.filter((outcome) => outcome.status === "aborted").length;
  if (aborted > 0) {
    logger.warn("Batch aborted", { completed: outcomes.length - aborted, aborted });
  }
  return outcomes;
}

export type ParameterGrid = Readonly<Record<string, ReadonlyArray<unknown>>>;

/**
 * Cartesian product of `grid` over `base`. Keys vary in insertion order, the
 * last key fastest; an empty grid yields `[base]` and an empty value list
 * yields no combinations.
 */
export const expandParameterGrid = (
  base: Readonly<Record<string, unknown>>,
  grid: ParameterGrid,
): Array<Record<string, unknown>> =>
  Object.entries(grid).reduce<Array<Record<string, unknown>>>(
    (combinations, [name, values]) =>
      combinations.flatMap((combination) =>
        values.map((value) => ({ ...combination, [name]: value })),
      ),
    [{ ...base }],
  );

/** One job per grid combination, each labelled with its parameter values. */
export const createSweepJobs = (
  template: BacktestRequest,
  grid: ParameterGrid,
): BacktestRequest[] =>
  expandParameterGrid(template.strategy.params ?? {}, grid).map((params) => {
    const varied = Object.keys(grid)
      .map((name) => `${name}=${String(params[name])}`)
      .join(",");
    return {
      ...template,
      runName: `${runNameOf(template)} ${varied}`.trim(),
      strategy: { code: template.strategy.code, params },
    };
  });
