import { Command } from "commander";
import { z } from "zod";

import { formatStrategyList } from "@signal-bench/report";
import { assertValid, type StrategyRegistry } from "@signal-bench/sdk";

import type { BatchRunner } from "./batchRunner.js";
import type { RunnerConfig } from "./config.js";
import { parseParameterOverrides, parseSweepOverrides } from "./overrides.js";

export interface CliDeps {
  readonly config: RunnerConfig;
  readonly registry: StrategyRegistry;
  readonly runBatch: BatchRunner;
  readonly write: (text: string) => void | Promise<void>;
  /** Reports a non-zero exit status without ending the process. */
  readonly setExitCode: (code: number) => void;
  readonly signal?: AbortSignal;
}

const RunOptionsSchema = z.object({
  strategy: z.string().min(1),
  param: z.array(z.string()),
  sweep: z.array(z.string()),
  symbols: z.string().min(1),
  interval: z.string().min(1),
  period: z.string().min(1).optional(),
  capital: z.coerce.number().optional(),
  commission: z.coerce.number().optional(),
  liquidate: z.boolean(),
});

const collect = (value: string, previous: string[]): string[] => [...previous, value];

export const createProgram = (deps: CliDeps): Command => {
  const { config } = deps;
  const program = new Command();

  program
    .name("signal-bench")
    .description("Backtest signal strategies against stored crypto price series");

  program
    .command("run")
    .description("Backtest one strategy over one or more symbols")
    .option("-s, --strategy <code>", "strategy code (see `strategies`)", "sma")
    .option("--param <name=value>", "strategy parameter override, repeatable", collect, [])
    .option("--sweep <name=v1,v2>", "run every combination of these values, repeatable", collect, [])
    .option("--symbols <list>", "comma separated market codes", config.symbols.join(","))
    .option("--interval <interval>", "bar interval of the stored datasets", config.interval)
    .option("-p, --period <period>", "lookback such as 1w, 3m or 1y", "3m")
    .option("--capital <amount>", "initial capital", String(config.initialCapital))
    .option("--commission <rate>", "commission per fill, as a fraction", String(config.commissionRate))
    .option("--liquidate", "close a position still open after the last bar", false)
    .action(async (rawOptions: unknown) => {
      const options = assertValid(RunOptionsSchema, rawOptions, "run options");
      const outcomes = await deps.runBatch(
        {
          strategy: options.strategy,
          params: parseParameterOverrides(options.param),
          sweep: parseSweepOverrides(options.sweep),
          symbols: options.symbols
            .split(",")
            .map((symbol) => symbol.trim())
            .filter((symbol) => symbol.length > 0),
          interval: options.interval,
          period: options.period,
          config: {
            initialCapital: options.capital ?? config.initialCapital,
            commissionRate: options.commission ?? config.commissionRate,
            liquidateAtEnd: options.liquidate,
          },
        },
        deps.signal,
      );
      if (outcomes.some((outcome) => outcome.status === "failed" || outcome.status === "aborted")) {
        deps.setExitCode(1);
      }
    });

  program
    .command("strategies")
    .description("List the available strategies and their parameters")
    .action(async () => {
      await deps.write(formatStrategyList(deps.registry.listAvailable()));
    });

  return program;
};
