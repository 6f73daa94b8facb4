import { isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import type { LogLevel } from "@signal-bench/logger";
import { assertValid } from "@signal-bench/sdk";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
export const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");

const commaSeparated = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
  )
  .pipe(z.array(z.string()).min(1, "must name at least one symbol"));

export const RunnerConfigSchema = z.object({
  BACKTEST_INITIAL_CAPITAL: z.coerce.number().finite().positive().default(1_000_000),
  BACKTEST_COMMISSION_RATE: z.coerce.number().finite().min(0).max(1).default(0.002),
  BACKTEST_DATASETS_DIR: z.string().min(1).default("storage/datasets"),
  BACKTEST_SYMBOLS: commaSeparated.default("KRW-BTC,KRW-ETH,KRW-XRP"),
  BACKTEST_INTERVAL: z.string().min(1).default("minute60"),
  BACKTEST_STRATEGIES_DIR: z.string().min(1).default("storage/strategies/custom"),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? value.toLowerCase() : value),
    z.enum(["debug", "info", "warn", "error"]).optional(),
  ),
});

export interface RunnerConfig {
  readonly initialCapital: number;
  readonly commissionRate: number;
  /** Absolute. */
  readonly datasetsDir: string;
  readonly symbols: ReadonlyArray<string>;
  readonly interval: string;
  /** Absolute. */
  readonly strategiesDir: string;
  readonly logLevel?: LogLevel;
}

const resolveFrom = (root: string, path: string): string =>
  isAbsolute(path) ? path : resolve(root, path);

/**
 * Reads runner settings from the environment. Relative directories resolve
 * against `root`.
 *
 * @throws ConfigurationError naming every invalid variable.
 */
export const loadRunnerConfig = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  root: string = REPO_ROOT,
): RunnerConfig => {
  const parsed = assertValid(RunnerConfigSchema, env, "runner environment");
  return {
    initialCapital: parsed.BACKTEST_INITIAL_CAPITAL,
    commissionRate: parsed.BACKTEST_COMMISSION_RATE,
    datasetsDir: resolveFrom(root, parsed.BACKTEST_DATASETS_DIR),
    symbols: parsed.BACKTEST_SYMBOLS,
    interval: parsed.BACKTEST_INTERVAL,
    strategiesDir: resolveFrom(root, parsed.BACKTEST_STRATEGIES_DIR),
    ...(parsed.LOG_LEVEL ? { logLevel: parsed.LOG_LEVEL } : {}),
  };
};
