import { z } from "zod";

import { ConfigurationError } from "./errors.js";
import type { PricePoint } from "./model.js";

/** -----------------------------------------------------------------------
 *  EngineConfig
 *  -------------------------------------------------------------------- */

/** Runtime validator for the capital/commission model of a single run. */
export const EngineConfigSchema = z.object({
  initialCapital: z.number().finite().positive(),
  /** Fraction of notional charged on every fill (0.002 = 0.2%). */
  commissionRate: z.number().finite().min(0).max(1),
  /** Close a position still open after the last bar at that bar's close. */
  liquidateAtEnd: z.boolean().default(false),
  /** Bars per year used to annualise Sharpe and Sortino. */
  periodsPerYear: z.number().int().positive().default(365),
  riskFreeRate: z.number().finite().default(0),
});

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/** -----------------------------------------------------------------------
 *  BacktestRequest
 *  -------------------------------------------------------------------- */

export interface StrategySelection {
  /** Registry code, e.g. "sma". */
  readonly code: string;
  /** Overrides for the strategy's declared parameters; strings are coerced. */
  readonly params?: Readonly<Record<string, unknown>>;
}

/**
 * Everything needed for one backtest. The price series is fully materialised
 * before the run starts.
 */
export interface BacktestRequest {
  /** Human readable label used in logs and reports. */
  readonly runName?: string;
  readonly symbol: string;
  readonly strategy: StrategySelection;
  readonly prices: ReadonlyArray<PricePoint>;
  readonly config: EngineConfigInput;
}

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

export const formatZodIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path}: ${issue.message}`;
  });

/**
 * Validates the supplied payload against the provided schema.
 *
 * @throws ConfigurationError when validation fails.
 */
export function assertValid<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  value: unknown,
  label = "payload",
): Output {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label}: ${formatZodIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

export const parseEngineConfig = (value: unknown): EngineConfig =>
  assertValid(EngineConfigSchema, value, "EngineConfig");
