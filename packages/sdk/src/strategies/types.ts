import type { InsufficientDataWarning } from "../errors.js";
import type { PricePoint, SignalSeries } from "../model.js";

export type ParameterType = "integer" | "float";

/** Declared tunable of a strategy. Values outside [min, max] are rejected. */
export interface ParameterSpec {
  readonly name: string;
  readonly type: ParameterType;
  readonly default: number;
  readonly min: number;
  readonly max: number;
  readonly description: string;
}

export interface StrategyDescriptor {
  /** Stable identifier used for lookup and CLI selection. */
  readonly code: string;
  readonly name: string;
  readonly description: string;
  /** Minimum rows required under the default parameters. */
  readonly minRows: number;
  readonly parameters: ReadonlyArray<ParameterSpec>;
}

/** Parameter values after defaults and bounds have been applied. */
export type StrategyParams = Readonly<Record<string, number>>;

export interface SignalsOutcome {
  readonly kind: "signals";
  readonly signals: SignalSeries;
}

export type StrategyOutcome = SignalsOutcome | InsufficientDataWarning;

export interface Strategy {
  readonly code: string;
  readonly params: StrategyParams;
  descriptor(): StrategyDescriptor;
  /** Minimum rows for `params`, defaulting to the instance's own parameters. */
  minRows(params?: StrategyParams): number;
  /**
   * Computes one signal per bar. Output at index i depends only on rows 0..i,
   * and the same input always yields the same output.
   */
  apply(prices: ReadonlyArray<PricePoint>): StrategyOutcome;
}

export type StrategyFactory = (params: StrategyParams) => Strategy;

/** What every strategy module exports. */
export interface StrategyModule {
  readonly descriptor: StrategyDescriptor;
  readonly factory: StrategyFactory;
}
