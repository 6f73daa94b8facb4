import { createInsufficientDataWarning } from "../errors.js";
import type { PricePoint, Signal } from "../model.js";
import type { Strategy, StrategyDescriptor, StrategyOutcome, StrategyParams } from "./types.js";

export interface SignalStrategyDefinition {
  readonly descriptor: StrategyDescriptor;
  readonly params: StrategyParams;
  readonly minRows: (params: StrategyParams) => number;
  /** Returns exactly one signal per price row. */
  readonly computeSignals: (prices: ReadonlyArray<PricePoint>) => Signal[];
}

/**
 * Wraps a pure signal rule in the {@link Strategy} contract: the minimum-row
 * check, timestamp alignment and an output-length guard.
 */
export const createSignalStrategy = (definition: SignalStrategyDefinition): Strategy => {
  const { descriptor, params } = definition;

  const minRows = (override?: StrategyParams): number => definition.minRows(override ?? params);

  return {
    code: descriptor.code,
    params,
    descriptor: () => descriptor,
    minRows,
    apply(prices: ReadonlyArray<PricePoint>): StrategyOutcome {
      const required = minRows();
      if (prices.length < required) {
        return createInsufficientDataWarning(descriptor.code, required, prices.length);
      }
      const values = definition.computeSignals(prices);
      if (values.length !== prices.length) {
        throw new Error(
          `Strategy "${descriptor.code}" produced ${values.length} signals for ${prices.length} rows`,
        );
      }
      return {
        kind: "signals",
        signals: values.map((signal, index) => ({ timestamp: prices[index].timestamp, signal })),
      };
    },
  };
};

export const closesOf = (prices: ReadonlyArray<PricePoint>): number[] =>
  prices.map((price) => price.close);

/** Sign of `a - b` as a signal; neutral while either side is undefined. */
export const compareToSignal = (a: number | null, b: number | null): Signal => {
  if (a === null || b === null || a === b) {
    return 0;
  }
  return a > b ? 1 : -1;
};
