import { ema } from "@signal-bench/indicators";
import {
  assertLessThan,
  createSignalStrategy,
  type Signal,
  type StrategyDescriptor,
  type StrategyFactory,
  type StrategyParams,
} from "@signal-bench/sdk";

// Files in this directory are picked up by the runner at startup. Each module
// exports a `descriptor` and a `factory`; the code must not clash with a
// built-in strategy.

const minRows = (params: StrategyParams): number => params.longSpan + 1;

export const descriptor: StrategyDescriptor = {
  code: "ema_cross",
  name: "EMA Crossover",
  description: "Long while the fast EMA is above the slow EMA, once the slow EMA has warmed up.",
  minRows: 27,
  parameters: [
    {
      name: "shortSpan",
      type: "integer",
      default: 12,
      min: 2,
      max: 100,
      description: "Fast EMA span.",
    },
    {
      name: "longSpan",
      type: "integer",
      default: 26,
      min: 3,
      max: 400,
      description: "Slow EMA span.",
    },
  ],
};

export const factory: StrategyFactory = (params) => {
  assertLessThan(descriptor.code, params, "shortSpan", "longSpan");

  return createSignalStrategy({
    descriptor,
    params,
    minRows,
    computeSignals: (prices) => {
      const closes = prices.map((price) => price.close);
      const fast = ema(closes, params.shortSpan);
      const slow = ema(closes, params.longSpan);
      return closes.map((_close, index): Signal => {
        if (index < params.longSpan || fast[index] === slow[index]) {
          return 0;
        }
        return fast[index] > slow[index] ? 1 : -1;
      });
    },
  });
};
