import { sma } from "@signal-bench/indicators";

import { closesOf, compareToSignal, createSignalStrategy } from "./base.js";
import { assertLessThan } from "./params.js";
import type { StrategyDescriptor, StrategyFactory, StrategyParams } from "./types.js";

export const name = "sma" as const;

export const minRows = (params: StrategyParams): number => params.longWindow + 1;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "SMA Crossover",
  description: "Long while the short moving average is above the long one; exits on the opposite cross.",
  minRows: 31,
  parameters: [
    {
      name: "shortWindow",
      type: "integer",
      default: 10,
      min: 2,
      max: 100,
      description: "Short-term SMA window size.",
    },
    {
      name: "longWindow",
      type: "integer",
      default: 30,
      min: 3,
      max: 400,
      description: "Long-term SMA window size.",
    },
  ],
};

/**
 * Emits sign(shortSMA - longSMA) on every bar. The engine's position state
 * machine turns the sign changes into entries and exits.
 */
export const factory: StrategyFactory = (params) => {
  assertLessThan(name, params, "shortWindow", "longWindow");

  return createSignalStrategy({
    descriptor,
    params,
    minRows,
    computeSignals: (prices) => {
      const closes = closesOf(prices);
      const shortAvg = sma(closes, params.shortWindow);
      const longAvg = sma(closes, params.longWindow);
      return closes.map((_close, index) => compareToSignal(shortAvg[index], longAvg[index]));
    },
  });
};
