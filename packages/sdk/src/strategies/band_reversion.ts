import { bollingerBands } from "@signal-bench/indicators";

import type { Signal } from "../model.js";
import { closesOf, createSignalStrategy } from "./base.js";
import type { StrategyDescriptor, StrategyFactory, StrategyParams } from "./types.js";

export const name = "bb" as const;

export const minRows = (params: StrategyParams): number => params.window;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "Bollinger Band Reversion",
  description: "Buys closes at or below the lower band and sells closes at or above the upper band.",
  minRows: 20,
  parameters: [
    {
      name: "window",
      type: "integer",
      default: 20,
      min: 5,
      max: 200,
      description: "Moving average and deviation window.",
    },
    {
      name: "stdDev",
      type: "float",
      default: 2,
      min: 0.5,
      max: 5,
      description: "Band width in standard deviations.",
    },
  ],
};

export const factory: StrategyFactory = (params) =>
  createSignalStrategy({
    descriptor,
    params,
    minRows,
    computeSignals: (prices) => {
      const closes = closesOf(prices);
      const { upper, lower } = bollingerBands(closes, params.window, params.stdDev);

      return closes.map((close, index): Signal => {
        const top = upper[index];
        const bottom = lower[index];
        // A zero-width band (flat window) carries no information.
        if (top === null || bottom === null || top === bottom) {
          return 0;
        }
        if (close <= bottom) {
          return 1;
        }
        if (close >= top) {
          return -1;
        }
        return 0;
      });
    },
  });
