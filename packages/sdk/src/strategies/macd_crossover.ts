import { macd } from "@signal-bench/indicators";

import type { Signal } from "../model.js";
import { closesOf, createSignalStrategy } from "./base.js";
import { assertLessThan } from "./params.js";
import type { StrategyDescriptor, StrategyFactory, StrategyParams } from "./types.js";

export const name = "macd" as const;

export const minRows = (params: StrategyParams): number => params.longWindow + params.signalWindow;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "MACD Signal Cross",
  description: "Buys when the MACD line crosses above its signal line and sells on the opposite cross.",
  minRows: 35,
  parameters: [
    {
      name: "shortWindow",
      type: "integer",
      default: 12,
      min: 2,
      max: 50,
      description: "Fast EMA span.",
    },
    {
      name: "longWindow",
      type: "integer",
      default: 26,
      min: 5,
      max: 200,
      description: "Slow EMA span.",
    },
    {
      name: "signalWindow",
      type: "integer",
      default: 9,
      min: 2,
      max: 50,
      description: "Signal line EMA span.",
    },
  ],
};

export const factory: StrategyFactory = (params) => {
  assertLessThan(name, params, "shortWindow", "longWindow");

  return createSignalStrategy({
    descriptor,
    params,
    minRows,
    computeSignals: (prices) => {
      const { histogram } = macd(
        closesOf(prices),
        params.shortWindow,
        params.longWindow,
        params.signalWindow,
      );

      return histogram.map((current, index): Signal => {
        // Crosses before the slow EMA has seen a full window are ignored.
        if (index < params.longWindow) {
          return 0;
        }
        const previous = histogram[index - 1];
        if (previous <= 0 && current > 0) {
          return 1;
        }
        if (previous >= 0 && current < 0) {
          return -1;
        }
        return 0;
      });
    },
  });
};
