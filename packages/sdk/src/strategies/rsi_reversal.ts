import { rsi } from "@signal-bench/indicators";

import type { Signal } from "../model.js";
import { closesOf, createSignalStrategy } from "./base.js";
import { assertLessThan } from "./params.js";
import type { StrategyDescriptor, StrategyFactory, StrategyParams } from "./types.js";

export const name = "rsi" as const;

export const minRows = (params: StrategyParams): number => params.window + 10;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "RSI Reversal",
  description:
    "Buys when RSI climbs back out of the oversold zone and sells when it falls back out of the overbought zone.",
  minRows: 24,
  parameters: [
    {
      name: "window",
      type: "integer",
      default: 14,
      min: 2,
      max: 50,
      description: "RSI lookback.",
    },
    {
      name: "overbought",
      type: "float",
      default: 65,
      min: 50,
      max: 90,
      description: "Overbought threshold.",
    },
    {
      name: "oversold",
      type: "float",
      default: 35,
      min: 10,
      max: 50,
      description: "Oversold threshold.",
    },
  ],
};

export const factory: StrategyFactory = (params) => {
  assertLessThan(name, params, "oversold", "overbought");

  return createSignalStrategy({
    descriptor,
    params,
    minRows,
    computeSignals: (prices) => {
      const values = rsi(closesOf(prices), params.window);

      return values.map((current, index): Signal => {
        const previous = index > 0 ? values[index - 1] : null;
        if (current === null || previous === null) {
          return 0;
        }
        if (previous < params.oversold && current >= params.oversold) {
          return 1;
        }
        if (previous > params.overbought && current <= params.overbought) {
          return -1;
        }
        return 0;
      });
    },
  });
};
