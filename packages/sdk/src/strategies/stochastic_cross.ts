import { stochastic } from "@signal-bench/indicators";

import type { Signal } from "../model.js";
import { createSignalStrategy } from "./base.js";
import { assertLessThan } from "./params.js";
import type { StrategyDescriptor, StrategyFactory, StrategyParams } from "./types.js";

export const name = "stochastic" as const;

export const minRows = (params: StrategyParams): number =>
  params.kPeriod + params.dPeriod + params.slowing + 5;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "Stochastic Oscillator",
  description:
    "Trades %K/%D crosses inside the neutral zone and buys rebounds that start below the oversold line.",
  minRows: 25,
  parameters: [
    { name: "kPeriod", type: "integer", default: 14, min: 5, max: 30, description: "%K lookback." },
    { name: "dPeriod", type: "integer", default: 3, min: 1, max: 10, description: "%D smoothing." },
    { name: "slowing", type: "integer", default: 3, min: 1, max: 10, description: "%K slowing." },
    {
      name: "overbought",
      type: "integer",
      default: 80,
      min: 50,
      max: 95,
      description: "Overbought level.",
    },
    {
      name: "oversold",
      type: "integer",
      default: 20,
      min: 5,
      max: 50,
      description: "Oversold level.",
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
      const { k, d } = stochastic(
        prices.map((price) => price.high),
        prices.map((price) => price.low),
        prices.map((price) => price.close),
        params.kPeriod,
        params.dPeriod,
        params.slowing,
      );
      const { overbought, oversold } = params;

      return k.map((kNow, index): Signal => {
        if (index === 0) {
          return 0;
        }
        const dNow = d[index];
        const kPrev = k[index - 1];
        const dPrev = d[index - 1];
        if (kNow === null || kPrev === null) {
          return 0;
        }

        const inNeutralZone = kNow > oversold && kNow < overbought;
        if (dNow !== null && dPrev !== null && inNeutralZone) {
          if (kNow > dNow && kPrev <= dPrev) {
            return 1;
          }
          if (kNow < dNow && kPrev >= dPrev) {
            return -1;
          }
        }

        const oversoldRebound = kNow > kPrev && kNow < oversold && kPrev < oversold;
        return oversoldRebound ? 1 : 0;
      });
    },
  });
};
