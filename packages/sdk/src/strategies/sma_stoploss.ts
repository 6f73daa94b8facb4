import { sma } from "@signal-bench/indicators";

import type { Signal } from "../model.js";
import { closesOf, compareToSignal, createSignalStrategy } from "./base.js";
import { assertLessThan } from "./params.js";
import type { StrategyDescriptor, StrategyFactory, StrategyParams } from "./types.js";

export const name = "sma_stoploss" as const;

export const minRows = (params: StrategyParams): number => params.longWindow + 1;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "SMA Crossover with Take-Profit / Stop-Loss",
  description:
    "Enters on an upward SMA cross; exits on the downward cross or when the close moves past the take-profit or stop-loss distance from entry.",
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
    {
      name: "takeProfit",
      type: "float",
      default: 0.1,
      min: 0.01,
      max: 1,
      description: "Exit once the close is this fraction above the entry close.",
    },
    {
      name: "stopLoss",
      type: "float",
      default: 0.03,
      min: 0.005,
      max: 0.5,
      description: "Exit once the close is this fraction below the entry close.",
    },
  ],
};

/**
 * Tracks its own entry price to place the protective exits, so unlike the
 * plain crossover it only signals on the bar where something changes. After a
 * protective exit it waits for the next upward cross.
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
      const trend = closes.map((_close, index) => compareToSignal(shortAvg[index], longAvg[index]));

      const signals: Signal[] = [];
      let entryPrice: number | null = null;

      closes.forEach((close, index) => {
        const previousTrend = index > 0 ? trend[index - 1] : trend[index];
        const crossedUp = trend[index] === 1 && previousTrend !== 1;
        const crossedDown = trend[index] === -1 && previousTrend !== -1;

        if (entryPrice === null) {
          if (crossedUp) {
            entryPrice = close;
            signals.push(1);
          } else {
            signals.push(0);
          }
          return;
        }

        const change = close / entryPrice - 1;
        if (change >= params.takeProfit || change <= -params.stopLoss || crossedDown) {
          entryPrice = null;
          signals.push(-1);
          return;
        }
        signals.push(0);
      });

      return signals;
    },
  });
};
