import type { Signal } from "../model.js";
import { createSignalStrategy } from "./base.js";
import type { StrategyDescriptor, StrategyFactory } from "./types.js";

export const name = "buyhold" as const;

export const minRows = (): number => 2;

export const descriptor: StrategyDescriptor = {
  code: name,
  name: "Buy & Hold",
  description: "Benchmark: enters on the first tradable bar and holds to the end.",
  minRows: 2,
  parameters: [],
};

export const factory: StrategyFactory = (params) =>
  createSignalStrategy({
    descriptor,
    params,
    minRows,
    computeSignals: (prices) => prices.map((): Signal => 1),
  });
