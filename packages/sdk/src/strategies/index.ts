import * as bandReversion from "./band_reversion.js";
import * as buyAndHold from "./buy_and_hold.js";
import * as macdCrossover from "./macd_crossover.js";
import { StrategyRegistry } from "./registry.js";
import * as rsiReversal from "./rsi_reversal.js";
import * as smaCrossover from "./sma_crossover.js";
import * as smaStopLoss from "./sma_stoploss.js";
import * as stochasticCross from "./stochastic_cross.js";
import type { StrategyModule } from "./types.js";

export const builtinStrategies: ReadonlyArray<StrategyModule> = [
  smaCrossover,
  bandReversion,
  macdCrossover,
  rsiReversal,
  buyAndHold,
  stochasticCross,
  smaStopLoss,
];

/** Fresh registry holding every built-in strategy, in listing order. */
export const createDefaultRegistry = (): StrategyRegistry => {
  const registry = new StrategyRegistry();
  for (const strategy of builtinStrategies) {
    registry.register(strategy.descriptor, strategy.factory);
  }
  return registry;
};
