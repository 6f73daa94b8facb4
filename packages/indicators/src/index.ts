export { ema, sma } from "./movingAverages.js";
export {
  bollingerBands,
  rollingMax,
  rollingMin,
  rollingStdDev,
  type BollingerBands,
} from "./volatility.js";
export {
  macd,
  rsi,
  stochastic,
  type MacdSeries,
  type StochasticSeries,
} from "./oscillators.js";
export type { IndicatorSeries, NumericSeries } from "./types.js";
