import { ema, sma } from "./movingAverages.js";
import { rollingMax, rollingMin } from "./volatility.js";
import { assertWindow, type IndicatorSeries } from "./types.js";

const toRsi = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Relative strength index with Wilder smoothing. The first value appears at
 * index `window`, seeded with the plain average of the first `window` changes.
 */
export const rsi = (values: ReadonlyArray<number>, window: number): IndicatorSeries => {
  assertWindow("window", window);
  const result: IndicatorSeries = values.map(() => null);
  if (values.length <= window) {
    return result;
  }

  let gainSum = 0;
  let lossSum = 0;
  for (let i = 1; i <= window; i += 1) {
    const change = values[i] - values[i - 1];
    if (change > 0) {
      gainSum += change;
    } else {
      lossSum -= change;
    }
  }

  let avgGain = gainSum / window;
  let avgLoss = lossSum / window;
  result[window] = toRsi(avgGain, avgLoss);

  for (let i = window + 1; i < values.length; i += 1) {
    const change = values[i] - values[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    avgGain = (avgGain * (window - 1) + gain) / window;
    avgLoss = (avgLoss * (window - 1) + loss) / window;
    result[i] = toRsi(avgGain, avgLoss);
  }

  return result;
};

export interface MacdSeries {
  readonly macd: number[];
  readonly signal: number[];
  readonly histogram: number[];
}

export const macd = (
  values: ReadonlyArray<number>,
  fastSpan: number,
  slowSpan: number,
  signalSpan: number,
): MacdSeries => {
  const fast = ema(values, fastSpan);
  const slow = ema(values, slowSpan);
  const line = fast.map((value, index) => value - slow[index]);
  const signal = ema(line, signalSpan);
  const histogram = line.map((value, index) => value - signal[index]);
  return { macd: line, signal, histogram };
};

export interface StochasticSeries {
  readonly k: IndicatorSeries;
  readonly d: IndicatorSeries;
}

/**
 * Slow stochastic oscillator: raw %K over `kPeriod`, smoothed by `slowing`,
 * with %D the `dPeriod` average of the smoothed %K.
 */
export const stochastic = (
  high: ReadonlyArray<number>,
  low: ReadonlyArray<number>,
  close: ReadonlyArray<number>,
  kPeriod: number,
  dPeriod: number,
  slowing: number,
): StochasticSeries => {
  if (high.length !== close.length || low.length !== close.length) {
    throw new RangeError("high, low and close must have the same length");
  }
  const highest = rollingMax(high, kPeriod);
  const lowest = rollingMin(low, kPeriod);
  const rawK: IndicatorSeries = close.map((value, index) => {
    const top = highest[index];
    const bottom = lowest[index];
    if (top === null || bottom === null || top === bottom) {
      return null;
    }
    return (100 * (value - bottom)) / (top - bottom);
  });
  const k = sma(rawK, slowing);
  const d = sma(k, dPeriod);
  return { k, d };
};
