import { sma } from "./movingAverages.js";
import { assertWindow, mean, windowAt, type IndicatorSeries, type NumericSeries } from "./types.js";

/** Sample standard deviation (n - 1) over a trailing window. */
export const rollingStdDev = (values: NumericSeries, window: number): IndicatorSeries => {
  assertWindow("window", window, 2);
  return values.map((_value, index) => {
    const slice = windowAt(values, index, window);
    if (!slice) {
      return null;
    }
    const average = mean(slice);
    const squared = slice.reduce((acc, value) => {
      const diff = value - average;
      return acc + diff * diff;
    }, 0);
    return Math.sqrt(squared / (slice.length - 1));
  });
};

export const rollingMax = (values: NumericSeries, window: number): IndicatorSeries => {
  assertWindow("window", window);
  return values.map((_value, index) => {
    const slice = windowAt(values, index, window);
    return slice ? Math.max(...slice) : null;
  });
};

export const rollingMin = (values: NumericSeries, window: number): IndicatorSeries => {
  assertWindow("window", window);
  return values.map((_value, index) => {
    const slice = windowAt(values, index, window);
    return slice ? Math.min(...slice) : null;
  });
};

export interface BollingerBands {
  readonly middle: IndicatorSeries;
  readonly upper: IndicatorSeries;
  readonly lower: IndicatorSeries;
}

export const bollingerBands = (
  values: ReadonlyArray<number>,
  window: number,
  stdDevMultiplier: number,
): BollingerBands => {
  const middle = sma(values, window);
  const deviation = rollingStdDev(values, window);
  const upper: IndicatorSeries = [];
  const lower: IndicatorSeries = [];
  middle.forEach((average, index) => {
    const std = deviation[index];
    if (average === null || std === null || std === undefined) {
      upper.push(null);
      lower.push(null);
      return;
    }
    upper.push(average + stdDevMultiplier * std);
    lower.push(average - stdDevMultiplier * std);
  });
  return { middle, upper, lower };
};
