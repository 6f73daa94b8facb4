import { assertWindow, mean, windowAt, type IndicatorSeries, type NumericSeries } from "./types.js";

/**
 * Simple moving average. A window containing an undefined value yields null.
 */
export const sma = (values: NumericSeries, window: number): IndicatorSeries => {
  assertWindow("window", window);
  return values.map((_value, index) => {
    const slice = windowAt(values, index, window);
    return slice ? mean(slice) : null;
  });
};

/**
 * Recursive exponential moving average with α = 2 / (span + 1), seeded with the
 * first value, so every index is defined.
 */
export const ema = (values: ReadonlyArray<number>, span: number): number[] => {
  assertWindow("span", span);
  const alpha = 2 / (span + 1);
  const result: number[] = [];
  let previous: number | null = null;
  for (const value of values) {
    const next: number = previous === null ? value : alpha * value + (1 - alpha) * previous;
    result.push(next);
    previous = next;
  }
  return result;
};
