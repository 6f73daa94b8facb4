/**
 * Indicator output aligned index-for-index with its input. `null` marks bars
 * where the indicator is not yet defined (warm-up) or undefined (flat range).
 */
export type IndicatorSeries = Array<number | null>;

export type NumericSeries = ReadonlyArray<number | null>;

export const assertWindow = (label: string, window: number, minimum = 1): void => {
  if (!Number.isInteger(window) || window < minimum) {
    throw new RangeError(`${label} must be an integer >= ${minimum}, received ${window}`);
  }
};

/**
 * Returns the `window` values ending at `end` (inclusive), or null when the
 * window starts before the series or contains an undefined value.
 */
export const windowAt = (values: NumericSeries, end: number, window: number): number[] | null => {
  const start = end - window + 1;
  if (start < 0) {
    return null;
  }
  const slice: number[] = [];
  for (let i = start; i <= end; i += 1) {
    const value = values[i];
    if (value === null || value === undefined) {
      return null;
    }
    slice.push(value);
  }
  return slice;
};

export const mean = (values: ReadonlyArray<number>): number => {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
};
