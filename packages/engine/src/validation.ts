import { DataContractViolation, type PricePoint, type SignalSeries } from "@signal-bench/sdk";

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

/**
 * Checks the data-fetch contract: non-empty, finite positive OHLC, finite
 * non-negative volume, parseable and strictly increasing timestamps.
 *
 * @throws DataContractViolation naming the first offending row.
 */
export const validatePriceSeries = (prices: ReadonlyArray<PricePoint>): void => {
  if (prices.length === 0) {
    throw new DataContractViolation(0, "price series is empty");
  }

  let previousTime = Number.NEGATIVE_INFINITY;
  prices.forEach((price, index) => {
    for (const field of ["open", "high", "low", "close"] as const) {
      if (!isPositiveFinite(price[field])) {
        throw new DataContractViolation(index, `${field} must be a positive finite number`);
      }
    }
    if (!Number.isFinite(price.volume) || price.volume < 0) {
      throw new DataContractViolation(index, "volume must be a non-negative finite number");
    }

    const time = Date.parse(price.timestamp);
    if (!Number.isFinite(time)) {
      throw new DataContractViolation(index, `unparseable timestamp "${price.timestamp}"`);
    }
    if (time <= previousTime) {
      throw new DataContractViolation(index, "timestamps must be strictly increasing");
    }
    previousTime = time;
  });
};

/** @throws DataContractViolation when the series differ in length or timestamps. */
export const validateSignalAlignment = (
  prices: ReadonlyArray<PricePoint>,
  signals: SignalSeries,
): void => {
  if (prices.length !== signals.length) {
    throw new DataContractViolation(
      Math.min(prices.length, signals.length),
      `received ${signals.length} signals for ${prices.length} prices`,
    );
  }
  signals.forEach((point, index) => {
    if (point.timestamp !== prices[index].timestamp) {
      throw new DataContractViolation(
        index,
        `signal timestamp ${point.timestamp} does not match price timestamp ${prices[index].timestamp}`,
      );
    }
  });
};
