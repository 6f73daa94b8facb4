import type { PricePoint } from "@signal-bench/sdk";

import type { PriceRequest } from "./IPriceSource.js";

export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

export const parseTimestamp = (value: string): number | null => {
  const epoch = Date.parse(value);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return epoch;
};

/**
 * Keeps the points inside the request's inclusive range. Points whose
 * timestamp cannot be parsed are dropped.
 */
export const filterPricesForRequest = (
  prices: ReadonlyArray<PricePoint>,
  request: Pick<PriceRequest, "start" | "end">,
): PricePoint[] => {
  const startEpoch = request.start ? parseTimestamp(request.start) : null;
  const endEpoch = request.end ? parseTimestamp(request.end) : null;

  return prices.filter((price) => {
    const epoch = parseTimestamp(price.timestamp);
    if (epoch === null) {
      return false;
    }
    const afterStart = startEpoch === null ? true : epoch >= startEpoch;
    const beforeEnd = endEpoch === null ? true : epoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};

/** Sorts by time and keeps the last row seen for each timestamp. */
export const dedupeAndSort = (prices: ReadonlyArray<PricePoint>): PricePoint[] => {
  const byTimestamp = new Map<string, PricePoint>();
  for (const price of prices) {
    byTimestamp.set(price.timestamp, price);
  }
  return [...byTimestamp.values()].sort((a, b) => {
    const epochA = parseTimestamp(a.timestamp) ?? 0;
    const epochB = parseTimestamp(b.timestamp) ?? 0;
    return epochA - epochB;
  });
};
