import type { IPriceSource, PriceRequest } from "@signal-bench/data";
import type { Logger } from "@signal-bench/logger";
import type { PricePoint } from "@signal-bench/sdk";

export const silentLogger: Logger = {
  module: "test",
  level: "error",
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const buildPrices = (closes: number[]): PricePoint[] =>
  closes.map((close, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, 1 + idx)).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1,
  }));

/** Serves fixed series per symbol and records every request. */
export const createFakePriceSource = (
  series: Readonly<Record<string, PricePoint[]>>,
): IPriceSource & { requests: PriceRequest[] } => {
  const requests: PriceRequest[] = [];
  return {
    id: "fake",
    requests,
    loadPrices: async (request) => {
      requests.push(request);
      return series[request.symbol] ?? [];
    },
  };
};
