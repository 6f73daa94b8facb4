import type { ISODate, PricePoint } from "@signal-bench/sdk";

export interface PriceRequest {
  /** Market code, e.g. "KRW-BTC". */
  readonly symbol: string;
  /** Bar interval, e.g. "day" or "minute60". */
  readonly interval: string;
  /** Inclusive bounds. */
  readonly start?: ISODate;
  readonly end?: ISODate;
}

/**
 * The data-fetch collaborator: returns a chronologically ordered series with
 * unique timestamps, or an empty series when nothing is stored.
 */
export interface IPriceSource {
  readonly id: string;
  loadPrices(request: PriceRequest): Promise<ReadonlyArray<PricePoint>>;
}
