import type { PositionEvent, PricePoint, SignalSeries } from "@signal-bench/sdk";

import { validateSignalAlignment } from "./validation.js";

type PositionState = "flat" | "long";

/**
 * Walks the FLAT/LONG state machine over aligned signals. BUY while flat
 * enters, SELL while long exits, everything else holds. The first bar only
 * establishes the baseline and never trades.
 */
export const derivePositionEvents = (
  prices: ReadonlyArray<PricePoint>,
  signals: SignalSeries,
): PositionEvent[] => {
  validateSignalAlignment(prices, signals);

  const events: PositionEvent[] = [];
  let state: PositionState = "flat";

  for (let index = 1; index < prices.length; index += 1) {
    const { signal } = signals[index];
    const price = prices[index];

    if (state === "flat" && signal === 1) {
      events.push({ index, timestamp: price.timestamp, kind: "enter", price: price.close });
      state = "long";
    } else if (state === "long" && signal === -1) {
      events.push({ index, timestamp: price.timestamp, kind: "exit", price: price.close });
      state = "flat";
    }
  }

  return events;
};
