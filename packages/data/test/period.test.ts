import { strict as assert } from "node:assert";
import test from "node:test";

import { ConfigurationError } from "@signal-bench/sdk";

import { parsePeriod } from "../src/index.js";

const now = new Date("2024-07-01T00:00:00.000Z");

test("parsePeriod converts each unit to a day count", () => {
  assert.deepEqual(parsePeriod("10d", now), {
    start: "2024-06-21T00:00:00.000Z",
    end: "2024-07-01T00:00:00.000Z",
  });
  assert.equal(parsePeriod("2w", now).start, "2024-06-17T00:00:00.000Z");
  assert.equal(parsePeriod("3m", now).start, "2024-04-02T00:00:00.000Z");
  assert.equal(parsePeriod("1y", now).start, "2023-07-02T00:00:00.000Z");
});

test("parsePeriod accepts upper case and surrounding spaces", () => {
  assert.equal(parsePeriod(" 1M ", now).start, "2024-06-01T00:00:00.000Z");
});

test("parsePeriod rejects malformed periods", () => {
  for (const period of ["", "3", "m", "0d", "3h", "-1d", "1.5m"]) {
    assert.throws(() => parsePeriod(period, now), ConfigurationError, period);
  }
});

test("parsePeriod rejects a lookback beyond the representable date range", () => {
  assert.throws(
    () => parsePeriod("999999999y", now),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /^Invalid period "999999999y": /);
      return true;
    },
  );
});
