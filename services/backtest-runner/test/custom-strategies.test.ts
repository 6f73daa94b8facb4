import { strict as assert } from "node:assert";
import { join } from "node:path";
import test from "node:test";

import { loadCustomStrategies } from "@signal-bench/engine";
import { createDefaultRegistry } from "@signal-bench/sdk";

import { REPO_ROOT } from "../src/config.js";
import { buildPrices, silentLogger } from "./support.js";

test("the bundled custom strategies load next to the built-ins", async () => {
  const registry = createDefaultRegistry();

  const result = await loadCustomStrategies(
    join(REPO_ROOT, "storage", "strategies", "custom"),
    registry,
    silentLogger,
  );

  assert.deepEqual(result.loaded, ["ema_cross"]);
  assert.deepEqual(result.failures, []);
  assert.equal(registry.size, 8);

  const strategy = registry.resolve("ema_cross", { shortSpan: "2", longSpan: "3" });
  const outcome = strategy.apply(buildPrices([10, 10, 10, 8, 12, 14, 9]));
  assert.equal(outcome.kind, "signals");
  if (outcome.kind === "signals") {
    assert.deepEqual(
      outcome.signals.map((point) => point.signal),
      [0, 0, 0, -1, 1, 1, -1],
    );
  }

  assert.throws(
    () => registry.resolve("ema_cross", { shortSpan: "5", longSpan: "5" }),
    // The module runs under jiti with its own copy of the sdk, so match by name.
    (error: unknown) =>
      error instanceof Error &&
      error.name === "InvalidParameterError" &&
      error.message === 'Invalid parameters for strategy "ema_cross": shortSpan must be less than longSpan',
  );
});
