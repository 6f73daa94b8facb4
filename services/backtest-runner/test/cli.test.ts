import { strict as assert } from "node:assert";
import test from "node:test";

import type { BatchOutcome } from "@signal-bench/engine";
import { formatStrategyList } from "@signal-bench/report";
import { ConfigurationError, createDefaultRegistry } from "@signal-bench/sdk";

import type { BatchRunRequest, BatchRunner } from "../src/batchRunner.js";
import { createProgram } from "../src/cli.js";
import type { RunnerConfig } from "../src/config.js";

const config: RunnerConfig = {
  initialCapital: 1_000_000,
  commissionRate: 0.002,
  datasetsDir: "/data/datasets",
  symbols: ["KRW-BTC", "KRW-ETH"],
  interval: "minute60",
  strategiesDir: "/data/strategies",
};

type Result = "none" | "failed" | "aborted";

const outcomeFor = (request: BatchRunRequest, symbol: string, result: Exclude<Result, "none">): BatchOutcome => {
  const label = { runName: `${symbol} ${request.strategy}`, symbol, strategyCode: request.strategy };
  return result === "failed"
    ? { ...label, status: "failed", error: new ConfigurationError("bad") }
    : { ...label, status: "aborted" };
};

const setup = (result: Result = "none") => {
  const requests: BatchRunRequest[] = [];
  const written: string[] = [];
  const exitCodes: number[] = [];
  const runBatch: BatchRunner = async (request) => {
    requests.push(request);
    return result === "none" ? [] : request.symbols.map((symbol) => outcomeFor(request, symbol, result));
  };
  const program = createProgram({
    config,
    registry: createDefaultRegistry(),
    runBatch,
    write: (text) => {
      written.push(text);
    },
    setExitCode: (code) => {
      exitCodes.push(code);
    },
  }).exitOverride();
  return { program, requests, written, exitCodes };
};

test("run falls back to the configured defaults", async () => {
  const { program, requests, exitCodes } = setup();

  await program.parseAsync(["run"], { from: "user" });

  assert.deepEqual(exitCodes, []);
  assert.deepEqual(requests, [
    {
      strategy: "sma",
      params: {},
      sweep: {},
      symbols: ["KRW-BTC", "KRW-ETH"],
      interval: "minute60",
      period: "3m",
      config: { initialCapital: 1_000_000, commissionRate: 0.002, liquidateAtEnd: false },
    },
  ]);
});

test("run passes overrides, sweeps and flags through", async () => {
  const { program, requests } = setup();

  await program.parseAsync(
    [
      "run",
      "--strategy",
      "bb",
      "--param",
      "window=10",
      "--param",
      "stdDev=1.5",
      "--sweep",
      "window=10,20",
      "--symbols",
      "KRW-SOL, KRW-ADA",
      "--interval",
      "day",
      "-p",
      "1y",
      "--capital",
      "5000",
      "--commission",
      "0",
      "--liquidate",
    ],
    { from: "user" },
  );

  assert.deepEqual(requests, [
    {
      strategy: "bb",
      params: { window: "10", stdDev: "1.5" },
      sweep: { window: ["10", "20"] },
      symbols: ["KRW-SOL", "KRW-ADA"],
      interval: "day",
      period: "1y",
      config: { initialCapital: 5000, commissionRate: 0, liquidateAtEnd: true },
    },
  ]);
});

test("run rejects a non-numeric capital", async () => {
  const { program, requests } = setup();

  await assert.rejects(
    program.parseAsync(["run", "--capital", "lots"], { from: "user" }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /^Invalid run options: capital: /);
      return true;
    },
  );
  assert.equal(requests.length, 0);
});

test("run sets a failing exit code when a run fails or is aborted", async () => {
  const failing = setup("failed");
  await failing.program.parseAsync(["run"], { from: "user" });
  assert.deepEqual(failing.exitCodes, [1]);

  const aborted = setup("aborted");
  await aborted.program.parseAsync(["run"], { from: "user" });
  assert.deepEqual(aborted.exitCodes, [1]);
});

test("strategies prints the registry listing", async () => {
  const { program, written } = setup();

  await program.parseAsync(["strategies"], { from: "user" });

  assert.deepEqual(written, [formatStrategyList(createDefaultRegistry().listAvailable())]);
});
