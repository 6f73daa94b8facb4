import { strict as assert } from "node:assert";
import test, { type TestContext } from "node:test";

import { createLogger, isLogLevel } from "../src/index.js";

const capture = (t: TestContext, stream: "stdout" | "stderr"): string[] => {
  const lines: string[] = [];
  const target = process[stream];
  const originalWrite = target.write.bind(target);
  target.write = (chunk: string | Uint8Array): boolean => {
    lines.push(chunk.toString());
    return true;
  };
  t.after(() => {
    target.write = originalWrite;
  });
  return lines;
};

test("createLogger returns a logger with the correct module name", () => {
  const logger = createLogger("engine", { level: "info" });
  assert.equal(logger.module, "engine");
  assert.equal(logger.level, "info");
});

test("logger.log writes one JSON line with runId and metadata", (t) => {
  const logs = capture(t, "stdout");
  const logger = createLogger("engine", { level: "debug" });

  logger.log("info", "run started", { runId: "run-1", strategy: "sma" });

  assert.equal(logs.length, 1);
  assert.ok(logs[0]?.endsWith("\n"));
  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "info");
  assert.equal(parsed.module, "engine");
  assert.equal(parsed.msg, "run started");
  assert.equal(parsed.runId, "run-1");
  assert.equal(parsed.strategy, "sma");
  assert.ok(new Date(parsed.ts).getTime() > 0);
});

test("each level helper tags the entry with its level", (t) => {
  const logs = capture(t, "stdout");
  const logger = createLogger("levels", { level: "debug" });

  logger.debug("d");
  logger.info("i");
  logger.warn("w");

  assert.deepEqual(
    logs.map((line) => JSON.parse(line).level),
    ["debug", "info", "warn"],
  );
});

test("logger.error writes to stderr", (t) => {
  const stdout = capture(t, "stdout");
  const stderr = capture(t, "stderr");
  const logger = createLogger("errors", { level: "debug" });

  logger.error("strategy module failed", { file: "broken.ts" });

  assert.equal(stdout.length, 0);
  assert.equal(stderr.length, 1);
  const parsed = JSON.parse(stderr[0] ?? "{}");
  assert.equal(parsed.level, "error");
  assert.equal(parsed.file, "broken.ts");
});

test("entries below the configured level are dropped", (t) => {
  const logs = capture(t, "stdout");
  const logger = createLogger("quiet", { level: "warn" });

  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown");

  assert.equal(logs.length, 1);
  assert.equal(JSON.parse(logs[0] ?? "{}").msg, "shown");
});

test("LOG_LEVEL is used when no level option is given", (t) => {
  const previous = process.env.LOG_LEVEL;
  process.env.LOG_LEVEL = "ERROR";
  t.after(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  const logger = createLogger("env-level");
  assert.equal(logger.level, "error");
});

test("logger excludes runId when it is not a string", (t) => {
  const logs = capture(t, "stdout");
  const logger = createLogger("runid", { level: "debug" });

  logger.info("message", { runId: 123 as unknown as string });

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(Object.keys(parsed).includes("runId"), false);
});

test("Error values in metadata keep their name and message", (t) => {
  const logs = capture(t, "stdout");
  const logger = createLogger("error-meta", { level: "debug" });

  logger.warn("skipped", { error: new RangeError("window must be positive") });

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.deepEqual(parsed.error, { name: "RangeError", message: "window must be positive" });
});

test("isLogLevel accepts known levels only", () => {
  assert.equal(isLogLevel("warn"), true);
  assert.equal(isLogLevel("verbose"), false);
  assert.equal(isLogLevel(undefined), false);
  assert.equal(isLogLevel("toString"), false);
  assert.equal(isLogLevel("constructor"), false);
});

test("an inherited property name in LOG_LEVEL falls back to debug", (t) => {
  const previous = process.env.LOG_LEVEL;
  process.env.LOG_LEVEL = "constructor";
  t.after(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  assert.equal(createLogger("env-level").level, "debug");
});
