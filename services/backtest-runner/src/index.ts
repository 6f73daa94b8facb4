import { config as loadEnv } from "dotenv";
import { join } from "node:path";

import { CsvPriceSource } from "@signal-bench/data";
import { loadCustomStrategies } from "@signal-bench/engine";
import { createLogger } from "@signal-bench/logger";
import { createDefaultRegistry } from "@signal-bench/sdk";

import { createBatchRunner } from "./batchRunner.js";
import { createProgram } from "./cli.js";
import { REPO_ROOT, loadRunnerConfig } from "./config.js";

loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

export { createBatchRunner, formatOutcome, type BatchRunRequest, type BatchRunner } from "./batchRunner.js";
export { createProgram, type CliDeps } from "./cli.js";
export { loadRunnerConfig, RunnerConfigSchema, type RunnerConfig } from "./config.js";
export { parseParameterOverrides, parseSweepOverrides } from "./overrides.js";

const main = async (argv: ReadonlyArray<string>): Promise<void> => {
  const config = loadRunnerConfig();
  const logger = createLogger("services/backtest-runner", { level: config.logLevel });

  const registry = createDefaultRegistry();
  await loadCustomStrategies(config.strategiesDir, registry, logger);

  const write = (text: string): void => {
    process.stdout.write(`${text}\n`);
  };

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; finishing the current run");
    controller.abort();
  });

  const program = createProgram({
    config,
    registry,
    write,
    signal: controller.signal,
    setExitCode: (code) => {
      process.exitCode = code;
    },
    runBatch: createBatchRunner({
      registry,
      logger,
      write,
      priceSource: new CsvPriceSource({
        datasetsDir: config.datasetsDir,
        cacheDir: join(config.datasetsDir, ".cache"),
        logger,
      }),
    }),
  });

  await program.parseAsync([...argv]);
};

const shouldAutostart = process.env.BACKTEST_RUNNER_AUTOSTART !== "false";

if (shouldAutostart) {
  main(process.argv).catch((error: unknown) => {
    createLogger("services/backtest-runner").error("Backtest runner failed", { error });
    process.exitCode = 1;
  });
}
