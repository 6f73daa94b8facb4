import { readdir } from "node:fs/promises";
import { join } from "node:path";

import { createJiti } from "jiti";
import { z } from "zod";

import { createLogger, type Logger } from "@signal-bench/logger";
import {
  DuplicateCodeError,
  StrategyDescriptorSchema,
  StrategyLoadError,
  formatZodIssues,
  type StrategyFactory,
  type StrategyRegistry,
} from "@signal-bench/sdk";

const defaultLogger = createLogger("engine/customStrategyLoader");

// Strategy files are TypeScript; jiti transpiles them on import.
const jiti = createJiti(import.meta.url, { interopDefault: true });

const CustomStrategyModuleSchema = z.object({
  descriptor: StrategyDescriptorSchema,
  factory: z.custom<StrategyFactory>((value) => typeof value === "function", {
    message: "must be a function",
  }),
});

export interface CustomStrategyLoadResult {
  /** Codes registered, in file name order. */
  readonly loaded: string[];
  readonly failures: StrategyLoadError[];
}

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const isStrategyFile = (file: string): boolean => file.endsWith(".ts") && !file.endsWith(".test.ts");

/**
 * Imports every strategy module in `directory` and registers it. A module
 * must export `descriptor` and `factory`. Modules that fail to import or
 * validate are returned as failures and logged; a duplicate code propagates.
 */
export async function loadCustomStrategies(
  directory: string,
  registry: StrategyRegistry,
  logger: Logger = defaultLogger,
): Promise<CustomStrategyLoadResult> {
  let files: string[];
  try {
    files = await readdir(directory);
  } catch (error) {
    if (isMissingDirectory(error)) {
      logger.debug("No custom strategy directory", { directory });
      return { loaded: [], failures: [] };
    }
    throw error;
  }

  const loaded: string[] = [];
  const failures: StrategyLoadError[] = [];

  for (const file of files.filter(isStrategyFile).sort()) {
    const filePath = join(directory, file);
    try {
      const exported = await jiti.import(filePath);
      const parsed = CustomStrategyModuleSchema.safeParse(exported);
      if (!parsed.success) {
        throw new Error(`invalid exports: ${formatZodIssues(parsed.error).join("; ")}`);
      }
      registry.register(parsed.data.descriptor, parsed.data.factory);
      loaded.push(parsed.data.descriptor.code);
      logger.info("Loaded custom strategy", { code: parsed.data.descriptor.code, file });
    } catch (error) {
      if (error instanceof DuplicateCodeError) {
        throw error;
      }
      const failure = new StrategyLoadError(filePath, error);
      logger.error("Failed to load custom strategy", { file, error: failure.message });
      failures.push(failure);
    }
  }

  return { loaded, failures };
}
