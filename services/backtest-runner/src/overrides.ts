import type { ParameterGrid } from "@signal-bench/engine";
import { ConfigurationError } from "@signal-bench/sdk";

const splitPair = (pair: string, flag: string): [string, string] => {
  const separator = pair.indexOf("=");
  const name = separator > 0 ? pair.slice(0, separator).trim() : "";
  if (name.length === 0) {
    throw new ConfigurationError(`Invalid ${flag} "${pair}": expected name=value`);
  }
  return [name, pair.slice(separator + 1).trim()];
};

/**
 * Turns repeated `--param name=value` flags into raw overrides. Values stay
 * strings; the registry coerces and bounds-checks them. A repeated name keeps
 * its last value.
 */
export const parseParameterOverrides = (
  pairs: ReadonlyArray<string>,
): Record<string, string> => {
  const overrides: Record<string, string> = {};
  for (const pair of pairs) {
    const [name, value] = splitPair(pair, "--param");
    overrides[name] = value;
  }
  return overrides;
};

/** `--sweep shortWindow=5,10,20` becomes `{ shortWindow: ["5", "10", "20"] }`. */
export const parseSweepOverrides = (pairs: ReadonlyArray<string>): ParameterGrid => {
  const grid: Record<string, string[]> = {};
  for (const pair of pairs) {
    const [name, list] = splitPair(pair, "--sweep");
    const values = list
      .split(",")
      .map((value) => value.trim())
      .filter((value) => value.length > 0);
    if (values.length === 0) {
      throw new ConfigurationError(`Invalid --sweep "${pair}": no values`);
    }
    grid[name] = values;
  }
  return grid;
};
