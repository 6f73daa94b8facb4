import { z } from "zod";

import { InvalidParameterError } from "../errors.js";
import type { ParameterSpec, StrategyDescriptor, StrategyParams } from "./types.js";

// CLI overrides arrive as strings; anything else must already be a number.
const coerceNumeric = (value: unknown): unknown => {
  if (typeof value === "string" && value.trim().length > 0) {
    return Number(value);
  }
  return value;
};

export const buildParameterSchema = (spec: ParameterSpec) => {
  let base = z.number({ invalid_type_error: "must be a number" }).finite();
  if (spec.type === "integer") {
    base = base.int();
  }
  base = base.min(spec.min).max(spec.max);
  return z.preprocess(coerceNumeric, base).default(spec.default);
};

/**
 * Applies defaults and checks every supplied value against its spec. Unknown
 * parameter names are rejected so a typo never silently falls back to a default.
 *
 * @throws InvalidParameterError listing every offending parameter.
 */
export const resolveParameters = (
  descriptor: StrategyDescriptor,
  raw: Readonly<Record<string, unknown>> = {},
): StrategyParams => {
  const issues: string[] = [];
  const resolved: Record<string, number> = {};
  const known = new Set(descriptor.parameters.map((spec) => spec.name));

  for (const name of Object.keys(raw)) {
    if (!known.has(name)) {
      issues.push(`${name}: unknown parameter`);
    }
  }

  for (const spec of descriptor.parameters) {
    const parsed = buildParameterSchema(spec).safeParse(raw[spec.name]);
    if (parsed.success) {
      resolved[spec.name] = parsed.data;
    } else {
      for (const issue of parsed.error.issues) {
        issues.push(`${spec.name}: ${issue.message}`);
      }
    }
  }

  if (issues.length > 0) {
    throw new InvalidParameterError(descriptor.code, issues);
  }
  return Object.freeze(resolved);
};

export const defaultParameters = (descriptor: StrategyDescriptor): StrategyParams =>
  resolveParameters(descriptor, {});

/**
 * Cross-parameter constraint helper used by factories, e.g. short < long.
 */
export const assertLessThan = (
  code: string,
  params: StrategyParams,
  lower: string,
  upper: string,
): void => {
  if (!(params[lower] < params[upper])) {
    throw new InvalidParameterError(code, [`${lower} must be less than ${upper}`]);
  }
};
