import { z } from "zod";

import { assertValid } from "../config.js";
import { DuplicateCodeError, UnknownStrategyError } from "../errors.js";
import { resolveParameters } from "./params.js";
import type { Strategy, StrategyDescriptor, StrategyFactory } from "./types.js";

/** ---- descriptor validation ---- */

const ParameterSpecSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(["integer", "float"]),
    default: z.number().finite(),
    min: z.number().finite(),
    max: z.number().finite(),
    description: z.string(),
  })
  .superRefine((spec, ctx) => {
    if (spec.min > spec.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${spec.name}: min exceeds max` });
    }
    if (spec.default < spec.min || spec.default > spec.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${spec.name}: default ${spec.default} is outside [${spec.min}, ${spec.max}]`,
      });
    }
    if (spec.type === "integer" && !Number.isInteger(spec.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${spec.name}: integer parameter needs an integer default`,
      });
    }
  });

export const StrategyDescriptorSchema = z
  .object({
    code: z.string().min(1),
    name: z.string().min(1),
    description: z.string(),
    minRows: z.number().int().min(1),
    parameters: z.array(ParameterSpecSchema),
  })
  .superRefine((descriptor, ctx) => {
    const seen = new Set<string>();
    for (const spec of descriptor.parameters) {
      if (seen.has(spec.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate parameter name "${spec.name}"`,
        });
      }
      seen.add(spec.name);
    }
  });

/** ---- registry ---- */

interface RegistryEntry {
  readonly descriptor: StrategyDescriptor;
  readonly factory: StrategyFactory;
}

/**
 * Code-keyed lookup of strategy factories. Listing order is registration order.
 */
export class StrategyRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  public get size(): number {
    return this.entries.size;
  }

  public register(descriptor: StrategyDescriptor, factory: StrategyFactory): void {
    assertValid(StrategyDescriptorSchema, descriptor, `strategy descriptor "${descriptor.code}"`);
    if (this.entries.has(descriptor.code)) {
      throw new DuplicateCodeError(descriptor.code);
    }
    this.entries.set(descriptor.code, { descriptor, factory });
  }

  public has(code: string): boolean {
    return this.entries.has(code);
  }

  /**
   * @throws UnknownStrategyError when no strategy is registered under `code`.
   * @throws InvalidParameterError when a value is unknown, mistyped or out of bounds.
   */
  public resolve(code: string, params: Readonly<Record<string, unknown>> = {}): Strategy {
    const entry = this.entries.get(code);
    if (!entry) {
      throw new UnknownStrategyError(code, [...this.entries.keys()]);
    }
    return entry.factory(resolveParameters(entry.descriptor, params));
  }

  public listAvailable(): StrategyDescriptor[] {
    return [...this.entries.values()].map((entry) => entry.descriptor);
  }
}
