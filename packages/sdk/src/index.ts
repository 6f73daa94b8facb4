// Shared data model for signal-bench: price series, signals, trades, equity
// and the configuration accepted by the engine and analyzer.

export * from "./model.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./strategies/types.js";
export * from "./strategies/params.js";
export { createSignalStrategy, type SignalStrategyDefinition } from "./strategies/base.js";
export { StrategyDescriptorSchema, StrategyRegistry } from "./strategies/registry.js";
export { builtinStrategies, createDefaultRegistry } from "./strategies/index.js";
