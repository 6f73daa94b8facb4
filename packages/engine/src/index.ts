export {
  makeRunId,
  runBacktest,
  runNameOf,
  type BacktestOutcome,
  type CompletedBacktest,
  type EngineDeps,
  type RunIdentity,
  type RunLabel,
  type SkippedBacktest,
} from "./engine.js";
export {
  createSweepJobs,
  expandParameterGrid,
  runBacktests,
  type AbortedBacktest,
  type BatchOptions,
  type BatchOutcome,
  type FailedBacktest,
  type ParameterGrid,
} from "./batch.js";
export { simulate, type SimulationConfig, type SimulationResult } from "./simulate.js";
export { derivePositionEvents } from "./positions.js";
export { validatePriceSeries, validateSignalAlignment } from "./validation.js";
export { loadCustomStrategies, type CustomStrategyLoadResult } from "./customStrategyLoader.js";
