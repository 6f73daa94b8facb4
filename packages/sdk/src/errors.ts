/**
 * Error taxonomy shared by the registry, engine and runner.
 *
 * Configuration and data-contract errors abort a single run; the batch runner
 * records them per run. Insufficient history is not an error at all; see
 * {@link InsufficientDataWarning}.
 */

/** Invalid capital, commission, strategy code or parameter value. */
export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnknownStrategyError extends ConfigurationError {
  public readonly code: string;
  public readonly available: ReadonlyArray<string>;

  public constructor(code: string, available: ReadonlyArray<string>) {
    const hint = available.length > 0 ? ` Available: ${available.join(", ")}` : "";
    super(`Unknown strategy "${code}".${hint}`);
    this.name = "UnknownStrategyError";
    this.code = code;
    this.available = available;
  }
}

export class InvalidParameterError extends ConfigurationError {
  public readonly code: string;
  public readonly issues: ReadonlyArray<string>;

  public constructor(code: string, issues: ReadonlyArray<string>) {
    super(`Invalid parameters for strategy "${code}": ${issues.join("; ")}`);
    this.name = "InvalidParameterError";
    this.code = code;
    this.issues = issues;
  }
}

export class DuplicateCodeError extends Error {
  public readonly code: string;

  public constructor(code: string) {
    super(`Strategy code "${code}" is already registered`);
    this.name = "DuplicateCodeError";
    this.code = code;
  }
}

/** Malformed price or signal input: length mismatch, bad ordering, NaN values. */
export class DataContractViolation extends Error {
  public readonly index: number;
  public readonly reason: string;

  public constructor(index: number, reason: string) {
    super(`Data contract violated at index ${index}: ${reason}`);
    this.name = "DataContractViolation";
    this.index = index;
    this.reason = reason;
  }
}

/** A discovered strategy module that could not be imported or registered. */
export class StrategyLoadError extends Error {
  public readonly file: string;

  public constructor(file: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load strategy module ${file}: ${detail}`, { cause });
    this.name = "StrategyLoadError";
    this.file = file;
  }
}

/** Errors that abort one run without affecting its siblings. */
export const isRunScopedError = (
  error: unknown,
): error is ConfigurationError | DataContractViolation =>
  error instanceof ConfigurationError || error instanceof DataContractViolation;

export interface InsufficientDataWarning {
  readonly kind: "insufficient_data";
  readonly code: string;
  readonly required: number;
  readonly actual: number;
  readonly message: string;
  readonly remediation: ReadonlyArray<string>;
}

export const createInsufficientDataWarning = (
  code: string,
  required: number,
  actual: number,
): InsufficientDataWarning => ({
  kind: "insufficient_data",
  code,
  required,
  actual,
  message: `Strategy "${code}" needs at least ${required} rows but received ${actual}`,
  remediation: [
    "lengthen the backtest period",
    "use a shorter bar interval",
    "choose a strategy with a smaller minimum-row requirement",
  ],
});
