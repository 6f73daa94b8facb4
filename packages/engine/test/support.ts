import type { Logger, LogLevel, LogMeta } from "@signal-bench/logger";
import type { PricePoint, Signal, SignalSeries } from "@signal-bench/sdk";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly meta?: LogMeta;
}

export const createRecordingLogger = (): { logger: Logger; entries: RecordedEntry[] } => {
  const entries: RecordedEntry[] = [];
  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    entries.push({ level, msg, meta });
  };
  const logger: Logger = {
    module: "test",
    level: "debug",
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
  return { logger, entries };
};

export const buildPrices = (closes: number[]): PricePoint[] =>
  closes.map((close, idx) => ({
    timestamp: new Date(Date.UTC(2024, 0, 1 + idx)).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 10,
  }));

export const alignSignals = (prices: PricePoint[], values: Signal[]): SignalSeries =>
  values.map((signal, idx) => ({ timestamp: prices[idx].timestamp, signal }));
