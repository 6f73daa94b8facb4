import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { createLogger, type Logger } from "@signal-bench/logger";
import type { PricePoint } from "@signal-bench/sdk";

import type { IPriceSource, PriceRequest } from "./IPriceSource.js";
import { dedupeAndSort, filterPricesForRequest, parseTimestamp, slugify } from "./internalUtils.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

const PricePointSchema = z.object({
  timestamp: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number(),
});

const CachePayloadSchema = z.object({
  mtimeMs: z.number(),
  prices: z.array(PricePointSchema),
});

type CachePayload = z.infer<typeof CachePayloadSchema>;

export interface CsvPriceSourceOptions {
  readonly datasetsDir?: string;
  /** Parsed series are cached here as JSON, keyed on the CSV's mtime. Omit to disable. */
  readonly cacheDir?: string;
  readonly logger?: Logger;
}

/**
 * Reads `<datasetsDir>/<symbol>_<interval>.csv` with the header
 * `timestamp,open,high,low,close,volume`. Malformed rows are dropped.
 */
export class CsvPriceSource implements IPriceSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;
  private readonly cacheDir: string | null;
  private readonly logger: Logger;

  public constructor(options: CsvPriceSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
    this.cacheDir = options.cacheDir ?? null;
    this.logger = options.logger ?? createLogger("data/csv");
  }

  public async loadPrices(request: PriceRequest): Promise<ReadonlyArray<PricePoint>> {
    const datasetPath = join(this.datasetsDir, this.fileName(request, "csv"));

    let mtimeMs: number;
    try {
      mtimeMs = (await stat(datasetPath)).mtimeMs;
    } catch {
      this.logger.warn("Dataset not found", { symbol: request.symbol, path: datasetPath });
      return [];
    }

    const cached = await this.readCache(request, mtimeMs);
    if (cached) {
      return filterPricesForRequest(cached, request);
    }

    const content = await readFile(datasetPath, { encoding: "utf-8" });
    const parsed = parseCsv(content);
    await this.writeCache(request, { mtimeMs, prices: parsed });

    this.logger.debug("Dataset parsed", { symbol: request.symbol, rows: parsed.length });
    return filterPricesForRequest(parsed, request);
  }

  private fileName(request: PriceRequest, extension: string): string {
    return `${slugify(request.symbol)}_${slugify(request.interval)}.${extension}`;
  }

  private async readCache(request: PriceRequest, mtimeMs: number): Promise<PricePoint[] | null> {
    if (this.cacheDir === null) {
      return null;
    }
    const cachePath = join(this.cacheDir, this.fileName(request, "json"));
    let raw: string;
    try {
      raw = await readFile(cachePath, { encoding: "utf-8" });
    } catch {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Ignoring unreadable cache file", { path: cachePath, error });
      return null;
    }
    const payload = CachePayloadSchema.safeParse(json);
    if (!payload.success || payload.data.mtimeMs !== mtimeMs) {
      return null;
    }
    return payload.data.prices;
  }

  private async writeCache(request: PriceRequest, payload: CachePayload): Promise<void> {
    if (this.cacheDir === null) {
      return;
    }
    await mkdir(this.cacheDir, { recursive: true });
    const cachePath = join(this.cacheDir, this.fileName(request, "json"));
    await writeFile(cachePath, JSON.stringify(payload), { encoding: "utf-8" });
  }
}

export const parseCsv = (content: string): PricePoint[] => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Header row.
  const [, ...rows] = lines;
  const prices: PricePoint[] = [];
  for (const row of rows) {
    const price = toPricePoint(row);
    if (price) {
      prices.push(price);
    }
  }
  return dedupeAndSort(prices);
};

const toPricePoint = (row: string): PricePoint | null => {
  const [timestamp, ...fields] = row.split(",").map((part) => part.trim());
  if (!timestamp || parseTimestamp(timestamp) === null || fields.length < 5) {
    return null;
  }

  const [open, high, low, close, volume] = fields.map(Number);
  if ([open, high, low, close, volume].some((value) => !Number.isFinite(value))) {
    return null;
  }

  return { timestamp, open, high, low, close, volume };
};

export const createCsvPriceSource = (options?: CsvPriceSourceOptions): CsvPriceSource => {
  return new CsvPriceSource(options);
};
