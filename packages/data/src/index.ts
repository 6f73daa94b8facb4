export type { IPriceSource, PriceRequest } from "./IPriceSource.js";
export { CsvPriceSource, createCsvPriceSource, parseCsv, type CsvPriceSourceOptions } from "./CsvPriceSource.js";
export { parsePeriod, type PeriodRange } from "./period.js";
export { dedupeAndSort, filterPricesForRequest, slugify } from "./internalUtils.js";
