import { ConfigurationError, type ISODate } from "@signal-bench/sdk";

const DAYS_PER_UNIT = {
  d: 1,
  w: 7,
  m: 30,
  y: 365,
} as const;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface PeriodRange {
  readonly start: ISODate;
  readonly end: ISODate;
}

const isUnit = (value: string): value is keyof typeof DAYS_PER_UNIT => value in DAYS_PER_UNIT;

/**
 * Converts a lookback such as "30d", "2w", "3m" or "1y" into an inclusive
 * range ending at `now`. Months count as 30 days and years as 365.
 *
 * @throws ConfigurationError for anything else.
 */
export const parsePeriod = (period: string, now: Date = new Date()): PeriodRange => {
  const match = /^(\d+)([a-z])$/u.exec(period.trim().toLowerCase());
  const count = match ? Number(match[1]) : 0;
  const unit = match ? match[2] : "";
  if (!isUnit(unit) || count <= 0) {
    throw new ConfigurationError(
      `Invalid period "${period}": expected <count><d|w|m|y>, e.g. "3m"`,
    );
  }

  const days = count * DAYS_PER_UNIT[unit];
  const start = new Date(now.getTime() - days * MS_PER_DAY);
  if (Number.isNaN(start.getTime())) {
    throw new ConfigurationError(`Invalid period "${period}": reaches past the earliest representable date`);
  }
  return {
    start: start.toISOString(),
    end: now.toISOString(),
  };
};
