import type {
  InsufficientDataWarning,
  ISODate,
  PerformanceReport,
  StrategyDescriptor,
  StrategyParams,
} from "@signal-bench/sdk";

/**
 * Plain-text renderings handed to the notification channel and the CLI. The
 * output is markdown that reads fine unrendered.
 */

export interface ReportContext {
  readonly symbol: string;
  readonly strategyName: string;
  readonly params?: StrategyParams;
  readonly period?: { readonly start: ISODate; readonly end: ISODate };
  /** Quote currency of the capital figures. */
  readonly currency?: string;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Fixed-point number with sentinels spelled out: NaN as "n/a", infinities as "∞". */
export const formatNumber = (value: number, digits = 2): string => {
  if (Number.isNaN(value)) {
    return "n/a";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "∞" : "-∞";
  }
  return value.toFixed(digits);
};

export const formatPercent = (value: number): string => {
  const formatted = formatNumber(value);
  return formatted === "n/a" ? formatted : `${formatted}%`;
};

export const formatMoney = (value: number, currency: string): string =>
  `${value.toLocaleString("en-US", { maximumFractionDigits: 0 })} ${currency}`;

export const formatParams = (params: StrategyParams = {}): string =>
  Object.entries(params)
    .map(([name, value]) => `${name}=${value}`)
    .join(", ");

const formatPeriod = (period: NonNullable<ReportContext["period"]>): string => {
  const days = Math.round((Date.parse(period.end) - Date.parse(period.start)) / MS_PER_DAY);
  return `${period.start.slice(0, 10)} ~ ${period.end.slice(0, 10)} (${days} days)`;
};

const strategyLine = (context: ReportContext): string => {
  const params = formatParams(context.params);
  return params.length > 0 ? `${context.strategyName} (${params})` : context.strategyName;
};

export const formatPerformanceReport = (
  report: PerformanceReport,
  context: ReportContext,
): string => {
  const currency = context.currency ?? "KRW";
  const lines = [
    `## ${context.symbol} backtest`,
    "",
    `- **Strategy:** ${strategyLine(context)}`,
    ...(context.period ? [`- **Period:** ${formatPeriod(context.period)}`] : []),
    `- **Initial capital:** ${formatMoney(report.initialCapital, currency)}`,
    `- **Final capital:** ${formatMoney(report.finalCapital, currency)}`,
    `- **Total return:** ${formatPercent(report.totalReturnPct)}`,
    `- **Annual return:** ${formatPercent(report.annualReturnPct)}`,
    `- **Max drawdown:** ${formatPercent(report.maxDrawdownPct)}`,
    `- **Trades:** ${report.tradeCount}`,
    `- **Win rate:** ${formatPercent(report.winRatePct)}`,
    `- **Profit/loss ratio:** ${formatNumber(report.profitLossRatio)}`,
    `- **Exposure:** ${formatPercent(report.exposurePct)}`,
  ];
  return `${lines.join("\n")}\n`;
};

export const formatInsufficientData = (
  warning: InsufficientDataWarning,
  context: Pick<ReportContext, "symbol">,
): string => {
  const lines = [
    `## ${context.symbol} backtest skipped`,
    "",
    warning.message,
    "",
    "Try one of:",
    ...warning.remediation.map((step) => `- ${step}`),
  ];
  return `${lines.join("\n")}\n`;
};

/** Help text generated from the registry listing. */
export const formatStrategyList = (descriptors: ReadonlyArray<StrategyDescriptor>): string => {
  const blocks = descriptors.map((descriptor) => {
    const lines = [
      `${descriptor.code} - ${descriptor.name}`,
      `  ${descriptor.description}`,
      `  minimum rows: ${descriptor.minRows}`,
    ];
    for (const spec of descriptor.parameters) {
      lines.push(
        `  --param ${spec.name}=<${spec.type}>  default ${spec.default}, range [${spec.min}, ${spec.max}]  ${spec.description}`,
      );
    }
    return lines.join("\n");
  });
  return `${blocks.join("\n\n")}\n`;
};
