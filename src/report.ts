import type { ResidualSummary, WeeklySummary } from "./residuals.ts";
import type { HeightUnit, ResidualRecord } from "./types.ts";

export interface FormatOptions {
  /** Decimal places for heights */
  digits?: number;
  unit?: HeightUnit;
}

/** "2021-06-01 12:30:00", always UTC */
export function formatTime(time: Date): string {
  return time.toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Fixed-width table of residual records, one line per record. An `Interval`
 * column (minutes since the previous event) is added when any record has one.
 */
export function formatResidualTable(
  records: readonly ResidualRecord[],
  { digits = 3 }: FormatOptions = {},
): string {
  const width = digits + 7;
  const intervals = records.some((r) => r.intervalMinutes !== undefined);

  const header = [
    "Time".padEnd(19),
    "Kind".padEnd(4),
    "Observed".padStart(width),
    "Predicted".padStart(width),
    "Residual".padStart(width),
    ...(intervals ? ["Interval"] : []),
  ].join("  ");

  const lines = records.map((r) =>
    [
      formatTime(r.time),
      (r.kind ?? "").padEnd(4),
      r.observed.toFixed(digits).padStart(width),
      r.predicted.toFixed(digits).padStart(width),
      r.residual.toFixed(digits).padStart(width),
      ...(intervals ? [(r.intervalMinutes?.toFixed(0) ?? "").padStart(8)] : []),
    ]
      .join("  ")
      .trimEnd(),
  );

  return [header, ...lines].join("\n");
}

/**
 * Plain-text residual summary: totals, central values, extremes and the
 * largest residuals.
 */
export function formatResidualSummary(
  summary: ResidualSummary,
  { digits = 3, unit }: FormatOptions = {},
): string {
  const lines: string[] = [];
  const suffix = unit ? ` ${unit}` : "";
  const value = (v: number) => `${v.toFixed(digits)}${suffix}`;

  lines.push("Summary of Residuals:");
  lines.push(`Total observations: ${summary.count}`);

  if (summary.status === "no-data") {
    lines.push("No data");
    return lines.join("\n");
  }

  lines.push(`Mean Residual: ${value(summary.mean)}`);
  lines.push(`Median Residual: ${value(summary.median)}`);
  lines.push(`Max Residual: ${value(summary.max)}`);
  lines.push(`Min Residual: ${value(summary.min)}`);
  lines.push(`Std Dev: ${value(summary.stdDev)}`);
  lines.push(`RMSE: ${value(summary.rmse)}`);
  lines.push("");
  lines.push(`Top ${summary.top.length} Largest Residuals:`);
  lines.push(formatResidualTable(summary.top, { digits }));

  return lines.join("\n");
}

/**
 * One block per week: high/low counts followed by that week's largest
 * residuals, or "No data".
 */
export function formatWeeklySummaries(
  summaries: readonly WeeklySummary[],
  { digits = 3 }: FormatOptions = {},
): string {
  return summaries
    .map(({ label, highs, lows, summary }) => {
      const lines = [
        `Week: ${label}`,
        `Number of highs: ${highs}`,
        `Number of lows: ${lows}`,
        "",
      ];

      if (summary.status === "no-data") {
        lines.push("No data");
      } else {
        lines.push(`${summary.top.length} largest residuals:`);
        lines.push(formatResidualTable(summary.top, { digits }));
      }
      return lines.join("\n");
    })
    .join("\n\n");
}
