import { assertSameUnit } from "./series.ts";
import { formatWeek, weekOf } from "./time.ts";
import { groupBy } from "./util.ts";
import type {
  ExtremaKind,
  PairedSample,
  ResidualRecord,
  Sample,
  Series,
  TaggedSample,
  WeekKey,
  WeekNumbering,
} from "./types.ts";

export const DEFAULT_TOP = 5;

/**
 * Inner join of an observed and a predicted series on exact timestamp
 * equality. Timestamps present in only one series are dropped without error.
 */
export function joinByTimestamp(
  observed: Series<TaggedSample>,
  predicted: Series<Sample>,
): PairedSample[] {
  assertSameUnit(predicted, observed);

  const predictions = new Map(
    predicted.samples.map((s) => [s.time.getTime(), s.height]),
  );

  return observed.samples.flatMap((sample) => {
    const prediction = predictions.get(sample.time.getTime());
    if (prediction === undefined) return [];
    return [
      {
        time: sample.time,
        observed: sample.height,
        predicted: prediction,
        ...(sample.kind ? { kind: sample.kind } : {}),
      },
    ];
  });
}

/**
 * Observed minus predicted for every pair where both heights are present.
 * Pairs with a missing value are left out, never treated as zero.
 */
export function computeResiduals(
  pairs: readonly PairedSample[],
): ResidualRecord[] {
  return pairs.flatMap(({ time, observed, predicted, kind, intervalMinutes }) => {
    if (observed === null || predicted === null) return [];
    return [
      {
        time,
        observed,
        predicted,
        residual: observed - predicted,
        ...(kind ? { kind } : {}),
        ...(intervalMinutes !== undefined ? { intervalMinutes } : {}),
      },
    ];
  });
}

/**
 * The `n` records with the largest absolute residual, largest first. Equal
 * magnitudes keep their input order.
 */
export function topResiduals(
  records: readonly ResidualRecord[],
  n = DEFAULT_TOP,
): ResidualRecord[] {
  return [...records]
    .sort((a, b) => Math.abs(b.residual) - Math.abs(a.residual))
    .slice(0, Math.max(0, n));
}

export interface ResidualStatistics {
  status: "ok";
  count: number;
  mean: number;
  median: number;
  max: number;
  min: number;
  stdDev: number;
  rmse: number;
  top: ResidualRecord[];
}

/** Returned instead of statistics when no record survived alignment. */
export interface NoData {
  status: "no-data";
  count: 0;
}

export type ResidualSummary = ResidualStatistics | NoData;

export const NO_DATA: NoData = Object.freeze({ status: "no-data", count: 0 });

export function hasData(summary: ResidualSummary): summary is ResidualStatistics {
  return summary.status === "ok";
}

export interface SummaryOptions {
  /** How many of the largest residuals to list */
  top?: number;
}

/**
 * Count, mean, median, extremes, spread and the largest residuals of a
 * record set. An empty set yields `NO_DATA` rather than NaN statistics.
 */
export function summarizeResiduals(
  records: readonly ResidualRecord[],
  { top = DEFAULT_TOP }: SummaryOptions = {},
): ResidualSummary {
  if (records.length === 0) return NO_DATA;

  const residuals = records.map((r) => r.residual);
  const sorted = [...residuals].sort((a, b) => a - b);
  const avg = mean(residuals);

  return {
    status: "ok",
    count: records.length,
    mean: avg,
    median: median(sorted),
    max: sorted[sorted.length - 1]!,
    min: sorted[0]!,
    stdDev: Math.sqrt(mean(residuals.map((v) => (v - avg) ** 2))),
    rmse: Math.sqrt(mean(residuals.map((v) => v * v))),
    top: topResiduals(records, top),
  };
}

export interface WeeklySummary {
  week: WeekKey;
  /** e.g. "2021-W22" */
  label: string;
  /** Input rows in the week, including rows with a missing value */
  rows: number;
  highs: number;
  lows: number;
  summary: ResidualSummary;
}

export interface WeeklyOptions extends SummaryOptions {
  numbering?: WeekNumbering;
  /**
   * Weeks to report, in order. Defaults to every week present in the input,
   * in order of first appearance. Requested weeks without input report
   * no data.
   */
  weeks?: readonly WeekKey[];
}

/**
 * Split paired rows by week of year and summarise each week separately.
 *
 * High/low counts cover every row in the week that carries a kind, whether
 * or not it produced a residual, while the statistics use only rows with
 * both heights present. A week whose rows are all incomplete reports no data
 * without affecting the other weeks.
 */
export function weeklySummaries(
  pairs: readonly PairedSample[],
  { top = DEFAULT_TOP, numbering = "ordinal", weeks }: WeeklyOptions = {},
): WeeklySummary[] {
  const buckets = groupBy(pairs, (pair) =>
    formatWeek(weekOf(pair.time, numbering)),
  );

  const keys =
    weeks ??
    Object.values(buckets).flatMap(([first]) =>
      first ? [weekOf(first.time, numbering)] : [],
    );

  return keys.map((week) => {
    const label = formatWeek(week);
    const rows = buckets[label] ?? [];
    return {
      week,
      label,
      rows: rows.length,
      highs: countKind(rows, "high"),
      lows: countKind(rows, "low"),
      summary: summarizeResiduals(computeResiduals(rows), { top }),
    };
  });
}

function countKind(rows: readonly PairedSample[], kind: ExtremaKind) {
  return rows.filter((r) => r.kind === kind).length;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function median(sorted: readonly number[]): number {
  const mid = sorted.length >> 1;
  return sorted.length % 2
    ? sorted[mid]!
    : (sorted[mid - 1]! + sorted[mid]!) / 2;
}
