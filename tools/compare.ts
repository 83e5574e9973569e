import {
  computeResiduals,
  createSeries,
  detectExtrema,
  formatResidualSummary,
  formatWeeklySummaries,
  joinByTimestamp,
  matchNearest,
  pairMatches,
  summarizeResiduals,
  weeklySummaries,
  type Series,
  type TaggedSample,
  type WeekNumbering,
} from "../src/index.ts";

export interface ReportOptions {
  top?: number;
  digits?: number;
}

export interface Comparison {
  /** Readings that found a prediction */
  matched: number;
  report: string;
}

/** Readings against a prediction on the same timestamps, summarised overall. */
export function compareSeries(
  observed: Series<TaggedSample>,
  predicted: Series<TaggedSample>,
  { top, digits }: ReportOptions = {},
): Comparison {
  const records = computeResiduals(joinByTimestamp(observed, predicted));
  return {
    matched: records.length,
    report: formatResidualSummary(summarizeResiduals(records, { top }), {
      digits,
      unit: observed.unit,
    }),
  };
}

export interface ExtremaComparisonOptions extends ReportOptions {
  /** Only pair a reading with a predicted event of the same kind */
  sameKind?: boolean;
  maxDistanceMinutes?: number;
  numbering?: WeekNumbering;
}

/**
 * Digitized high and low waters against predicted ones, summarised week by
 * week. `predicted` is used as-is when its samples carry a kind; otherwise
 * its extrema are detected first.
 */
export function compareExtrema(
  observed: Series<TaggedSample>,
  predicted: Series<TaggedSample>,
  {
    sameKind = false,
    maxDistanceMinutes,
    numbering,
    top,
    digits,
  }: ExtremaComparisonOptions = {},
): Comparison {
  const references = predicted.samples.some((s) => s.kind)
    ? predicted
    : createSeries(detectExtrema(predicted), predicted.unit);

  const pairs = pairMatches(
    matchNearest(observed, references, { sameKind, maxDistanceMinutes }),
  );

  return {
    matched: pairs.filter((p) => p.predicted !== null).length,
    report: formatWeeklySummaries(weeklySummaries(pairs, { top, numbering }), {
      digits,
    }),
  };
}
