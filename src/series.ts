import { InconsistentUnitsError, SeriesOrderError } from "./errors.ts";
import type { HeightUnit, Sample, Series } from "./types.ts";

export const METERS_PER_FOOT = 0.3048;

/**
 * Build a frozen series from samples that are already in time order.
 *
 * Throws `SeriesOrderError` for an invalid date, a timestamp that is not
 * strictly after its predecessor, or a height that is neither finite nor null.
 */
export function createSeries<S extends Sample>(
  samples: readonly S[],
  unit: HeightUnit,
): Series<S> {
  let previous = -Infinity;

  samples.forEach((sample, i) => {
    const t = sample.time.getTime();
    if (Number.isNaN(t)) {
      throw new SeriesOrderError(`Sample ${i} has an invalid timestamp`);
    }
    if (t <= previous) {
      throw new SeriesOrderError(
        t === previous
          ? `Duplicate timestamp ${sample.time.toISOString()} at sample ${i}`
          : `Sample ${i} (${sample.time.toISOString()}) is earlier than its predecessor`,
      );
    }
    if (sample.height !== null && !Number.isFinite(sample.height)) {
      throw new SeriesOrderError(
        `Sample ${i} has a non-finite height; use null for missing values`,
      );
    }
    previous = t;
  });

  return Object.freeze({
    unit,
    samples: Object.freeze(samples.map((s) => Object.freeze({ ...s }))),
  });
}

/**
 * Sort samples by time and drop repeated timestamps (the first reading wins)
 * before building a series. For ingestion code that receives rows in no
 * particular order.
 */
export function normalizeSeries<S extends Sample>(
  samples: readonly S[],
  unit: HeightUnit,
): Series<S> {
  const sorted = [...samples].sort(
    (a, b) => a.time.getTime() - b.time.getTime(),
  );
  const unique = sorted.filter(
    (s, i) => i === 0 || s.time.getTime() !== sorted[i - 1]!.time.getTime(),
  );
  return createSeries(unique, unit);
}

export function assertSameUnit(
  a: { unit: HeightUnit },
  b: { unit: HeightUnit },
) {
  if (a.unit !== b.unit) throw new InconsistentUnitsError(a.unit, b.unit);
}

/** Samples whose height is present. */
export function validSamples<S extends Sample>(
  series: Series<S>,
): (S & { height: number })[] {
  return series.samples.filter(
    (s): s is S & { height: number } => s.height !== null,
  );
}

export function convertLength(
  value: number,
  from: HeightUnit,
  to: HeightUnit,
): number {
  if (from === to) return value;
  return from === "ft" ? value * METERS_PER_FOOT : value / METERS_PER_FOOT;
}

/**
 * Express a series in another height unit. Missing heights stay missing.
 */
export function convertSeries<S extends Sample>(
  series: Series<S>,
  unit: HeightUnit,
): Series<S> {
  if (series.unit === unit) return series;

  return createSeries(
    series.samples.map((s) => ({
      ...s,
      height: s.height === null ? null : convertLength(s.height, series.unit, unit),
    })),
    unit,
  );
}

/** Samples with `start <= time < end`. */
export function sliceSeries<S extends Sample>(
  series: Series<S>,
  start: Date,
  end: Date,
): Series<S> {
  const from = start.getTime();
  const to = end.getTime();
  return createSeries(
    series.samples.filter((s) => {
      const t = s.time.getTime();
      return t >= from && t < to;
    }),
    series.unit,
  );
}

/**
 * Index of the last sample at or before `time`, or -1 if every sample is later.
 */
export function bisect(times: ArrayLike<number>, time: number): number {
  let lo = 0;
  let hi = times.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (times[mid]! <= time) lo = mid + 1;
    else hi = mid;
  }
  return lo - 1;
}
