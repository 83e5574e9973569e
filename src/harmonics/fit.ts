import { periodHours } from "../catalogue.ts";
import { EmptySeriesError, InsufficientDataError } from "../errors.ts";
import { validSamples } from "../series.ts";
import { hoursSince } from "../time.ts";
import type {
  Constituent,
  FitOptions,
  FittedConstituent,
  HarmonicModel,
  Series,
} from "../types.ts";
import { solveLeastSquares } from "./least-squares.ts";
import { NO_CORRECTION, nodeFactors } from "./nodal.ts";

const DEG = Math.PI / 180;

/** Reference instant model time is measured from unless a fit says otherwise. */
export const DEFAULT_EPOCH = new Date(Date.UTC(2000, 0, 1));

/** One lunar day, the default width of the running mean sea level. */
export const MSL_WINDOW_HOURS = 24.8412;

/**
 * Fit mean level plus one cosine per catalogue constituent to an observed
 * series by linear least squares.
 *
 * Each constituent contributes the columns `f·cos(ωt + u)` and
 * `f·sin(ωt + u)`, with `t` in hours since the epoch and `f = 1, u = 0`
 * unless nodal corrections are enabled. A coefficient pair `(a, b)` becomes
 * amplitude `√(a² + b²)` and phase `atan2(b, a)`, so that `predict` evaluates
 * `A·f·cos(ωt + u − φ)`.
 *
 * Missing heights are skipped. Throws `InsufficientDataError` when there are
 * fewer samples than unknowns (`2K + 1`), when the record is shorter than one
 * period of the slowest constituent, or when the constituents can't be told
 * apart over the record.
 */
export function fitHarmonics(
  series: Series,
  catalogue: readonly Constituent[],
  {
    epoch = DEFAULT_EPOCH,
    subtractMeanSeaLevel = false,
    mslWindowHours = MSL_WINDOW_HOURS,
    nodal = false,
  }: FitOptions = {},
): HarmonicModel {
  const samples = validSamples(series);
  if (samples.length === 0) {
    throw new EmptySeriesError("Cannot fit a series without observed heights");
  }
  if (catalogue.length === 0) {
    throw new InsufficientDataError("At least one constituent is required");
  }

  const unknowns = 2 * catalogue.length + 1;
  if (samples.length < unknowns) {
    throw new InsufficientDataError(
      `${samples.length} observations cannot determine ${unknowns} unknowns ` +
        `(${catalogue.length} constituents plus mean level)`,
    );
  }

  const start = samples[0]!.time;
  const end = samples[samples.length - 1]!.time;
  const spanHours = hoursSince(start, end);
  const slowest = catalogue.reduce((a, b) => (b.speed < a.speed ? b : a));
  const minimumSpan = periodHours(slowest);
  if (spanHours < minimumSpan) {
    throw new InsufficientDataError(
      `Observations span ${spanHours.toFixed(1)} h, but ${slowest.name} needs ` +
        `at least ${minimumSpan.toFixed(1)} h to be resolved`,
    );
  }

  const times = samples.map((s) => hoursSince(epoch, s.time));
  const msl = subtractMeanSeaLevel
    ? runningMean(samples, mslWindowHours)
    : null;
  const heights = samples.map((s, i) => s.height - (msl?.[i] ?? 0));

  const corrections = (time: Date) =>
    catalogue.map((c) => (nodal ? nodeFactors(c, time) : NO_CORRECTION));

  const rows = samples.map((sample, i) => {
    const row = [1];
    corrections(sample.time).forEach(({ f, u }, k) => {
      const angle = (catalogue[k]!.speed * times[i]! + u) * DEG;
      row.push(f * Math.cos(angle), f * Math.sin(angle));
    });
    return row;
  });

  const solution = solveLeastSquares(rows, heights);
  if (!solution) {
    throw new InsufficientDataError(
      "The observations cannot separate the requested constituents; " +
        "use a longer record or fewer constituents",
    );
  }

  const constituents: FittedConstituent[] = catalogue.map(
    ({ name, speed, nodal: families }, k) => {
      const a = solution[1 + 2 * k]!;
      const b = solution[2 + 2 * k]!;
      return Object.freeze({
        name,
        speed,
        amplitude: Math.hypot(a, b),
        phase: modulus(Math.atan2(b, a) / DEG, 360),
        ...(families ? { nodal: families } : {}),
      });
    },
  );

  const fitted = rows.map((row) =>
    row.reduce((sum, value, j) => sum + value * solution[j]!, 0),
  );
  const rmse = Math.sqrt(
    heights.reduce((sum, h, i) => sum + (h - fitted[i]!) ** 2, 0) /
      heights.length,
  );

  return Object.freeze({
    unit: series.unit,
    epoch,
    meanLevel: solution[0]! + (msl ? mean(msl) : 0),
    constituents: Object.freeze(constituents),
    window: Object.freeze({ start, end }),
    options: Object.freeze({ subtractMeanSeaLevel, nodal }),
    diagnostics: Object.freeze({ samples: samples.length, rmse }),
  });
}

/**
 * Centered running mean of the heights within ±window/2 hours of each sample.
 */
function runningMean(
  samples: readonly { time: Date; height: number }[],
  windowHours: number,
): number[] {
  const half = windowHours / 2;
  const result: number[] = [];
  let lo = 0;
  let hi = 0;
  let sum = 0;

  for (const { time } of samples) {
    while (hi < samples.length && hoursSince(time, samples[hi]!.time) <= half) {
      sum += samples[hi]!.height;
      hi++;
    }
    while (hoursSince(samples[lo]!.time, time) > half) {
      sum -= samples[lo]!.height;
      lo++;
    }
    result.push(sum / (hi - lo));
  }

  return result;
}

function mean(values: number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function modulus(a: number, b: number): number {
  return ((a % b) + b) % b;
}
