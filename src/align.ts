import {
  EmptySeriesError,
  InsufficientDataError,
  InterpolationRangeError,
} from "./errors.ts";
import { assertSameUnit, bisect, createSeries, validSamples } from "./series.ts";
import { hoursSince, MS_PER_MINUTE } from "./time.ts";
import type { PairedSample, Sample, Series, TaggedSample } from "./types.ts";

/**
 * Cubic spline with not-a-knot end conditions: the third derivative is
 * continuous across the second and the second-to-last knots. Two knots give
 * a straight line and three a parabola.
 */
export class CubicSpline {
  readonly x: Float64Array;
  readonly y: Float64Array;
  /** First derivative at each knot */
  readonly slopes: Float64Array;

  constructor(x: readonly number[], y: readonly number[]) {
    if (x.length !== y.length) {
      throw new RangeError("Spline needs as many x values as y values");
    }
    if (x.length < 2) {
      throw new RangeError("Spline needs at least two knots");
    }
    for (let i = 1; i < x.length; i++) {
      if (!(x[i]! > x[i - 1]!)) {
        throw new RangeError(`Spline knots must increase strictly (index ${i})`);
      }
    }

    this.x = Float64Array.from(x);
    this.y = Float64Array.from(y);
    this.slopes = knotSlopes(this.x, this.y);
  }

  get domain(): [number, number] {
    return [this.x[0]!, this.x[this.x.length - 1]!];
  }

  contains(value: number): boolean {
    const [lo, hi] = this.domain;
    return value >= lo && value <= hi;
  }

  /** Spline value at `value`; knots return their y exactly. */
  at(value: number): number {
    if (!this.contains(value)) {
      throw new RangeError(`${value} is outside the spline domain`);
    }

    const { x, y, slopes } = this;
    const i = Math.min(bisect(x, value), x.length - 2);
    if (x[i] === value) return y[i]!;
    if (x[i + 1] === value) return y[i + 1]!;

    const h = x[i + 1]! - x[i]!;
    const slope = (y[i + 1]! - y[i]!) / h;
    const s0 = slopes[i]!;
    const s1 = slopes[i + 1]!;
    const c2 = (3 * slope - 2 * s0 - s1) / h;
    const c3 = (s0 + s1 - 2 * slope) / (h * h);
    const t = value - x[i]!;

    return y[i]! + t * (s0 + t * (c2 + t * c3));
  }
}

function knotSlopes(x: Float64Array, y: Float64Array): Float64Array {
  const n = x.length;
  const dx = new Float64Array(n - 1);
  const slope = new Float64Array(n - 1);
  for (let i = 0; i < n - 1; i++) {
    dx[i] = x[i + 1]! - x[i]!;
    slope[i] = (y[i + 1]! - y[i]!) / dx[i]!;
  }

  if (n === 2) return Float64Array.of(slope[0]!, slope[0]!);

  if (n === 3) {
    // Derivative of the parabola through all three knots
    const c = (slope[1]! - slope[0]!) / (x[2]! - x[0]!);
    return x.map((xi) => slope[0]! + c * (2 * xi - x[0]! - x[1]!));
  }

  const sub = new Float64Array(n);
  const diag = new Float64Array(n);
  const sup = new Float64Array(n);
  const rhs = new Float64Array(n);

  for (let i = 1; i < n - 1; i++) {
    sub[i] = dx[i]!;
    diag[i] = 2 * (dx[i - 1]! + dx[i]!);
    sup[i] = dx[i - 1]!;
    rhs[i] = 3 * (dx[i]! * slope[i - 1]! + dx[i - 1]! * slope[i]!);
  }

  const d0 = x[2]! - x[0]!;
  diag[0] = dx[1]!;
  sup[0] = d0;
  rhs[0] =
    ((dx[0]! + 2 * d0) * dx[1]! * slope[0]! + dx[0]! ** 2 * slope[1]!) / d0;

  const dn = x[n - 1]! - x[n - 3]!;
  diag[n - 1] = dx[n - 3]!;
  sub[n - 1] = dn;
  rhs[n - 1] =
    (dx[n - 2]! ** 2 * slope[n - 3]! +
      (2 * dn + dx[n - 2]!) * dx[n - 3]! * slope[n - 2]!) /
    dn;

  return solveTridiagonal(sub, diag, sup, rhs);
}

/** Thomas algorithm. `sub[0]` and `sup[n - 1]` are ignored. */
function solveTridiagonal(
  sub: Float64Array,
  diag: Float64Array,
  sup: Float64Array,
  rhs: Float64Array,
): Float64Array {
  const n = diag.length;
  const c = new Float64Array(n);
  const d = new Float64Array(n);

  c[0] = sup[0]! / diag[0]!;
  d[0] = rhs[0]! / diag[0]!;
  for (let i = 1; i < n; i++) {
    const m = diag[i]! - sub[i]! * c[i - 1]!;
    c[i] = sup[i]! / m;
    d[i] = (rhs[i]! - sub[i]! * d[i - 1]!) / m;
  }

  const result = new Float64Array(n);
  result[n - 1] = d[n - 1]!;
  for (let i = n - 2; i >= 0; i--) {
    result[i] = d[i]! - c[i]! * result[i + 1]!;
  }
  return result;
}

/**
 * Values of a dense reference series (usually a prediction) at the
 * timestamps of another series, by not-a-knot cubic spline through the
 * reference's non-missing samples.
 *
 * Never extrapolates: a target timestamp outside the reference's first and
 * last sample throws `InterpolationRangeError`.
 */
export function interpolateOnto(
  target: Series<Sample>,
  reference: Series<Sample>,
): Series {
  assertSameUnit(reference, target);

  const knots = validSamples(reference);
  if (knots.length === 0) {
    throw new EmptySeriesError(
      "The reference series has no heights to interpolate",
    );
  }
  if (knots.length < 2) {
    throw new InsufficientDataError(
      "Interpolation needs at least two reference samples",
    );
  }

  const origin = knots[0]!.time;
  const domain = { start: origin, end: knots[knots.length - 1]!.time };
  const spline = new CubicSpline(
    knots.map((k) => hoursSince(origin, k.time)),
    knots.map((k) => k.height),
  );

  const samples = target.samples.map(({ time }) => {
    const x = hoursSince(origin, time);
    if (!spline.contains(x)) throw new InterpolationRangeError(time, domain);
    return { time, height: spline.at(x) };
  });

  return createSeries(samples, reference.unit);
}

/**
 * Pair each observed height with the reference curve interpolated to the
 * observation's timestamp.
 */
export function attachPrediction(
  observed: Series<TaggedSample>,
  reference: Series<Sample>,
): PairedSample[] {
  const predicted = interpolateOnto(observed, reference);

  return observed.samples.map((sample, i) => ({
    time: sample.time,
    observed: sample.height,
    predicted: predicted.samples[i]!.height,
    ...(sample.kind ? { kind: sample.kind } : {}),
  }));
}

export interface NearestOptions {
  /** Observations further than this from every reference stay unmatched */
  maxDistanceMinutes?: number;
  /** Only match an observation to references of the same high/low kind */
  sameKind?: boolean;
}

export interface NearestMatch<O extends TaggedSample, R extends TaggedSample> {
  observation: O;
  reference: R | null;
  /** Reference time minus observation time, in minutes */
  offsetMinutes: number | null;
}

/**
 * Associate every observation with the reference whose timestamp is closest.
 * Ties go to the earlier reference.
 */
export function matchNearest<O extends TaggedSample, R extends TaggedSample>(
  observations: Series<O>,
  references: Series<R>,
  { maxDistanceMinutes = Infinity, sameKind = false }: NearestOptions = {},
): NearestMatch<O, R>[] {
  assertSameUnit(references, observations);

  const all = references.samples;
  const pools = new Map<string, { refs: readonly R[]; times: number[] }>();
  const poolFor = (kind: string | undefined) => {
    const key = sameKind && kind ? kind : "*";
    let pool = pools.get(key);
    if (!pool) {
      const refs = key === "*" ? all : all.filter((r) => r.kind === key);
      pool = { refs, times: refs.map((r) => r.time.getTime()) };
      pools.set(key, pool);
    }
    return pool;
  };

  return observations.samples.map((observation) => {
    const { refs, times } = poolFor(observation.kind);
    const t = observation.time.getTime();
    const before = bisect(times, t);
    const after = before + 1;

    let index = -1;
    if (before >= 0 && after < times.length) {
      index = t - times[before]! <= times[after]! - t ? before : after;
    } else if (before >= 0) {
      index = before;
    } else if (after < times.length) {
      index = after;
    }

    const reference = refs[index];
    if (!reference) {
      return { observation, reference: null, offsetMinutes: null };
    }

    const offsetMinutes = (reference.time.getTime() - t) / MS_PER_MINUTE;
    if (Math.abs(offsetMinutes) > maxDistanceMinutes) {
      return { observation, reference: null, offsetMinutes: null };
    }
    return { observation, reference, offsetMinutes };
  });
}

/**
 * Observed/predicted pairs from nearest-time matches. Each pair after the
 * first carries the minutes elapsed since the previous observation.
 */
export function pairMatches<O extends TaggedSample, R extends TaggedSample>(
  matches: readonly NearestMatch<O, R>[],
): PairedSample[] {
  return matches.map(({ observation, reference }, i) => {
    const previous = matches[i - 1]?.observation;
    return {
      time: observation.time,
      observed: observation.height,
      predicted: reference?.height ?? null,
      ...(observation.kind ? { kind: observation.kind } : {}),
      ...(previous
        ? {
            intervalMinutes:
              (observation.time.getTime() - previous.time.getTime()) /
              MS_PER_MINUTE,
          }
        : {}),
    };
  });
}
