import { createSeries } from "../series.ts";
import { hoursSince, timeGrid } from "../time.ts";
import type { HarmonicModel, Sample, Series } from "../types.ts";
import { NO_CORRECTION, nodeFactors } from "./nodal.ts";

const DEG = Math.PI / 180;

/**
 * Height of the fitted tide at a single instant. Times outside the fitting
 * window are extrapolated; nothing restricts them.
 */
export function heightAt(model: HarmonicModel, time: Date): number {
  const t = hoursSince(model.epoch, time);

  return model.constituents.reduce((level, constituent) => {
    const { f, u } = model.options.nodal
      ? nodeFactors(constituent, time)
      : NO_CORRECTION;
    const angle = (constituent.speed * t + u - constituent.phase) * DEG;
    return level + f * constituent.amplitude * Math.cos(angle);
  }, model.meanLevel);
}

/**
 * Evaluate the model at every requested instant. `times` must be strictly
 * increasing, but may be irregularly spaced.
 */
export function predict(
  model: HarmonicModel,
  times: readonly Date[],
): Series {
  const samples: Sample[] = times.map((time) => ({
    time,
    height: heightAt(model, time),
  }));
  return createSeries(samples, model.unit);
}

/**
 * Predict on a regular grid from `start` to `end`, one sample every
 * `stepMinutes` (one minute by default).
 */
export function predictRange(
  model: HarmonicModel,
  start: Date,
  end: Date,
  stepMinutes = 1,
): Series {
  return predict(model, timeGrid(start, end, stepMinutes));
}
