import type { ExtremaEvent, ExtremaKind, Sample, Series } from "./types.ts";

function classify(
  prev: number,
  current: number,
  next: number,
): ExtremaKind | null {
  if (current > prev && current > next) return "high";
  if (current < prev && current < next) return "low";
  return null;
}

function isMoreExtreme(candidate: ExtremaEvent, current: ExtremaEvent) {
  return candidate.kind === "high"
    ? candidate.height > current.height
    : candidate.height < current.height;
}

/**
 * Find high and low waters on a dense, regularly spaced series.
 *
 * A run of equal heights (often a single sample) is a high when the heights
 * just before and just after it are both lower, and is reported at its first
 * sample; lows mirror this. A level step inside a rise or fall is therefore
 * not a turn. Runs touching the first or last sample, or a missing height,
 * have no two-sided context and are never reported. Consecutive same-kind
 * events collapse to the most extreme one, the earliest on ties, so the
 * returned events always alternate between high and low.
 */
export function detectExtrema(series: Series<Sample>): ExtremaEvent[] {
  const { samples } = series;
  const events: ExtremaEvent[] = [];

  let start = 0;
  while (start < samples.length) {
    const current = samples[start]!.height;
    let end = start;
    while (samples[end + 1]?.height === current) end++;

    const prev = samples[start - 1]?.height ?? null;
    const next = samples[end + 1]?.height ?? null;
    const kind =
      current !== null && prev !== null && next !== null
        ? classify(prev, current, next)
        : null;

    if (current !== null && kind) {
      const event: ExtremaEvent = { time: samples[start]!.time, height: current, kind };
      const last = events[events.length - 1];

      if (!last || last.kind !== kind) {
        events.push(event);
      } else if (isMoreExtreme(event, last)) {
        events[events.length - 1] = event;
      }
    }

    start = end + 1;
  }

  return events;
}

export function highs(events: readonly ExtremaEvent[]) {
  return events.filter((e) => e.kind === "high");
}

export function lows(events: readonly ExtremaEvent[]) {
  return events.filter((e) => e.kind === "low");
}
