import { EmptySeriesError } from "./errors.ts";
import { createSeries } from "./series.ts";
import type { Sample, Series, WeekKey, WeekNumbering } from "./types.ts";

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/** Elapsed time from `epoch` to `time`, in hours. */
export function hoursSince(epoch: Date, time: Date): number {
  return (time.getTime() - epoch.getTime()) / MS_PER_HOUR;
}

/**
 * Regular sequence of instants from `start` to `end` inclusive, `stepMinutes`
 * apart. `end` is included only when it falls exactly on the grid.
 */
export function timeGrid(start: Date, end: Date, stepMinutes: number): Date[] {
  if (!(stepMinutes > 0)) {
    throw new RangeError(`Grid step must be positive, got ${stepMinutes}`);
  }
  if (end.getTime() < start.getTime()) {
    throw new RangeError(
      `Grid end ${end.toISOString()} is before start ${start.toISOString()}`,
    );
  }

  const stepMs = stepMinutes * MS_PER_MINUTE;
  const count = Math.floor((end.getTime() - start.getTime()) / stepMs) + 1;

  // Multiply rather than accumulate so fractional steps don't drift
  return Array.from(
    { length: count },
    (_, i) => new Date(start.getTime() + i * stepMs),
  );
}

export function minuteGrid(start: Date, end: Date) {
  return timeGrid(start, end, 1);
}

export function hourlyGrid(start: Date, end: Date) {
  return timeGrid(start, end, 60);
}

/**
 * The samples of a dense series that fall on the top of an hour, for hourly
 * exports of a minute-resolution prediction.
 */
export function resampleHourly<S extends Sample>(series: Series<S>): Series<S> {
  const hourly = series.samples.filter(
    (s) => s.time.getTime() % MS_PER_HOUR === 0,
  );
  if (hourly.length === 0) {
    throw new EmptySeriesError("No samples fall on the top of an hour");
  }
  return createSeries(hourly, series.unit);
}

function dayOfYear(time: Date): number {
  const startOfYear = Date.UTC(time.getUTCFullYear(), 0, 1);
  const midnight = Date.UTC(
    time.getUTCFullYear(),
    time.getUTCMonth(),
    time.getUTCDate(),
  );
  return (midnight - startOfYear) / MS_PER_DAY + 1;
}

/**
 * Week-of-year bucket for a timestamp, evaluated in UTC.
 *
 * - `ordinal` (default): consecutive 7-day blocks counted from 1 January
 *   (`floor((yday - 1) / 7) + 1`), so every bucket stays in the calendar
 *   year and week 53 holds the last one or two days.
 * - `iso`: ISO-8601 week; days early in January may belong to the last week
 *   of the previous week-year.
 */
export function weekOf(
  time: Date,
  numbering: WeekNumbering = "ordinal",
): WeekKey {
  if (numbering === "ordinal") {
    return {
      year: time.getUTCFullYear(),
      week: Math.floor((dayOfYear(time) - 1) / 7) + 1,
    };
  }

  // The Thursday of this ISO week decides which year the week belongs to
  const isoDay = time.getUTCDay() || 7;
  const thursday = new Date(
    Date.UTC(
      time.getUTCFullYear(),
      time.getUTCMonth(),
      time.getUTCDate() + 4 - isoDay,
    ),
  );
  return {
    year: thursday.getUTCFullYear(),
    week: Math.floor((dayOfYear(thursday) - 1) / 7) + 1,
  };
}

export function formatWeek({ year, week }: WeekKey): string {
  return `${year}-W${String(week).padStart(2, "0")}`;
}
