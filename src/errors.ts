/**
 * Base class for failures raised by the analysis core. Every stage either
 * returns a complete result or throws one of these synchronously.
 */
export class TideAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Too few, or too short, observations to fit the requested constituents. */
export class InsufficientDataError extends TideAnalysisError {}

/** A query time outside the interval covered by the interpolation knots. */
export class InterpolationRangeError extends TideAnalysisError {
  readonly time: Date;
  readonly domain: { start: Date; end: Date };

  constructor(time: Date, domain: { start: Date; end: Date }) {
    super(
      `${time.toISOString()} is outside the interpolation domain ` +
        `${domain.start.toISOString()} – ${domain.end.toISOString()}`,
    );
    this.time = time;
    this.domain = domain;
  }
}

export class EmptySeriesError extends TideAnalysisError {}

export class InconsistentUnitsError extends TideAnalysisError {
  constructor(expected: string, actual: string) {
    super(`Cannot compare heights in "${actual}" with heights in "${expected}"`);
  }
}

/** Samples out of time order, or sharing a timestamp. */
export class SeriesOrderError extends TideAnalysisError {}

export class CatalogueError extends TideAnalysisError {}
