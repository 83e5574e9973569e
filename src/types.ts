export type HeightUnit = "m" | "ft";

export type ExtremaKind = "high" | "low";

/**
 * A single water level reading. `height` is `null` when the source marks the
 * reading as missing, which is distinct from a reading of zero.
 */
export interface Sample {
  time: Date;
  height: number | null;
}

/** A sample that may carry a high/low label, e.g. a digitized tide table row. */
export interface TaggedSample extends Sample {
  kind?: ExtremaKind;
}

/**
 * An ordered run of samples in one height unit. Timestamps are strictly
 * increasing. Series are frozen once created; every stage returns a new one.
 */
export interface Series<S extends Sample = Sample> {
  readonly unit: HeightUnit;
  readonly samples: readonly S[];
}

export interface Constituent {
  name: string;
  description: string | null;
  /** Angular speed in degrees per solar hour */
  speed: number;
  /**
   * Node factor families this constituent derives from, with exponents.
   * e.g. `{ M2: 2 }` for M4, `{ M2: 1, K1: 1 }` for MK3.
   */
  nodal?: Partial<Record<NodalFamily, number>>;
}

export type NodalFamily = "M2" | "K1" | "O1" | "K2" | "J1" | "OO1" | "MM" | "MF";

export interface FittedConstituent {
  name: string;
  speed: number;
  amplitude: number;
  /** Phase lag in degrees, [0, 360) */
  phase: number;
  nodal?: Constituent["nodal"];
}

export interface FitOptions {
  /** Reference instant that elapsed model time is measured from */
  epoch?: Date;
  /** Remove a running mean sea level before fitting */
  subtractMeanSeaLevel?: boolean;
  /** Width of the running mean, in hours */
  mslWindowHours?: number;
  /** Apply 18.6-year nodal amplitude/phase modulation */
  nodal?: boolean;
}

export interface HarmonicModel {
  readonly unit: HeightUnit;
  readonly epoch: Date;
  readonly meanLevel: number;
  readonly constituents: readonly FittedConstituent[];
  /** Time span of the observations the model was fitted to */
  readonly window: { readonly start: Date; readonly end: Date };
  readonly options: {
    readonly subtractMeanSeaLevel: boolean;
    readonly nodal: boolean;
  };
  readonly diagnostics: {
    /** Number of non-missing samples used in the fit */
    readonly samples: number;
    /** Root mean square of observed minus fitted heights */
    readonly rmse: number;
  };
}

export interface ExtremaEvent extends TaggedSample {
  height: number;
  kind: ExtremaKind;
}

/** Observed and predicted heights sharing a timestamp, before residuals. */
export interface PairedSample {
  time: Date;
  observed: number | null;
  predicted: number | null;
  kind?: ExtremaKind;
  /** Minutes since the previous digitized event */
  intervalMinutes?: number;
}

export interface ResidualRecord {
  time: Date;
  observed: number;
  predicted: number;
  residual: number;
  kind?: ExtremaKind;
  intervalMinutes?: number;
}

export type WeekNumbering = "iso" | "ordinal";

export interface WeekKey {
  year: number;
  week: number;
}
