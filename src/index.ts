import catalogue from "./constituents.json" with { type: "json" };
import { defineCatalogue } from "./catalogue.ts";

export * from "./types.ts";
export * from "./errors.ts";
export * from "./series.ts";
export * from "./time.ts";
export * from "./catalogue.ts";
export { solveLeastSquares } from "./harmonics/least-squares.ts";
export { nodeFactors, lunarNodeLongitude } from "./harmonics/nodal.ts";
export type { NodeFactors } from "./harmonics/nodal.ts";
export {
  fitHarmonics,
  DEFAULT_EPOCH,
  MSL_WINDOW_HOURS,
} from "./harmonics/fit.ts";
export { heightAt, predict, predictRange } from "./harmonics/predict.ts";
export * from "./extrema.ts";
export * from "./align.ts";
export * from "./residuals.ts";
export * from "./report.ts";

/** The standard 37 harmonic constituents, in conventional NOAA order. */
export const constituents = defineCatalogue(catalogue);
