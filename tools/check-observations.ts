#!/usr/bin/env node
/**
 * Compare digitized marigram readings against a reconstructed tide.
 *
 * Series mode joins readings to predictions by exact timestamp and writes an
 * overall residual summary:
 *
 *   tsx tools/check-observations.ts --mode series \
 *     --observed marigram.csv --predicted output/kilrush_lough_2021_hourly.csv
 *
 * Extrema mode pairs each digitized high/low water with the nearest predicted
 * one (of the same kind with --same-kind) and writes one summary per week:
 *
 *   tsx tools/check-observations.ts --mode extrema --kind-column "High or Low" \
 *     --observed highlow.csv --predicted output/kilrush_lough_2021_extrema.csv \
 *     --predicted-kind-column kind
 */

import { writeFile } from "fs/promises";
import { parseArgs } from "util";
import {
  convertSeries,
  type HeightUnit,
  type WeekNumbering,
} from "../src/index.ts";
import { compareExtrema, compareSeries, type Comparison } from "./compare.ts";
import { readObservationsCSV } from "./observations.ts";

const { values: args } = parseArgs({
  options: {
    mode: { type: "string", default: "series" },
    observed: { type: "string" },
    predicted: { type: "string" },
    out: { type: "string" },
    unit: { type: "string", default: "m" },
    "predicted-unit": { type: "string" },
    convert: { type: "boolean", default: false },
    "time-column": { type: "string", default: "time" },
    "height-column": { type: "string", default: "height" },
    "kind-column": { type: "string" },
    "predicted-time-column": { type: "string", default: "time" },
    "predicted-height-column": { type: "string" },
    "predicted-kind-column": { type: "string" },
    "max-distance": { type: "string" },
    "same-kind": { type: "boolean", default: false },
    numbering: { type: "string", default: "ordinal" },
    top: { type: "string", default: "5" },
    digits: { type: "string", default: "3" },
  },
});

function unitOption(value: string | undefined, flag: string): HeightUnit {
  if (value === "m" || value === "ft") return value;
  throw new Error(`--${flag} must be "m" or "ft", got "${value}"`);
}

function numberingOption(value: string): WeekNumbering {
  if (value === "iso" || value === "ordinal") return value;
  throw new Error(`--numbering must be "iso" or "ordinal", got "${value}"`);
}

function requireOption(value: string | undefined, flag: string): string {
  if (!value) throw new Error(`--${flag} is required`);
  return value;
}

async function loadInputs() {
  const unit = unitOption(args.unit, "unit");
  const predictedUnit = unitOption(
    args["predicted-unit"] ?? args.unit,
    "predicted-unit",
  );

  const observed = await readObservationsCSV(
    requireOption(args.observed, "observed"),
    {
      time: args["time-column"],
      height: args["height-column"],
      kind: args["kind-column"],
    },
    unit,
  );
  const predicted = await readObservationsCSV(
    requireOption(args.predicted, "predicted"),
    {
      time: args["predicted-time-column"],
      height:
        args["predicted-height-column"] ??
        (args.mode === "series" ? "predicted" : "height"),
      kind: args["predicted-kind-column"],
    },
    predictedUnit,
  );

  // Mixed units are an error unless conversion is asked for.
  return {
    observed: args.convert ? convertSeries(observed, predictedUnit) : observed,
    predicted,
  };
}

async function main() {
  const top = parseInt(args.top, 10);
  const digits = parseInt(args.digits, 10);
  const { observed, predicted } = await loadInputs();

  let comparison: Comparison;
  switch (args.mode) {
    case "series":
      comparison = compareSeries(observed, predicted, { top, digits });
      console.log(
        `Matched ${comparison.matched} of ${observed.samples.length} readings`,
      );
      break;
    case "extrema": {
      const maxDistance = args["max-distance"];
      comparison = compareExtrema(observed, predicted, {
        sameKind: args["same-kind"],
        maxDistanceMinutes: maxDistance ? Number(maxDistance) : undefined,
        numbering: numberingOption(args.numbering),
        top,
        digits,
      });
      console.log(
        `Paired ${comparison.matched} of ${observed.samples.length} high/low waters`,
      );
      break;
    }
    default:
      throw new Error(`--mode must be "series" or "extrema", got "${args.mode}"`);
  }

  const { report } = comparison;
  if (args.out) {
    await writeFile(args.out, report + "\n");
    console.log(`Wrote ${args.out}`);
  } else {
    console.log(report);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
