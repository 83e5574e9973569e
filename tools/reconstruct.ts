#!/usr/bin/env node
/**
 * Reconstructs the astronomical tide at a tide gauge for one calendar year.
 *
 * Pipeline: ERDDAP water levels → harmonic fit → minute-resolution prediction
 * → hourly prediction CSV, high/low water CSV, observations with the
 * interpolated astronomical tide, and the fitted model as JSON.
 *
 *   tsx tools/reconstruct.ts --station "Kilrush Lough" --year 2021 --out output
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { parseArgs } from "util";
import {
  attachPrediction,
  constituents,
  detectExtrema,
  fitHarmonics,
  highs,
  hoursSince,
  lows,
  pickConstituents,
  predictRange,
  resampleHourly,
  selectResolvable,
  validSamples,
} from "../src/index.ts";
import { fetchStationSeries } from "./erddap.ts";
import { toCSV } from "./util.ts";

const { values: args } = parseArgs({
  options: {
    station: { type: "string", default: "Kilrush Lough" },
    year: { type: "string", default: "2021" },
    constituents: { type: "string" },
    out: { type: "string", default: "output" },
    step: { type: "string", default: "1" },
  },
});

function slugify(text: string) {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

async function main() {
  const year = parseInt(args.year, 10);
  const stepMinutes = Number(args.step);
  if (!Number.isInteger(year)) throw new Error(`Invalid year: ${args.year}`);

  const start = new Date(Date.UTC(year, 0, 1));
  const end = new Date(Date.UTC(year + 1, 0, 1));
  const prefix = join(args.out, `${slugify(args.station)}_${year}`);

  const observed = await fetchStationSeries({
    station: args.station,
    start,
    end,
  });
  const valid = validSamples(observed);
  console.log(
    `Loaded ${observed.samples.length} readings (${valid.length} with a height)`,
  );
  if (valid.length === 0) {
    throw new Error(`No water levels for ${args.station} in ${year}`);
  }

  const span = hoursSince(valid[0]!.time, valid[valid.length - 1]!.time);
  const catalogue = args.constituents
    ? pickConstituents(constituents, args.constituents.split(","))
    : selectResolvable(constituents, span);
  console.log(`Fitting ${catalogue.length} constituents over ${span.toFixed(0)} h`);

  const model = fitHarmonics(observed, catalogue);
  console.log(`Mean level: ${model.meanLevel.toFixed(3)} ${model.unit}`);
  console.log(`Fit RMSE: ${model.diagnostics.rmse.toFixed(3)} ${model.unit}`);
  for (const c of [...model.constituents]
    .sort((a, b) => b.amplitude - a.amplitude)
    .slice(0, 8)) {
    console.log(
      `  ${c.name.padEnd(5)} ${c.amplitude.toFixed(3)} ${model.unit} ${c.phase.toFixed(1)}°`,
    );
  }

  const predicted = predictRange(model, start, end, stepMinutes);
  const extrema = detectExtrema(predicted);
  const withAstro = attachPrediction(observed, predicted);

  await mkdir(args.out, { recursive: true });

  await writeFile(
    `${prefix}_hourly.csv`,
    toCSV(resampleHourly(predicted).samples, {
      time: (s) => s.time.toISOString(),
      predicted: (s) => s.height?.toFixed(4),
    }),
  );
  await writeFile(
    `${prefix}_extrema.csv`,
    toCSV(extrema, {
      time: (e) => e.time.toISOString(),
      height: (e) => e.height.toFixed(4),
      kind: (e) => e.kind,
    }),
  );
  await writeFile(
    `${prefix}_observed.csv`,
    toCSV(withAstro, {
      time: (p) => p.time.toISOString(),
      observed: (p) => p.observed,
      astro: (p) => p.predicted?.toFixed(4),
    }),
  );
  await writeFile(`${prefix}_model.json`, JSON.stringify(model, null, 2) + "\n");

  console.log(
    `Wrote ${predicted.samples.length} predictions, ${highs(extrema).length} ` +
      `high and ${lows(extrema).length} low waters to ${prefix}_*`,
  );
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
