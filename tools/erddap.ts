import createFetch from "make-fetch-happen";
import { normalizeSeries } from "../src/series.ts";
import type { HeightUnit, Sample, Series } from "../src/types.ts";
import { parseCSV } from "./util.ts";
import { parseHeight } from "./observations.ts";

const fetch = createFetch.defaults({
  cachePath: "node_modules/.cache",
  retry: 5,
});

/** Marine Institute ERDDAP server, home of the Irish National Tide Gauge Network */
export const DEFAULT_SERVER = "https://erddap.marine.ie/erddap/";
export const DEFAULT_DATASET = "IrishNationalTideGaugeNetwork";
export const DEFAULT_HEIGHT_VARIABLE = "Water_Level_OD_Malin";

export interface TabledapQuery {
  server?: string;
  dataset?: string;
  variables: string[];
  /** Equality constraints on string variables, e.g. `{ station_id: "Kilrush Lough" }` */
  where?: Record<string, string>;
  start?: Date;
  end?: Date;
}

/**
 * Build an ERDDAP tabledap CSV request. `start` is inclusive and `end`
 * exclusive.
 */
export function tabledapURL({
  server = DEFAULT_SERVER,
  dataset = DEFAULT_DATASET,
  variables,
  where = {},
  start,
  end,
}: TabledapQuery): string {
  const constraints = Object.entries(where).map(
    ([name, value]) => `${name}=${encodeURIComponent(`"${value}"`)}`,
  );
  if (start) {
    constraints.push(`time${encodeURIComponent(">=")}${start.toISOString()}`);
  }
  if (end) {
    constraints.push(`time${encodeURIComponent("<")}${end.toISOString()}`);
  }

  const base = server.endsWith("/") ? server : `${server}/`;
  const query = [variables.join(","), ...constraints].join("&");
  return `${base}tabledap/${dataset}.csv?${query}`;
}

export interface TabledapParseOptions {
  heightVariable?: string;
  unit?: HeightUnit;
}

/**
 * Parse a tabledap CSV response into a series. ERDDAP writes the variable
 * names on the first line and their units on the second; missing values
 * appear as "NaN".
 */
export function parseTabledapCSV(
  content: string,
  {
    heightVariable = DEFAULT_HEIGHT_VARIABLE,
    unit = "m",
  }: TabledapParseOptions = {},
): Series {
  const [, ...rows] = parseCSV(content);

  const samples: Sample[] = rows.map((row, i) => {
    const time = new Date(row["time"] ?? "");
    if (Number.isNaN(time.getTime())) {
      throw new Error(`Invalid time "${row["time"]}" on data row ${i + 1}`);
    }
    const height = parseHeight(row[heightVariable] ?? "");
    if (height !== null && Number.isNaN(height)) {
      throw new Error(
        `Invalid ${heightVariable} "${row[heightVariable]}" on data row ${i + 1}`,
      );
    }
    return { time, height };
  });

  return normalizeSeries(samples, unit);
}

export interface StationRequest {
  station: string;
  start: Date;
  end: Date;
  server?: string;
  dataset?: string;
  heightVariable?: string;
}

/**
 * Download a station's water levels between `start` (inclusive) and `end`
 * (exclusive). Responses are cached on disk, so repeated runs don't hit the
 * server again.
 */
export async function fetchStationSeries({
  station,
  start,
  end,
  server,
  dataset,
  heightVariable = DEFAULT_HEIGHT_VARIABLE,
}: StationRequest): Promise<Series> {
  const url = tabledapURL({
    server,
    dataset,
    variables: ["time", heightVariable],
    where: { station_id: station },
    start,
    end,
  });

  console.log(`Fetching ${url}`);
  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`ERDDAP request failed with ${res.status}: ${url}`);
  }

  return parseTabledapCSV(await res.text(), { heightVariable });
}
