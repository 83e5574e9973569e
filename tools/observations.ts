import { readFile } from "fs/promises";
import schema from "../schemas/observation.schema.json" with { type: "json" };
import { normalizeSeries } from "../src/series.ts";
import type {
  ExtremaKind,
  HeightUnit,
  Series,
  TaggedSample,
} from "../src/types.ts";
import { compileSchema, schemaErrors } from "../src/validation.ts";
import { parseCSV } from "./util.ts";

/**
 * The contract every ingested row must satisfy before it becomes a sample.
 * Source files name their columns differently, so callers map columns to
 * these fields explicitly instead of relying on matching names.
 */
export interface ObservationRow {
  time: string;
  height: number | null;
  kind?: ExtremaKind;
}

export interface ColumnMapping {
  time: string;
  height: string;
  kind?: string;
}

const validate = compileSchema<ObservationRow>(schema);

const MISSING = new Set(["", "na", "nan", "null"]);

/**
 * Bring a spreadsheet-style timestamp into ISO-8601 form. Timestamps without
 * an offset are taken as UTC.
 */
export function normalizeTimestamp(text: string): string {
  let value = text.trim().replace(/^(\d{4}-\d{2}-\d{2})[ T]/, "$1T");
  if (/^\d{4}-\d{2}-\d{2}$/.test(value)) value += "T00:00:00";
  if (/T\d{2}:\d{2}$/.test(value)) value += ":00";
  if (!/(Z|[+-]\d{2}:?\d{2})$/i.test(value)) value += "Z";
  return value;
}

export function parseHeight(text: string): number | null {
  const value = text.trim();
  if (MISSING.has(value.toLowerCase())) return null;
  return Number(value);
}

/** Accepts "h"/"l" as used in printed tide tables, and "high"/"low". */
export function normalizeKind(text: string | undefined): ExtremaKind | undefined {
  switch (text?.trim().toLowerCase()) {
    case "h":
    case "high":
      return "high";
    case "l":
    case "low":
      return "low";
    default:
      return undefined;
  }
}

/**
 * Check a row against the observation schema and turn it into a sample.
 */
export function toSample(row: unknown, index = 0): TaggedSample {
  if (!validate(row)) {
    throw new Error(
      `Invalid observation at row ${index + 1}: ${schemaErrors(validate)}`,
    );
  }

  return {
    time: new Date(row.time),
    height: row.height,
    ...(row.kind ? { kind: row.kind } : {}),
  };
}

/**
 * Map CSV records to observation rows with the given column mapping, validate
 * them, and build a sorted, de-duplicated series.
 */
export function observationsFromRecords(
  records: readonly Record<string, string>[],
  columns: ColumnMapping,
  unit: HeightUnit,
): Series<TaggedSample> {
  const samples = records.map((record, i) => {
    const kind = columns.kind ? normalizeKind(record[columns.kind]) : undefined;
    return toSample(
      {
        time: normalizeTimestamp(record[columns.time] ?? ""),
        height: parseHeight(record[columns.height] ?? ""),
        ...(kind ? { kind } : {}),
      },
      i,
    );
  });

  return normalizeSeries(samples, unit);
}

export async function readObservationsCSV(
  path: string,
  columns: ColumnMapping,
  unit: HeightUnit,
): Promise<Series<TaggedSample>> {
  const records = parseCSV(await readFile(path, "utf-8"));
  return observationsFromRecords(records, columns, unit);
}
