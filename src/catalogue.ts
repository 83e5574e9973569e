import schema from "../schemas/constituents.schema.json" with { type: "json" };
import { CatalogueError } from "./errors.ts";
import type { Constituent } from "./types.ts";
import { compileSchema, schemaErrors } from "./validation.ts";

const validate = compileSchema<Constituent[]>(schema);

/**
 * Validate a list of constituent definitions and freeze it. The result is the
 * fixed set of design frequencies handed to the fitter.
 */
export function defineCatalogue(entries: unknown): readonly Constituent[] {
  if (!validate(entries)) {
    throw new CatalogueError(`Invalid catalogue: ${schemaErrors(validate)}`);
  }

  const seen = new Set<string>();
  for (const { name } of entries) {
    if (seen.has(name)) {
      throw new CatalogueError(`Duplicate constituent: ${name}`);
    }
    seen.add(name);
  }

  return Object.freeze(
    entries.map((c) =>
      Object.freeze({ ...c, description: c.description ?? null }),
    ),
  );
}

/**
 * Pick constituents by name, in the order given.
 */
export function pickConstituents(
  catalogue: readonly Constituent[],
  names: readonly string[],
): readonly Constituent[] {
  const byName = new Map(catalogue.map((c) => [c.name, c]));
  return Object.freeze(
    names.map((name) => {
      const constituent = byName.get(name);
      if (!constituent) throw new CatalogueError(`Unknown constituent: ${name}`);
      return constituent;
    }),
  );
}

export function periodHours({ speed }: Constituent): number {
  return 360 / speed;
}

export interface ResolvableOptions {
  /**
   * Multiple of the synodic period two constituents must be observed over to
   * be told apart. 1 is the classic Rayleigh criterion.
   */
  rayleigh?: number;
}

/**
 * Reduce a catalogue to the constituents a record of `spanHours` can resolve.
 *
 * A constituent is dropped when one full period doesn't fit in the span, or
 * when it can't be separated from a constituent already kept. Catalogue order
 * is the priority order, so list the dominant constituents first.
 */
export function selectResolvable(
  catalogue: readonly Constituent[],
  spanHours: number,
  { rayleigh = 1 }: ResolvableOptions = {},
): readonly Constituent[] {
  const kept: Constituent[] = [];

  for (const candidate of catalogue) {
    if (periodHours(candidate) > spanHours) continue;

    const separable = kept.every(
      (c) => Math.abs(c.speed - candidate.speed) * spanHours >= 360 * rayleigh,
    );
    if (separable) kept.push(candidate);
  }

  return Object.freeze(kept);
}
