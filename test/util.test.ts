import { describe, test, expect } from "vitest";
import { groupBy } from "../src/util.ts";

describe("groupBy", () => {
  test("groups in order of first appearance", () => {
    const groups = groupBy(["b1", "a1", "b2", "c1", "a2"], (s) => s[0] ?? "");

    expect(Object.keys(groups)).toEqual(["b", "a", "c"]);
    expect(groups).toEqual({ b: ["b1", "b2"], a: ["a1", "a2"], c: ["c1"] });
  });

  test("returns no groups for no items", () => {
    expect(groupBy([], String)).toEqual({});
  });
});
