import { describe, test, expect } from "vitest";
import { parseCSV, splitCSVLine, toCSV } from "../tools/util.ts";
import {
  normalizeKind,
  normalizeTimestamp,
  observationsFromRecords,
  parseHeight,
  toSample,
} from "../tools/observations.ts";
import { parseTabledapCSV, tabledapURL } from "../tools/erddap.ts";

describe("csv", () => {
  test("splits quoted fields", () => {
    expect(splitCSVLine('a,"b,c","say ""hi""", d ')).toEqual([
      "a",
      "b,c",
      'say "hi"',
      "d",
    ]);
  });

  test("parses records keyed by the header", () => {
    expect(parseCSV("x,y\r\n1,2\r\n3\r\n")).toEqual([
      { x: "1", y: "2" },
      { x: "3", y: "" },
    ]);
  });

  test("writes rows with quoting and blanks for missing values", () => {
    const rows = [
      { a: 1, b: "x,y" },
      { a: null, b: 'q"' },
    ];
    expect(toCSV(rows, { a: (r) => r.a, b: (r) => r.b })).toBe(
      'a,b\n1,"x,y"\n,"q"""\n',
    );
  });
});

describe("observations", () => {
  test("normalizeTimestamp", () => {
    expect(normalizeTimestamp("2021-06-01 12:30")).toBe("2021-06-01T12:30:00Z");
    expect(normalizeTimestamp("2021-06-01")).toBe("2021-06-01T00:00:00Z");
    expect(normalizeTimestamp(" 2021-06-01T12:30:15Z ")).toBe(
      "2021-06-01T12:30:15Z",
    );
    expect(normalizeTimestamp("2021-06-01T12:30:00+01:00")).toBe(
      "2021-06-01T12:30:00+01:00",
    );
  });

  test("parseHeight", () => {
    expect(parseHeight("1.25")).toBe(1.25);
    expect(parseHeight(" -0.5 ")).toBe(-0.5);
    expect(parseHeight("0")).toBe(0);
    expect(parseHeight("")).toBeNull();
    expect(parseHeight("NA")).toBeNull();
    expect(parseHeight("NaN")).toBeNull();
  });

  test("normalizeKind", () => {
    expect(normalizeKind("H")).toBe("high");
    expect(normalizeKind("low")).toBe("low");
    expect(normalizeKind("")).toBeUndefined();
    expect(normalizeKind(undefined)).toBeUndefined();
  });

  test("toSample validates rows", () => {
    expect(
      toSample({ time: "2021-06-01T12:00:00Z", height: 1.5, kind: "high" }),
    ).toEqual({
      time: new Date("2021-06-01T12:00:00Z"),
      height: 1.5,
      kind: "high",
    });
    expect(toSample({ time: "2021-06-01T12:00:00Z", height: null })).toEqual({
      time: new Date("2021-06-01T12:00:00Z"),
      height: null,
    });

    expect(() => toSample({ time: "yesterday", height: 1 }, 2)).toThrow(
      /^Invalid observation at row 3: /,
    );
    expect(() => toSample({ time: "2021-06-01T12:00:00Z", height: "1" })).toThrow(
      /Invalid observation/,
    );
    expect(() => toSample({ time: "2021-06-01T12:00:00Z", height: NaN })).toThrow(
      /Invalid observation/,
    );
  });

  test("maps columns into a sorted series", () => {
    const series = observationsFromRecords(
      [
        { Datetime: "2021-06-01 18:40", Height: "2.1", "High or Low": "L" },
        { Datetime: "2021-06-01 12:25", Height: "14.2", "High or Low": "H" },
        { Datetime: "2021-06-02 00:50", Height: "NA", "High or Low": "H" },
      ],
      { time: "Datetime", height: "Height", kind: "High or Low" },
      "ft",
    );

    expect(series.unit).toBe("ft");
    expect(series.samples).toEqual([
      { time: new Date("2021-06-01T12:25:00Z"), height: 14.2, kind: "high" },
      { time: new Date("2021-06-01T18:40:00Z"), height: 2.1, kind: "low" },
      { time: new Date("2021-06-02T00:50:00Z"), height: null, kind: "high" },
    ]);
  });

  test("reports the offending row", () => {
    expect(() =>
      observationsFromRecords(
        [
          { t: "2021-06-01 00:00", h: "1" },
          { t: "2021-06-01 01:00", h: "one" },
        ],
        { time: "t", height: "h" },
        "m",
      ),
    ).toThrow(/row 2/);
  });
});

describe("erddap", () => {
  test("builds a tabledap query", () => {
    expect(
      tabledapURL({
        variables: ["time", "Water_Level_OD_Malin"],
        where: { station_id: "Kilrush Lough" },
        start: new Date("2021-01-01T00:00:00Z"),
        end: new Date("2022-01-01T00:00:00Z"),
      }),
    ).toBe(
      "https://erddap.marine.ie/erddap/tabledap/IrishNationalTideGaugeNetwork.csv" +
        "?time,Water_Level_OD_Malin" +
        "&station_id=%22Kilrush%20Lough%22" +
        "&time%3E%3D2021-01-01T00:00:00.000Z" +
        "&time%3C2022-01-01T00:00:00.000Z",
    );
  });

  test("adds a trailing slash to the server", () => {
    expect(
      tabledapURL({
        server: "https://example.org/erddap",
        dataset: "levels",
        variables: ["time"],
      }),
    ).toBe("https://example.org/erddap/tabledap/levels.csv?time");
  });

  test("parses a response, skipping the units row", () => {
    const series = parseTabledapCSV(
      [
        "time,Water_Level_OD_Malin",
        "UTC,meters",
        "2021-01-01T00:15:00Z,1.204",
        "2021-01-01T00:00:00Z,NaN",
      ].join("\n"),
    );

    expect(series.unit).toBe("m");
    expect(series.samples).toEqual([
      { time: new Date("2021-01-01T00:00:00Z"), height: null },
      { time: new Date("2021-01-01T00:15:00Z"), height: 1.204 },
    ]);
  });

  test("rejects malformed values", () => {
    expect(() =>
      parseTabledapCSV("time,level\nUTC,m\n2021-01-01T00:00:00Z,abc", {
        heightVariable: "level",
      }),
    ).toThrow('Invalid level "abc" on data row 1');
    expect(() =>
      parseTabledapCSV("time,level\nUTC,m\nsoon,1", { heightVariable: "level" }),
    ).toThrow('Invalid time "soon" on data row 1');
  });
});
