import { describe, test, expect } from "vitest";
import {
  constituents,
  createSeries,
  DEFAULT_EPOCH,
  EmptySeriesError,
  fitHarmonics,
  heightAt,
  hourlyGrid,
  hoursSince,
  InsufficientDataError,
  lunarNodeLongitude,
  nodeFactors,
  pickConstituents,
  predict,
  predictRange,
  SeriesOrderError,
  type HarmonicModel,
} from "../src/index.ts";

const DEG = Math.PI / 180;
const start = new Date("2021-01-01T00:00:00Z");
const days = (n: number) => new Date(start.getTime() + n * 86400000);

// 2.5 + 1.2·cos(M2·t − 40°) + 0.4·cos(S2·t − 100°)
function synthetic(time: Date) {
  const t = hoursSince(DEFAULT_EPOCH, time);
  return (
    2.5 +
    1.2 * Math.cos((28.9841042 * t - 40) * DEG) +
    0.4 * Math.cos((30 * t - 100) * DEG)
  );
}

const times = hourlyGrid(start, days(30));
const observed = createSeries(
  times.map((time) => ({ time, height: synthetic(time) })),
  "m",
);
const m2s2 = pickConstituents(constituents, ["M2", "S2"]);

describe("fitHarmonics", () => {
  const model = fitHarmonics(observed, m2s2);

  test("recovers mean level, amplitudes and phases of noise-free data", () => {
    expect(model.meanLevel).toBeCloseTo(2.5, 6);
    const [m2, s2] = model.constituents;
    expect(m2).toMatchObject({ name: "M2", speed: 28.9841042 });
    expect(m2!.amplitude).toBeCloseTo(1.2, 6);
    expect(m2!.phase).toBeCloseTo(40, 4);
    expect(s2!.amplitude).toBeCloseTo(0.4, 6);
    expect(s2!.phase).toBeCloseTo(100, 4);
  });

  test("recovers a single 12.42 h constituent from 30 days of hourly data", () => {
    const speed = 360 / 12.42;
    const single = createSeries(
      times.map((time) => ({
        time,
        height: Math.cos(speed * hoursSince(start, time) * DEG),
      })),
      "m",
    );
    const fitted = fitHarmonics(single, pickConstituents(constituents, ["M2"]));

    expect(Math.abs(fitted.constituents[0]!.amplitude - 1)).toBeLessThan(0.01);
    expect(Math.abs(fitted.meanLevel)).toBeLessThan(0.01);
  });

  test("records the fitting window and diagnostics", () => {
    expect(model.unit).toBe("m");
    expect(model.epoch).toEqual(DEFAULT_EPOCH);
    expect(model.window).toEqual({ start, end: days(30) });
    expect(model.diagnostics.samples).toBe(721);
    expect(model.diagnostics.rmse).toBeLessThan(1e-6);
    expect(model.options).toEqual({ subtractMeanSeaLevel: false, nodal: false });
  });

  test("reports phases in [0, 360)", () => {
    const shifted = createSeries(
      times.map((time) => ({
        time,
        height:
          1.5 * Math.cos((28.9841042 * hoursSince(DEFAULT_EPOCH, time) + 30) * DEG),
      })),
      "m",
    );
    const [m2] = fitHarmonics(shifted, pickConstituents(constituents, ["M2"]))
      .constituents;
    expect(m2!.phase).toBeCloseTo(330, 4);
  });

  test("skips missing heights", () => {
    const gappy = createSeries(
      observed.samples.map((s, i) => ({
        time: s.time,
        height: i % 5 === 0 ? null : s.height,
      })),
      "m",
    );
    const fitted = fitHarmonics(gappy, m2s2);

    expect(fitted.diagnostics.samples).toBe(576);
    expect(fitted.constituents[0]!.amplitude).toBeCloseTo(1.2, 6);
  });

  test("predictions do not depend on the epoch", () => {
    const local = fitHarmonics(observed, m2s2, { epoch: start });
    const time = new Date("2021-01-10T07:30:00Z");
    expect(heightAt(local, time)).toBeCloseTo(synthetic(time), 6);
    // 40° − 28.9841042°/h × 184104 h, mod 360
    expect(local.constituents[0]!.phase).toBeCloseTo(230.48036, 3);
  });

  test("subtracts a running mean sea level", () => {
    const flat = createSeries(
      times.map((time) => ({ time, height: 1.5 })),
      "m",
    );
    const fitted = fitHarmonics(flat, pickConstituents(constituents, ["M2"]), {
      subtractMeanSeaLevel: true,
    });

    expect(fitted.options.subtractMeanSeaLevel).toBe(true);
    expect(fitted.meanLevel).toBeCloseTo(1.5, 9);
    expect(fitted.constituents[0]!.amplitude).toBeCloseTo(0, 9);
  });

  describe("insufficient data", () => {
    test("no constituents", () => {
      expect(() => fitHarmonics(observed, [])).toThrow(InsufficientDataError);
    });

    test("fewer samples than unknowns", () => {
      const few = createSeries(observed.samples.slice(0, 4), "m");
      expect(() => fitHarmonics(few, m2s2)).toThrow(
        "4 observations cannot determine 5 unknowns",
      );
    });

    test("a record shorter than the slowest period", () => {
      const short = createSeries(observed.samples.slice(0, 10), "m");
      expect(() =>
        fitHarmonics(short, pickConstituents(constituents, ["M2"])),
      ).toThrow(/M2 needs at least 12\.4 h/);
    });

    test("constituents that can't be separated", () => {
      const [m2] = m2s2;
      const twin = { name: "M2X", description: null, speed: m2!.speed };
      expect(() => fitHarmonics(observed, [m2!, twin])).toThrow(
        InsufficientDataError,
      );
    });

    test("a series without heights", () => {
      const empty = createSeries(
        times.map((time) => ({ time, height: null })),
        "m",
      );
      expect(() => fitHarmonics(empty, m2s2)).toThrow(EmptySeriesError);
    });
  });
});

describe("nodal corrections", () => {
  test("node longitude at J2000", () => {
    expect(lunarNodeLongitude(new Date("2000-01-01T12:00:00Z"))).toBeCloseTo(
      125.0445479,
      7,
    );
  });

  test("solar constituents are not corrected", () => {
    expect(nodeFactors({}, start)).toEqual({ f: 1, u: 0 });
  });

  test("compound constituents combine their families", () => {
    const m2 = nodeFactors({ nodal: { M2: 1 } }, start);
    const m4 = nodeFactors({ nodal: { M2: 2 } }, start);
    const twoSM2 = nodeFactors({ nodal: { M2: -1 } }, start);

    expect(m4.f).toBeCloseTo(m2.f ** 2, 12);
    expect(m4.u).toBeCloseTo(2 * m2.u, 12);
    expect(twoSM2.f).toBeCloseTo(m2.f, 12);
    expect(twoSM2.u).toBeCloseTo(-m2.u, 12);
  });

  test("stay within a few percent of unity for M2", () => {
    const { f } = nodeFactors({ nodal: { M2: 1 } }, start);
    expect(f).toBeGreaterThan(0.96);
    expect(f).toBeLessThan(1.04);
  });

  test("a nodal fit recovers a nodally modulated tide", () => {
    const [m2, k1, o1] = pickConstituents(constituents, ["M2", "K1", "O1"]);
    const truth: HarmonicModel = {
      unit: "m",
      epoch: DEFAULT_EPOCH,
      meanLevel: 0.2,
      constituents: [
        { name: "M2", speed: m2!.speed, amplitude: 1.1, phase: 75, nodal: m2!.nodal },
        { name: "K1", speed: k1!.speed, amplitude: 0.3, phase: 200, nodal: k1!.nodal },
        { name: "O1", speed: o1!.speed, amplitude: 0.25, phase: 320, nodal: o1!.nodal },
      ],
      window: { start, end: days(60) },
      options: { subtractMeanSeaLevel: false, nodal: true },
      diagnostics: { samples: 0, rmse: 0 },
    };
    const series = predictRange(truth, start, days(60), 60);

    const fitted = fitHarmonics(series, [m2!, k1!, o1!], { nodal: true });

    expect(fitted.options.nodal).toBe(true);
    expect(fitted.meanLevel).toBeCloseTo(0.2, 6);
    fitted.constituents.forEach((c, i) => {
      expect(c.amplitude).toBeCloseTo(truth.constituents[i]!.amplitude, 6);
      expect(c.phase).toBeCloseTo(truth.constituents[i]!.phase, 4);
    });
  });
});

describe("predict", () => {
  const model = fitHarmonics(observed, m2s2);

  test("reproduces the fitted series", () => {
    const predicted = predict(model, times);
    predicted.samples.forEach((s, i) => {
      expect(s.height).toBeCloseTo(observed.samples[i]!.height!, 6);
    });
  });

  test("extrapolates beyond the fitting window", () => {
    const later = new Date("2021-03-15T04:20:00Z");
    expect(heightAt(model, later)).toBeCloseTo(synthetic(later), 5);
  });

  test("predictRange samples every minute by default", () => {
    const series = predictRange(model, start, new Date("2021-01-01T01:00:00Z"));
    expect(series.unit).toBe("m");
    expect(series.samples).toHaveLength(61);
    expect(series.samples[60]!.time).toEqual(new Date("2021-01-01T01:00:00Z"));
  });

  test("requires increasing times", () => {
    expect(() => predict(model, [days(1), days(0)])).toThrow(SeriesOrderError);
  });
});
