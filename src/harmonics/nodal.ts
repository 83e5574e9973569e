import type { Constituent, NodalFamily } from "../types.ts";

const DEG = Math.PI / 180;
const J2000 = Date.UTC(2000, 0, 1, 12);
const MS_PER_CENTURY = 36525 * 24 * 60 * 60 * 1000;

export interface NodeFactors {
  /** Amplitude factor */
  f: number;
  /** Phase correction, degrees */
  u: number;
}

/**
 * Longitude of the Moon's ascending node in degrees (Meeus, ch. 47). It
 * regresses through a full circle every 18.61 years.
 */
export function lunarNodeLongitude(time: Date): number {
  const T = (time.getTime() - J2000) / MS_PER_CENTURY;
  return 125.0445479 - 1934.1362891 * T + 0.0020754 * T * T;
}

type Coefficients = [number, number, number, number];

// f = Σ f[k]·cos(kN), u = Σ u[k]·sin(kN) for k = 0..3 (Schureman, simplified)
const FAMILIES: Record<NodalFamily, { f: Coefficients; u: Coefficients }> = {
  M2: { f: [1.0004, -0.0373, 0.0002, 0], u: [0, -2.14, 0, 0] },
  K1: { f: [1.006, 0.115, -0.0088, 0.0006], u: [0, -8.86, 0.68, -0.07] },
  O1: { f: [1.0089, 0.1871, -0.0147, 0.0014], u: [0, 10.8, -1.34, 0.19] },
  K2: { f: [1.0241, 0.2863, 0.0083, -0.0015], u: [0, -17.74, 0.68, -0.04] },
  J1: { f: [1.0129, 0.1676, -0.017, 0.0016], u: [0, -12.94, 1.34, -0.19] },
  OO1: { f: [1.1027, 0.6504, 0.0317, -0.0014], u: [0, -36.68, 4.02, -0.57] },
  MM: { f: [1, -0.13, 0.0013, 0], u: [0, 0, 0, 0] },
  MF: { f: [1.0429, 0.4135, -0.004, 0], u: [0, -23.74, 2.68, -0.38] },
};

const NODAL_FAMILIES: readonly NodalFamily[] = [
  "M2",
  "K1",
  "O1",
  "K2",
  "J1",
  "OO1",
  "MM",
  "MF",
];

function harmonicSum(
  coefficients: Coefficients,
  N: number,
  fn: (x: number) => number,
) {
  return coefficients.reduce((sum, c, k) => sum + c * fn(k * N * DEG), 0);
}

/**
 * Node factor `f` and phase correction `u` for a constituent at `time`.
 *
 * Compound constituents combine their families as `f = Π f^|p|` and
 * `u = Σ p·u`. Constituents without a family (the solar ones) get `f = 1`,
 * `u = 0`.
 */
export function nodeFactors(
  constituent: Pick<Constituent, "nodal">,
  time: Date,
): NodeFactors {
  const N = lunarNodeLongitude(time);
  let f = 1;
  let u = 0;

  for (const family of NODAL_FAMILIES) {
    const power = constituent.nodal?.[family];
    if (!power) continue;

    const coefficients = FAMILIES[family];
    f *= Math.pow(harmonicSum(coefficients.f, N, Math.cos), Math.abs(power));
    u += power * harmonicSum(coefficients.u, N, Math.sin);
  }

  return { f, u };
}

export const NO_CORRECTION: NodeFactors = Object.freeze({ f: 1, u: 0 });
