/**
 * Dense linear least squares by Householder QR.
 *
 * Solves min ||A·x − b||₂ for a tall matrix A (rows ≥ columns) stored as an
 * array of rows. Returns `null` when A is numerically rank deficient, i.e.
 * some column is (close to) a combination of the others.
 */
export function solveLeastSquares(
  rows: readonly (readonly number[])[],
  b: readonly number[],
  tolerance = 1e-10,
): number[] | null {
  const m = rows.length;
  const n = rows[0]?.length ?? 0;
  if (n === 0 || m < n || b.length !== m) return null;

  // Column-major working copy: Householder steps work column by column
  const a: Float64Array[] = Array.from({ length: n }, (_, j) =>
    Float64Array.from(rows, (row) => row[j]!),
  );
  const y = Float64Array.from(b);
  const diagonal = new Float64Array(n);

  const scale = Math.max(...a.map((col) => norm(col, 0)));
  if (scale === 0) return null;

  for (let k = 0; k < n; k++) {
    const col = a[k]!;
    const alpha = norm(col, k);
    if (alpha <= tolerance * scale) return null;

    // Reflect col[k..m) onto ±alpha·e_k, choosing the sign that avoids cancellation
    const sign = col[k]! > 0 ? -1 : 1;
    const r = sign * alpha;
    col[k] = col[k]! - r;
    const vnorm2 = dot(col, col, k);

    for (let j = k + 1; j < n; j++) {
      reflect(a[j]!, col, k, vnorm2);
    }
    reflect(y, col, k, vnorm2);

    diagonal[k] = r;
  }

  // Back substitution on R·x = Qᵀ·b
  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = y[i]!;
    for (let j = i + 1; j < n; j++) sum -= a[j]![i]! * x[j]!;
    x[i] = sum / diagonal[i]!;
  }
  return x;
}

function dot(u: Float64Array, v: Float64Array, from: number) {
  let s = 0;
  for (let i = from; i < u.length; i++) s += u[i]! * v[i]!;
  return s;
}

function norm(u: Float64Array, from: number) {
  return Math.sqrt(dot(u, u, from));
}

/** target ← (I − 2·v·vᵀ / vᵀv)·target on rows [from, m). */
function reflect(
  target: Float64Array,
  v: Float64Array,
  from: number,
  vnorm2: number,
) {
  const factor = (2 * dot(v, target, from)) / vnorm2;
  for (let i = from; i < target.length; i++) {
    target[i] = target[i]! - factor * v[i]!;
  }
}
