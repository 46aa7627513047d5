/**
 * Small dense least-squares solver (normal equations + ridge).
 * Systems here have one column per correction parameter, so a few dozen
 * columns at most.
 */

import type { Vec } from "../vec";

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 * Throws if A is singular.
 */
export function solveLinearSystem(a: readonly (readonly number[])[], b: readonly number[]): Vec {
  const n = b.length;
  const m = a.map((row, i) => [...row, b[i]!]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r]![col]!) > Math.abs(m[pivot]![col]!)) pivot = r;
    }
    if (Math.abs(m[pivot]![col]!) < 1e-12) {
      throw new Error(`Singular system at column ${col}`);
    }
    [m[col], m[pivot]] = [m[pivot]!, m[col]!];

    const pivotRow = m[col]!;
    for (let r = col + 1; r < n; r++) {
      const row = m[r]!;
      const f = row[col]! / pivotRow[col]!;
      for (let c = col; c <= n; c++) row[c]! -= f * pivotRow[c]!;
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    const row = m[r]!;
    let s = row[n]!;
    for (let c = r + 1; c < n; c++) s -= row[c]! * x[c]!;
    x[r] = s / row[r]!;
  }
  return x;
}

/**
 * Least-squares fit of `targets ≈ design · x`.
 *
 * Columns that are identically zero (a local model that never fired) get a
 * zero coefficient; `ridge` keeps near-collinear columns solvable.
 */
export function leastSquares(
  design: readonly (readonly number[])[],
  targets: readonly number[],
  ridge = 1e-9
): Vec {
  const cols = design[0]?.length ?? 0;
  if (cols === 0) return [];
  if (design.length !== targets.length) {
    throw new Error(`Design has ${design.length} rows but ${targets.length} targets`);
  }

  const active: number[] = [];
  for (let c = 0; c < cols; c++) {
    if (design.some((row) => row[c] !== 0)) active.push(c);
  }

  const ata = active.map((i) =>
    active.map((j) => {
      let s = 0;
      for (const row of design) s += row[i]! * row[j]!;
      return s;
    })
  );
  const atb = active.map((i) => {
    let s = 0;
    design.forEach((row, r) => {
      s += row[i]! * targets[r]!;
    });
    return s;
  });
  ata.forEach((row, i) => {
    row[i]! += ridge;
  });

  const solution = active.length > 0 ? solveLinearSystem(ata, atb) : [];
  const x = new Array<number>(cols).fill(0);
  active.forEach((c, i) => {
    x[c] = solution[i]!;
  });
  return x;
}
