/**
 * Vector utilities.
 * All operations are pure functions on number arrays.
 */

export type Vec = number[];

export function assertSameDim(a: readonly number[], b: readonly number[]): void {
  if (a.length !== b.length)
    throw new Error(`Dim mismatch: ${a.length} vs ${b.length}`);
}

export function sub(a: readonly number[], b: readonly number[]): Vec {
  assertSameDim(a, b);
  return a.map((v, i) => v - b[i]!);
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, x));
}

/** Sum of array elements */
export function sum(xs: readonly number[]): number {
  return xs.reduce((a, b) => a + b, 0);
}

export function mean(xs: readonly number[]): number {
  if (xs.length === 0) return 0;
  return sum(xs) / xs.length;
}

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/** Mean squared error between two equally sized vectors. */
export function mse(a: readonly number[], b: readonly number[]): number {
  assertSameDim(a, b);
  if (a.length === 0) return 0;
  let s = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i]! - b[i]!;
    s += d * d;
  }
  return s / a.length;
}

export function maxAbs(xs: readonly number[]): number {
  let m = 0;
  for (const x of xs) m = Math.max(m, Math.abs(x));
  return m;
}

/** Column `index` of a row-major list of vectors. */
export function column(rows: readonly (readonly number[])[], index: number): Vec {
  return rows.map((r) => r[index] ?? 0);
}
