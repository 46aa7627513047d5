/**
 * Method A corrections: constant bias and polynomial terms.
 *
 *   bias:       f(δ) = δ + c
 *   quadratic:  f(δ) = δ + a·δ²
 *   cubic:      f(δ) = δ + a·δ³
 *
 * The quadratic term is even-symmetric, so it cannot represent behaviour
 * that differs between positive and negative δ; cubic can.
 */

import { assertSameDim, mean } from "../vec";

export type PolynomialOrder = 2 | 3;

export type Correction =
  | { family: "none" }
  | { family: "bias"; c: number }
  | { family: "quadratic" | "cubic"; a: number };

export function orderOf(family: "quadratic" | "cubic"): PolynomialOrder {
  return family === "quadratic" ? 2 : 3;
}

export function applyCorrection(correction: Correction, delta: number): number {
  switch (correction.family) {
    case "none":
      return delta;
    case "bias":
      return delta + correction.c;
    case "quadratic":
      return delta + correction.a * delta ** 2;
    case "cubic":
      return delta + correction.a * delta ** 3;
  }
}

/** Least-squares bias: the mean residual. */
export function fitBias(residuals: readonly number[]): number {
  return mean(residuals);
}

/**
 * Fit the single scalar `a` of f(δ) = δ + a·δ^k by regression of the
 * residual (target − δ) on δ^k.
 */
export function fitPolynomialCorrection(
  deltas: readonly number[],
  targets: readonly number[],
  order: PolynomialOrder
): number {
  assertSameDim(deltas, targets);
  let num = 0;
  let den = 0;
  for (let i = 0; i < deltas.length; i++) {
    const p = deltas[i]! ** order;
    num += p * (targets[i]! - deltas[i]!);
    den += p * p;
  }
  return den === 0 ? 0 : num / den;
}
