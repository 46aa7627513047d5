/**
 * Membership functions: scalar → activation in [0, 1].
 */

import { ModelConfigurationError } from "../errors";
import { sigmoid } from "../vec";

export type MembershipFunction =
  | {
      kind: "triangular";
      /** Left foot */
      a: number;
      /** Peak */
      b: number;
      /** Right foot */
      c: number;
    }
  | { kind: "gaussian"; mean: number; sigma: number }
  | { kind: "sigmoid"; center: number; slope: number };

/**
 * Ordered collection of membership functions covering an operating domain.
 */
export interface FuzzySet {
  name: string;
  domain: [number, number];
  functions: MembershipFunction[];
  /** Rescale activations so they sum to 1 */
  normalized: boolean;
  /** Smallest usable raw total, and allowed drift of normalized output from 1 */
  tolerance: number;
}

export const defaultFuzzySetOptions = {
  normalized: false,
  tolerance: 1e-9,
};

/**
 * Evaluate a single membership function.
 *
 * A triangle with a == b (or b == c) is a shoulder: flat at 1 on that side of
 * the peak.
 */
export function evaluateMembership(fn: MembershipFunction, x: number): number {
  switch (fn.kind) {
    case "triangular": {
      const { a, b, c } = fn;
      if (x === b) return 1;
      if (x < b) {
        if (a === b) return 1;
        return x <= a ? 0 : (x - a) / (b - a);
      }
      if (b === c) return 1;
      return x >= c ? 0 : (c - x) / (c - b);
    }
    case "gaussian": {
      const z = (x - fn.mean) / fn.sigma;
      return Math.exp(-0.5 * z * z);
    }
    case "sigmoid":
      return sigmoid(fn.slope * (x - fn.center));
  }
}

export function validateMembership(fn: MembershipFunction): void {
  switch (fn.kind) {
    case "triangular":
      if (!(fn.a <= fn.b && fn.b <= fn.c) || fn.a === fn.c) {
        throw new ModelConfigurationError(
          `Triangular membership needs a <= b <= c with a < c (got ${fn.a}, ${fn.b}, ${fn.c})`
        );
      }
      return;
    case "gaussian":
      if (!(fn.sigma > 0)) {
        throw new ModelConfigurationError(`Gaussian sigma must be > 0 (got ${fn.sigma})`);
      }
      return;
    case "sigmoid":
      if (!Number.isFinite(fn.slope) || fn.slope === 0) {
        throw new ModelConfigurationError(`Sigmoid slope must be finite and non-zero`);
      }
      return;
  }
}

export function validateFuzzySet(set: FuzzySet): void {
  const [lo, hi] = set.domain;
  if (!(lo < hi)) {
    throw new ModelConfigurationError(
      `Fuzzy set "${set.name}" has an empty domain [${lo}, ${hi}]`
    );
  }
  if (set.functions.length === 0) {
    throw new ModelConfigurationError(`Fuzzy set "${set.name}" has no functions`);
  }
  if (!(set.tolerance > 0)) {
    throw new ModelConfigurationError(`Fuzzy set "${set.name}" tolerance must be > 0`);
  }
  set.functions.forEach(validateMembership);
}

/**
 * Evenly spaced triangles over the domain with shoulders at both ends.
 * Neighbouring triangles overlap so that activations sum to 1 everywhere.
 */
export function uniformTriangularSet(
  name: string,
  domain: [number, number],
  count: number,
  options: Partial<Pick<FuzzySet, "normalized" | "tolerance">> = {}
): FuzzySet {
  if (count < 2) {
    throw new ModelConfigurationError(`uniformTriangularSet needs count >= 2 (got ${count})`);
  }
  const [lo, hi] = domain;
  const step = (hi - lo) / (count - 1);
  const peaks = Array.from({ length: count }, (_, i) => lo + i * step);
  const functions: MembershipFunction[] = peaks.map((b, i) => ({
    kind: "triangular",
    a: i === 0 ? b : peaks[i - 1]!,
    b,
    c: i === count - 1 ? b : peaks[i + 1]!,
  }));
  return {
    name,
    domain,
    functions,
    ...defaultFuzzySetOptions,
    ...options,
  };
}
