/**
 * Polynomial roots by Durand–Kerner (Weierstrass) iteration.
 */

import { ModelConfigurationError } from "../errors";
import type { Complex } from "./complex";
import { cabs, cdiv, cmul, complex, csub, polyval } from "./complex";

export interface RootOptions {
  maxIterations: number;
  tolerance: number;
}

export const defaultRootOptions: RootOptions = {
  maxIterations: 1000,
  tolerance: 1e-14,
};

/**
 * All complex roots of a polynomial given in descending powers,
 * e.g. [1, -1, 0.25] for z² − z + 0.25. Exact zero roots (trailing zero
 * coefficients) are split off before iterating.
 */
export function polynomialRoots(
  coefficients: readonly number[],
  options?: Partial<RootOptions>
): Complex[] {
  const { maxIterations, tolerance } = { ...defaultRootOptions, ...(options ?? {}) };

  let start = 0;
  while (start < coefficients.length && coefficients[start] === 0) start++;
  const trimmed = coefficients.slice(start);
  const lead = trimmed[0];
  if (lead === undefined) {
    throw new ModelConfigurationError("Polynomial has no non-zero coefficient");
  }
  if (!trimmed.every(Number.isFinite)) {
    throw new ModelConfigurationError("Polynomial coefficients must be finite");
  }

  let end = trimmed.length;
  while (end > 1 && trimmed[end - 1] === 0) end--;
  const zeroRoots = trimmed.length - end;
  const monic = trimmed.slice(0, end).map((c) => c / lead);
  const degree = monic.length - 1;

  const roots: Complex[] = [];
  if (degree === 1) {
    roots.push(complex(-monic[1]!));
  } else if (degree > 1) {
    // Standard starting points: powers of a non-real number off the unit circle
    const seed = complex(0.4, 0.9);
    let z: Complex[] = [complex(1)];
    for (let i = 1; i < degree; i++) z.push(cmul(z[i - 1]!, seed));
    z = z.map((p) => cmul(p, seed));

    for (let iter = 0; iter < maxIterations; iter++) {
      let delta = 0;
      const next = z.map((zi, i) => {
        let denom = complex(1);
        z.forEach((zj, j) => {
          if (j !== i) denom = cmul(denom, csub(zi, zj));
        });
        const step = cabs(denom) === 0 ? complex(0) : cdiv(polyval(monic, zi), denom);
        delta = Math.max(delta, cabs(step));
        return csub(zi, step);
      });
      z = next;
      if (delta < tolerance) break;
    }
    roots.push(...z);
  }

  for (let i = 0; i < zeroRoots; i++) roots.push(complex(0));
  return roots;
}
