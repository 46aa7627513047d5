import { describe, expect, it } from "vitest";

import { ModelConfigurationError, UnstableModelWarning } from "../src/errors";
import { StabilityAnalyzer } from "../src/stability/analyzer";
import { cabs, cdiv, cmul, complex, polyval } from "../src/stability/complex";
import { polynomialRoots } from "../src/stability/roots";

const quiet = new StabilityAnalyzer({ warn: false });

function sortedReal(coefficients: number[]): number[] {
  return polynomialRoots(coefficients)
    .map((r) => r.re)
    .sort((a, b) => a - b);
}

describe("Polynomial roots", () => {
  it("finds real roots", () => {
    const roots = sortedReal([1, -3, 2]);
    expect(roots[0]).toBeCloseTo(1, 9);
    expect(roots[1]).toBeCloseTo(2, 9);
  });

  it("finds a complex conjugate pair", () => {
    // z² + 0.25 → ±0.5i
    const roots = polynomialRoots([1, 0, 0.25]);
    expect(roots).toHaveLength(2);
    roots.forEach((r) => {
      expect(r.re).toBeCloseTo(0, 9);
      expect(Math.abs(r.im)).toBeCloseTo(0.5, 9);
    });
  });

  it("splits off exact zero roots and leading zeros", () => {
    const roots = sortedReal([0, 1, -0.5, 0]);
    expect(roots).toHaveLength(2);
    expect(roots[0]).toBe(0);
    expect(roots[1]).toBeCloseTo(0.5, 12);
  });

  it("has no roots for a constant", () => {
    expect(polynomialRoots([3])).toEqual([]);
  });

  it("rejects the zero polynomial", () => {
    expect(() => polynomialRoots([0, 0])).toThrow(ModelConfigurationError);
  });
});

describe("Complex helpers", () => {
  it("multiplies, divides and evaluates", () => {
    const i = complex(0, 1);
    expect(cmul(i, i)).toEqual({ re: -1, im: 0 });
    expect(cdiv(complex(1), i)).toEqual({ re: 0, im: -1 });
    expect(cabs(complex(3, 4))).toBe(5);
    expect(polyval([1, 0, 1], i)).toEqual({ re: 0, im: 0 });
  });
});

describe("StabilityAnalyzer", () => {
  it("declares stable when all poles have magnitude 0.5", () => {
    // (z − 0.5)(z + 0.5)
    const report = quiet.checkPolynomial([1, 0, -0.25]);
    expect(report.verdict).toBe("stable");
    expect(report.poles).toHaveLength(2);
    report.poles.forEach((p) => expect(p.magnitude).toBeCloseTo(0.5, 9));
    expect(report.maxMagnitude).toBeCloseTo(0.5, 9);
    expect(report.warnings).toEqual([]);
  });

  it("declares unstable with a pole at 1.2 and returns it", () => {
    const report = quiet.checkPolynomial([1, -1.7, 0.6]);
    expect(report.verdict).toBe("unstable");
    const magnitudes = report.poles.map((p) => p.magnitude).sort((a, b) => a - b);
    expect(magnitudes[0]).toBeCloseTo(0.5, 9);
    expect(magnitudes[1]).toBeCloseTo(1.2, 9);
    expect(report.warnings).toHaveLength(1);
    expect(report.warnings[0]).toBeInstanceOf(UnstableModelWarning);
    expect(report.warnings[0]?.maxMagnitude).toBeCloseTo(1.2, 9);
  });

  it("treats a pole on the unit circle as unstable", () => {
    expect(quiet.checkPolynomial([1, -1]).verdict).toBe("unstable");
  });

  it("applies a configurable stability margin", () => {
    const strict = new StabilityAnalyzer({ warn: false, margin: 0.6 });
    expect(strict.checkPolynomial([1, 0, -0.25]).verdict).toBe("unstable");
  });

  it("collects poles across channels", () => {
    const report = quiet.check({
      transferFunctions: () => [
        { channel: 0, numerator: [1, 0], denominator: [1, -0.5] },
        { channel: 1, numerator: [1, 0], denominator: [1, 0.9] },
      ],
    });
    expect(report.poles.map((p) => p.channel)).toEqual([0, 1]);
    expect(report.poles[1]?.re).toBeCloseTo(-0.9, 12);
    expect(report.verdict).toBe("stable");
  });
});
