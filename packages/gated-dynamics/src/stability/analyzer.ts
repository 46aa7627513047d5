/**
 * StabilityAnalyzer: advisory z-domain check of a trained inverse model.
 *
 * A channel is stable iff every pole of its transfer function lies strictly
 * inside the unit circle (|p| < 1 − margin). The full pole list is always
 * returned. An unstable verdict is reported, logged and never thrown.
 */

import { UnstableModelWarning } from "../errors";
import type { TransferFunction } from "../model/inverse";
import type { RootOptions } from "./roots";
import { defaultRootOptions, polynomialRoots } from "./roots";
import { cabs } from "./complex";

export interface StabilityConfig extends RootOptions {
  /** Poles must satisfy |p| < 1 − margin */
  margin: number;
  /** console.warn on unstable verdicts */
  warn: boolean;
}

export const defaultStabilityConfig: StabilityConfig = {
  ...defaultRootOptions,
  margin: 0,
  warn: true,
};

export interface Pole {
  channel: number;
  re: number;
  im: number;
  magnitude: number;
}

export type StabilityVerdict = "stable" | "unstable";

export interface StabilityReport {
  verdict: StabilityVerdict;
  poles: Pole[];
  /** Largest pole magnitude (0 with no poles) */
  maxMagnitude: number;
  warnings: UnstableModelWarning[];
}

/** Anything exposing per-channel discrete transfer functions. */
export interface TransferFunctionSource {
  transferFunctions(): TransferFunction[];
}

export class StabilityAnalyzer {
  readonly cfg: StabilityConfig;

  constructor(config?: Partial<StabilityConfig>) {
    this.cfg = { ...defaultStabilityConfig, ...(config ?? {}) };
  }

  check(model: TransferFunctionSource): StabilityReport {
    return this.report(model.transferFunctions().flatMap((tf) => this.polesOf(tf)));
  }

  /** Check a single denominator given in descending powers of z. */
  checkPolynomial(denominator: readonly number[]): StabilityReport {
    return this.report(this.polesOf({ channel: 0, numerator: [1], denominator: [...denominator] }));
  }

  polesOf(transfer: TransferFunction): Pole[] {
    return polynomialRoots(transfer.denominator, this.cfg).map((p) => ({
      channel: transfer.channel,
      re: p.re,
      im: p.im,
      magnitude: cabs(p),
    }));
  }

  private report(poles: Pole[]): StabilityReport {
    const maxMagnitude = poles.reduce((m, p) => Math.max(m, p.magnitude), 0);
    const stable = poles.every((p) => p.magnitude < 1 - this.cfg.margin);
    const warnings = stable ? [] : [new UnstableModelWarning(maxMagnitude)];
    if (!stable && this.cfg.warn) {
      console.warn(`[stability] ${warnings[0]?.message ?? "unstable"}`);
    }
    return { verdict: stable ? "stable" : "unstable", poles, maxMagnitude, warnings };
  }
}
