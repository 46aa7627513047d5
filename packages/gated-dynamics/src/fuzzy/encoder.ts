/**
 * MembershipEncoder: operating variable → fuzzy activations.
 *
 * Inputs outside the declared domain are clamped to its boundary, so the
 * encoder is total over the reals. With `normalized` set, activations are
 * rescaled to a partition of unity; a raw total within the set's tolerance
 * of zero cannot be rescaled and is degenerate.
 */

import { DegenerateEncodingError } from "../errors";
import { clamp, sum } from "../vec";
import type { FuzzySet } from "./membership";
import { evaluateMembership } from "./membership";

export function encode(x: number, fuzzySet: FuzzySet): number[] {
  if (Number.isNaN(x)) {
    throw new DegenerateEncodingError(fuzzySet.name, x);
  }
  const [lo, hi] = fuzzySet.domain;
  const xc = clamp(x, lo, hi);
  const raw = fuzzySet.functions.map((fn) => evaluateMembership(fn, xc));

  if (!fuzzySet.normalized) return raw;

  const total = sum(raw);
  if (total <= fuzzySet.tolerance) {
    throw new DegenerateEncodingError(fuzzySet.name, x);
  }
  const out = raw.map((v) => v / total);
  if (!isPartitionOfUnity(out, fuzzySet.tolerance)) {
    throw new DegenerateEncodingError(fuzzySet.name, x);
  }
  return out;
}

/**
 * Check the partition-of-unity invariant for a normalized encoding.
 */
export function isPartitionOfUnity(activations: readonly number[], tolerance: number): boolean {
  return Math.abs(sum(activations) - 1) <= tolerance;
}

/**
 * Stateful wrapper holding one fuzzy set; convenient where an encoder is
 * passed around as a collaborator.
 */
export class MembershipEncoder {
  readonly fuzzySet: FuzzySet;

  constructor(fuzzySet: FuzzySet) {
    this.fuzzySet = fuzzySet;
  }

  get size(): number {
    return this.fuzzySet.functions.length;
  }

  encode(x: number): number[] {
    return encode(x, this.fuzzySet);
  }
}
