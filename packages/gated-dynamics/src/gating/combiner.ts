/**
 * SuperpositionCombiner: Σ sign_i · φ_i(x) · LocalModel_i(inputs).
 *
 * The gate list is open and ordered; new physical effects are added as new
 * gates without touching the combiner. Terms are summed per output channel
 * with no renormalization across gates.
 */

import * as tf from "@tensorflow/tfjs";
import type { StepContext } from "../local/context";
import type { LocalModel } from "../local/local-model";
import type { Vec } from "../vec";
import type { Gate } from "./gate";

export interface CombineOptions {
  /** Number of output channels (e.g. 1 for ax, 3 for ax/ay/ṙ) */
  outputDim: number;
  /** Correction applied to a local model's raw output before gating */
  correct?: (model: LocalModel, output: tf.Scalar) => tf.Scalar;
}

export interface TermTensor {
  gate: Gate;
  /** Gate activation actually used (0 for a skipped gate) */
  phi: number | tf.Scalar;
  contribution: tf.Scalar;
}

export interface CombinedTensors {
  total: tf.Tensor1D;
  terms: TermTensor[];
}

export interface TermContribution {
  label: string;
  model: string;
  channel: number;
  phi: number;
  contribution: number;
}

export interface SuperpositionResult {
  total: Vec;
  terms: TermContribution[];
}

/**
 * Differentiable superposition. A gate at exactly 0 contributes an exact 0:
 * fixed gates are skipped, learned gates are masked, so degenerate model
 * outputs never leak NaN.
 */
export function combineTensors(
  gates: readonly Gate[],
  ctx: StepContext,
  options: CombineOptions
): CombinedTensors {
  const channels: tf.Scalar[][] = Array.from({ length: options.outputDim }, () => []);
  const terms: TermTensor[] = [];

  for (const gate of gates) {
    const bucket = channels[gate.channel];
    if (!bucket) {
      throw new RangeError(
        `Gate ${gate.label} targets channel ${gate.channel} of ${options.outputDim}`
      );
    }

    const phi = gate.evaluate(ctx);
    if (typeof phi === "number" && phi === 0) {
      terms.push({ gate, phi: 0, contribution: tf.scalar(0) });
      continue;
    }

    const raw = gate.model.evaluate(ctx);
    const y = options.correct ? options.correct(gate.model, raw) : raw;
    const contribution: tf.Scalar =
      typeof phi === "number" ? tf.mul(y, phi * gate.sign) : maskedProduct(y, phi, gate.sign);

    bucket.push(contribution);
    terms.push({ gate, phi, contribution });
  }

  const total = tf.stack(
    channels.map((bucket) => (bucket.length === 0 ? tf.scalar(0) : tf.addN(bucket)))
  ) as tf.Tensor1D;

  return { total, terms };
}

/** sign · φ · y, forced to 0 wherever φ is exactly 0. */
function maskedProduct(y: tf.Scalar, phi: tf.Scalar, sign: 1 | -1): tf.Scalar {
  const product: tf.Scalar = tf.mul(tf.mul(y, phi), sign);
  return tf.where(tf.equal(phi, 0), tf.zerosLike(product), product);
}

/**
 * Plain-number superposition for inspection; same arithmetic as
 * `combineTensors`.
 */
export function combine(
  gates: readonly Gate[],
  ctx: StepContext,
  options: CombineOptions
): SuperpositionResult {
  let result: SuperpositionResult = { total: [], terms: [] };

  tf.tidy(() => {
    const { total, terms } = combineTensors(gates, ctx, options);
    result = {
      total: Array.from(total.dataSync()),
      terms: terms.map(({ gate, phi, contribution }) => ({
        label: gate.label,
        model: gate.model.id,
        channel: gate.channel,
        phi: typeof phi === "number" ? phi : phi.dataSync()[0] ?? 0,
        contribution: contribution.dataSync()[0] ?? 0,
      })),
    };
  });

  return result;
}

export class SuperpositionCombiner {
  constructor(private readonly options: CombineOptions) {}

  combine(gates: readonly Gate[], ctx: StepContext): SuperpositionResult {
    return combine(gates, ctx, this.options);
  }

  combineTensors(gates: readonly Gate[], ctx: StepContext): CombinedTensors {
    return combineTensors(gates, ctx, this.options);
  }
}
