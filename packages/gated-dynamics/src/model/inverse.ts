/**
 * InverseModel: desired trajectory → control sequence.
 *
 * Per control channel c the pre-squash signal is an autoregressive recursion
 * driven by a dense feed-forward map of the desired motion:
 *
 *   v_{c,k} = Σ_{i=1..n} a_{c,i} · v_{c,k−i} + g_c(φ_k)
 *   φ_k     = [x*_{k+1}, (x*_{k+1} − x*_k) / Ts]
 *   u_{c,k} = lo + (hi − lo) · σ(v_{c,k})      (bounded channels)
 *           = v_{c,k}                           (unbounded channels)
 *
 * so each channel has the discrete transfer function
 *   V(z) / G(z) = z^n / (z^n − a_1 z^{n−1} − … − a_n)
 * whose poles the stability analyzer inspects.
 *
 * Training is bi-level: controls go through a frozen ForwardModel and the
 * reconstructed trajectory is compared with the target. Only inverse
 * parameters are handed to the optimizer.
 */

import * as tf from "@tensorflow/tfjs";
import Queue from "queue";
import { FrozenParameterViolation, ModelConfigurationError } from "../errors";
import { ParameterGroup, trainableVariables } from "../params/group";
import type { ParameterSnapshot } from "../params/group";
import type { ConvergenceCriterion, TrainingReport } from "../training";
import { optimizerStep, runQueued, trainUntil } from "../training";
import type { Episode } from "../types";
import { episodeStates } from "../types";
import type { Vec } from "../vec";
import type { ForwardModel } from "./forward";

export interface InverseModelConfig {
  /** Autoregressive order n per control channel */
  order: number;
  /** Per-channel [lo, hi] bounds; null leaves the channel unbounded */
  bounds: Array<[number, number] | null>;
  learningRate: number;
  verbose: boolean;
}

export const defaultInverseModelConfig: InverseModelConfig = {
  order: 2,
  bounds: [],
  learningRate: 0.01,
  verbose: false,
};

/** Discrete transfer function of one control channel, coefficients in descending powers of z. */
export interface TransferFunction {
  channel: number;
  numerator: number[];
  denominator: number[];
}

export class InverseModel {
  readonly cfg: InverseModelConfig;
  readonly stateDim: number;
  readonly controlDim: number;
  readonly sampleTime: number;

  private readonly recursion: ParameterGroup;
  private readonly feedforward: ParameterGroup;
  private readonly queue: Queue;
  private readonly optimizer: tf.Optimizer;

  constructor(
    private readonly forward: ForwardModel,
    config?: Partial<InverseModelConfig>,
    queue?: Queue
  ) {
    this.cfg = { ...defaultInverseModelConfig, ...(config ?? {}) };
    this.stateDim = forward.cfg.stateDim;
    this.controlDim = forward.cfg.controlDim;
    this.sampleTime = forward.cfg.sampleTime;

    const { order, bounds } = this.cfg;
    if (!Number.isInteger(order) || order < 0) {
      throw new ModelConfigurationError(`Inverse model order must be an integer >= 0 (got ${order})`);
    }
    if (this.controlDim < 1) {
      throw new ModelConfigurationError("Inverse model needs at least one control channel");
    }
    if (bounds.length > this.controlDim) {
      throw new ModelConfigurationError(
        `${bounds.length} control bounds given for ${this.controlDim} channels`
      );
    }
    for (const b of bounds) {
      if (b && !(b[0] < b[1])) {
        throw new ModelConfigurationError(`Control bound [${b[0]}, ${b[1]}] is empty`);
      }
    }

    this.recursion = new ParameterGroup("inverse/recursion", {
      a: tf.zeros([this.controlDim, Math.max(order, 1)]),
    });
    this.feedforward = new ParameterGroup("inverse/feedforward", {
      W: tf.zeros([this.controlDim, 2 * this.stateDim]),
      c: tf.zeros([this.controlDim]),
    });

    this.queue = queue ?? new Queue({ autostart: true, concurrency: 1 });
    this.optimizer = tf.train.adam(this.cfg.learningRate);
  }

  // --------------------------------------------------------------------------
  // Prediction
  // --------------------------------------------------------------------------

  /**
   * Controls u_0 … u_{N−1} that should carry the system from
   * `initialCondition` along `target` (desired states x*_1 … x*_N).
   */
  predict(target: readonly Vec[], initialCondition: readonly number[]): Vec[] {
    let controls: Vec[] = [];
    tf.tidy(() => {
      controls = this.predictTensor([initialCondition, ...target]).map((u) =>
        Array.from(u.dataSync())
      );
    });
    return controls;
  }

  /** Differentiable controls for a desired trajectory x*_0 … x*_N. */
  predictTensor(desired: readonly (readonly number[])[]): tf.Tensor1D[] {
    const m = this.controlDim;
    const n = this.stateDim;
    const order = this.cfg.order;
    const a = this.recursion.get("a");
    const W = this.feedforward.get("W");
    const c = this.feedforward.get("c");

    const vs: tf.Tensor1D[] = [];
    const us: tf.Tensor1D[] = [];
    for (let k = 0; k + 1 < desired.length; k++) {
      const x = desired[k]!;
      const next = desired[k + 1]!;
      if (x.length !== n || next.length !== n) {
        throw new ModelConfigurationError(`Desired state at step ${k} has wrong dimension (expected ${n})`);
      }
      const phi = tf.tensor2d([[...next, ...next.map((v, i) => (v - x[i]!) / this.sampleTime)]]);

      let v: tf.Tensor1D = tf.add(tf.matMul(phi, W, false, true).reshape([m]), c);
      for (let i = 1; i <= order && k - i >= 0; i++) {
        const coeff = a.slice([0, i - 1], [m, 1]).reshape([m]);
        v = tf.add(v, tf.mul(coeff, vs[k - i]!));
      }
      vs.push(v);
      us.push(this.squash(v));
    }
    return us;
  }

  // --------------------------------------------------------------------------
  // Training
  // --------------------------------------------------------------------------

  /**
   * Minimize the MSE between each episode's states and the forward model's
   * reconstruction from the predicted controls. The forward model must be
   * frozen first.
   */
  async train(episodes: readonly Episode[], criterion: ConvergenceCriterion): Promise<TrainingReport> {
    if (!this.forward.isFrozen()) {
      throw new ModelConfigurationError(
        "Inverse training needs a converged forward model; call forward.freeze() first"
      );
    }
    if (!this.forward.isConverged()) {
      throw new ModelConfigurationError(
        "Inverse training needs a converged forward model; its last training stage did not converge"
      );
    }
    const varList = trainableVariables(this.groups());
    const leaked = varList.find((v) => this.forward.owns(v));
    if (leaked) {
      throw new FrozenParameterViolation(leaked.name, "forward parameters cannot be trained by the inverse model");
    }

    const targets = this.targetsOf(episodes);

    return runQueued(this.queue, () =>
      trainUntil(
        criterion,
        () => optimizerStep(this.optimizer, () => this.reconstructionLoss(targets), varList),
        "inverse",
        this.cfg.verbose
      )
    );
  }

  /** Reconstruction MSE with current parameters. */
  evaluate(episodes: readonly Episode[]): number {
    const targets = this.targetsOf(episodes);
    return tf.tidy(() => this.reconstructionLoss(targets).dataSync()[0] ?? Number.NaN);
  }

  // --------------------------------------------------------------------------
  // Structure
  // --------------------------------------------------------------------------

  transferFunctions(): TransferFunction[] {
    const a = this.recursionCoefficients();
    return a.map((coeffs, channel) => ({
      channel,
      numerator: [1, ...coeffs.map(() => 0)],
      denominator: [1, ...coeffs.map((v) => -v)],
    }));
  }

  /** a_{c,1} … a_{c,n} per control channel. */
  recursionCoefficients(): number[][] {
    const flat = this.recursion.read("a");
    const width = Math.max(this.cfg.order, 1);
    return Array.from({ length: this.controlDim }, (_, c) =>
      flat.slice(c * width, c * width + this.cfg.order)
    );
  }

  /** Overwrite one channel's recursion coefficients a_1 … a_n. */
  setRecursion(channel: number, coefficients: readonly number[]): void {
    if (channel < 0 || channel >= this.controlDim) {
      throw new RangeError(`Control channel ${channel} out of range (${this.controlDim})`);
    }
    if (coefficients.length !== this.cfg.order) {
      throw new ModelConfigurationError(
        `Expected ${this.cfg.order} recursion coefficients, got ${coefficients.length}`
      );
    }
    const width = Math.max(this.cfg.order, 1);
    const flat = this.recursion.read("a");
    coefficients.forEach((v, i) => {
      flat[channel * width + i] = v;
    });
    this.recursion.assignValues("a", flat);
  }

  freeze(): void {
    for (const g of this.groups()) g.freeze();
  }

  groups(): ParameterGroup[] {
    return [this.recursion, this.feedforward];
  }

  exportParameters(): Record<string, ParameterSnapshot> {
    const out: Record<string, ParameterSnapshot> = {};
    for (const g of this.groups()) out[g.name] = g.snapshot();
    return out;
  }

  dispose(): void {
    for (const g of this.groups()) g.dispose();
    this.optimizer.dispose();
  }

  private squash(v: tf.Tensor1D): tf.Tensor1D {
    const bounds = this.cfg.bounds;
    if (bounds.every((b) => !b)) return v;
    const lo = Array.from({ length: this.controlDim }, (_, i) => bounds[i]?.[0] ?? 0);
    const span = Array.from({ length: this.controlDim }, (_, i) => {
      const b = bounds[i];
      return b ? b[1] - b[0] : 0;
    });
    const mask = tf.tensor1d(Array.from({ length: this.controlDim }, (_, i) => (bounds[i] ? 1 : 0)));
    const squashed = tf.add(tf.tensor1d(lo), tf.mul(tf.tensor1d(span), tf.sigmoid(v)));
    return tf.add(tf.mul(mask, squashed), tf.mul(tf.sub(1, mask), v));
  }

  private targetsOf(episodes: readonly Episode[]): Vec[][] {
    const targets = episodes.map(episodeStates).filter((states) => states.length >= 2);
    if (targets.length === 0) {
      throw new ModelConfigurationError("Inverse model needs episodes with at least 2 steps");
    }
    return targets;
  }

  private reconstructionLoss(targets: readonly Vec[][]): tf.Scalar {
    const losses = targets.map((states) => {
      const controls = this.predictTensor(states);
      const rolled = this.forward.rollout(controls, states[0]!);
      return tf.losses.meanSquaredError(
        tf.tensor2d(states.slice(1)),
        tf.stack(rolled.slice(1))
      ) as tf.Scalar;
    });
    return tf.div(tf.addN(losses), losses.length);
  }
}
