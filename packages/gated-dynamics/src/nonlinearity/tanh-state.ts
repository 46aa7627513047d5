/**
 * TanhStateLearner: recurrent-state correction x_{k+1} = tanh(A·x_k + B·u_k + b)
 * learned with a two-phase freeze-then-train protocol.
 *
 *   UNTRAINED ──fitBase──▶ PHASE1_BASE ──refine──▶ PHASE2_REFINED (terminal)
 *
 * Phase 1 holds the coupling B at zero (its group is frozen) and fits A and b.
 * Refinement is only allowed once phase 1 has converged under the caller's
 * criterion; it freezes A and b for good and fits B alone.
 *
 * Training is teacher-forced: each step predicts the next observed state from
 * the current observed state.
 */

import * as tf from "@tensorflow/tfjs";
import Queue from "queue";
import { FrozenParameterViolation, ModelConfigurationError, PrematureRefinementError } from "../errors";
import { ParameterGroup, type ParameterSnapshot } from "../params/group";
import type { ConvergenceCriterion, TrainingReport } from "../training";
import { optimizerStep, runQueued, trainUntil } from "../training";
import type { Vec } from "../vec";

export type LearnerPhase = "UNTRAINED" | "PHASE1_BASE" | "PHASE2_REFINED";

export interface StateSequence {
  /** Observed states x_0 … x_T */
  states: Vec[];
  /** Inputs u_0 … u_{T-1} */
  inputs: Vec[];
}

export interface TanhStateConfig {
  stateDim: number;
  inputDim: number;
  learningRate: number;
  verbose: boolean;
  label: string;
}

export const defaultTanhStateConfig: TanhStateConfig = {
  stateDim: 1,
  inputDim: 1,
  learningRate: 0.05,
  verbose: false,
  label: "tanh-state",
};

export class TanhStateLearner {
  private readonly cfg: TanhStateConfig;
  private readonly base: ParameterGroup;
  private readonly coupling: ParameterGroup;
  private readonly queue: Queue;
  private optimizer: tf.Optimizer;

  private phase: LearnerPhase = "UNTRAINED";
  private baseConverged = false;
  private baseReport: TrainingReport | null = null;
  private refineReport: TrainingReport | null = null;

  constructor(config?: Partial<TanhStateConfig>, queue?: Queue) {
    this.cfg = { ...defaultTanhStateConfig, ...(config ?? {}) };
    const { stateDim: n, inputDim: m } = this.cfg;
    if (n < 1 || m < 1) {
      throw new ModelConfigurationError(`Tanh-state learner needs positive dims (got ${n}, ${m})`);
    }

    this.base = new ParameterGroup(`${this.cfg.label}/base`, {
      A: tf.zeros([n, n]),
      b: tf.zeros([n]),
    });
    this.coupling = new ParameterGroup(`${this.cfg.label}/coupling`, {
      B: tf.zeros([n, m]),
    });
    this.coupling.freeze();

    this.queue = queue ?? new Queue({ autostart: true, concurrency: 1 });
    this.optimizer = tf.train.adam(this.cfg.learningRate);
  }

  get state(): LearnerPhase {
    return this.phase;
  }

  get phase1Converged(): boolean {
    return this.baseConverged;
  }

  groups(): ParameterGroup[] {
    return [this.base, this.coupling];
  }

  /**
   * Phase 1: fit A and b with B held at zero.
   * May be called repeatedly until the criterion reports convergence.
   */
  async fitBase(
    sequences: readonly StateSequence[],
    criterion: ConvergenceCriterion
  ): Promise<TrainingReport> {
    if (this.phase === "PHASE2_REFINED") {
      throw new FrozenParameterViolation(this.base.name, "phase 1 parameters are frozen after refinement");
    }
    const batch = this.toBatch(sequences);
    this.phase = "PHASE1_BASE";

    try {
      const report = await runQueued(this.queue, () =>
        trainUntil(
          criterion,
          () => optimizerStep(this.optimizer, () => this.loss(batch), this.base.trainable()),
          `${this.cfg.label}:phase1`,
          this.cfg.verbose
        )
      );
      this.baseConverged = report.converged;
      this.baseReport = report;
      return report;
    } finally {
      disposeBatch(batch);
    }
  }

  /**
   * Phase 2: freeze A and b, unfreeze B, fit B.
   * Once refined, further calls return the stored report unchanged.
   */
  async refine(
    sequences: readonly StateSequence[],
    criterion: ConvergenceCriterion
  ): Promise<TrainingReport> {
    if (this.phase === "PHASE2_REFINED" && this.refineReport) {
      return this.refineReport;
    }
    if (this.phase === "UNTRAINED") {
      throw new PrematureRefinementError("UNTRAINED");
    }
    if (!this.baseConverged) {
      throw new PrematureRefinementError("PHASE1_BASE (not converged)");
    }

    const batch = this.toBatch(sequences);
    this.base.freeze();
    this.coupling.unfreeze();
    // Fresh moments for the new variable set
    this.optimizer.dispose();
    this.optimizer = tf.train.adam(this.cfg.learningRate);

    try {
      const report = await runQueued(this.queue, () =>
        trainUntil(
          criterion,
          () => optimizerStep(this.optimizer, () => this.loss(batch), this.coupling.trainable()),
          `${this.cfg.label}:phase2`,
          this.cfg.verbose
        )
      );
      this.refineReport = report;
      this.phase = "PHASE2_REFINED";
      this.coupling.freeze();
      return report;
    } finally {
      disposeBatch(batch);
    }
  }

  /** Mean squared one-step error over the sequences with current parameters. */
  evaluate(sequences: readonly StateSequence[]): number {
    const batch = this.toBatch(sequences);
    try {
      return tf.tidy(() => this.loss(batch).dataSync()[0] ?? Number.NaN);
    } finally {
      disposeBatch(batch);
    }
  }

  /** Differentiable single step on rank-1 tensors. */
  stepTensor(x: tf.Tensor1D, u: tf.Tensor1D): tf.Tensor1D {
    const n = this.cfg.stateDim;
    const m = this.cfg.inputDim;
    const pre = tf.add(
      tf.add(
        tf.matMul(this.base.get("A"), x.reshape([n, 1])),
        tf.matMul(this.coupling.get("B"), u.reshape([m, 1]))
      ),
      this.base.get("b").reshape([n, 1])
    );
    return tf.tanh(pre).reshape([n]) as tf.Tensor1D;
  }

  step(x: readonly number[], u: readonly number[]): Vec {
    return tf.tidy(() =>
      Array.from(this.stepTensor(tf.tensor1d([...x]), tf.tensor1d([...u])).dataSync())
    );
  }

  /** Free-running rollout from x0; returns x_0 … x_T. */
  rollout(x0: readonly number[], inputs: readonly Vec[]): Vec[] {
    const states: Vec[] = [[...x0]];
    let x: Vec = [...x0];
    for (const u of inputs) {
      x = this.step(x, u);
      states.push(x);
    }
    return states;
  }

  parameters(): { A: number[]; b: number[]; B: number[] } {
    return {
      A: this.base.read("A"),
      b: this.base.read("b"),
      B: this.coupling.read("B"),
    };
  }

  snapshot(): { phase: LearnerPhase; base: ParameterSnapshot; coupling: ParameterSnapshot; phase1: TrainingReport | null; phase2: TrainingReport | null } {
    return {
      phase: this.phase,
      base: this.base.snapshot(),
      coupling: this.coupling.snapshot(),
      phase1: this.baseReport,
      phase2: this.refineReport,
    };
  }

  dispose(): void {
    this.base.dispose();
    this.coupling.dispose();
    this.optimizer.dispose();
  }

  private loss(batch: Batch): tf.Scalar {
    const pre = tf.add(
      tf.add(
        tf.matMul(batch.x, this.base.get("A"), false, true),
        tf.matMul(batch.u, this.coupling.get("B"), false, true)
      ),
      this.base.get("b")
    );
    return tf.losses.meanSquaredError(batch.y, tf.tanh(pre)) as tf.Scalar;
  }

  private toBatch(sequences: readonly StateSequence[]): Batch {
    const xs: Vec[] = [];
    const us: Vec[] = [];
    const ys: Vec[] = [];
    for (const seq of sequences) {
      if (seq.states.length !== seq.inputs.length + 1) {
        throw new ModelConfigurationError(
          `State sequence needs ${seq.inputs.length + 1} states, got ${seq.states.length}`
        );
      }
      seq.inputs.forEach((u, k) => {
        xs.push(seq.states[k]!);
        us.push(u);
        ys.push(seq.states[k + 1]!);
      });
    }
    if (xs.length === 0) {
      throw new ModelConfigurationError("No transitions to train the tanh-state learner on");
    }
    return { x: tf.tensor2d(xs), u: tf.tensor2d(us), y: tf.tensor2d(ys) };
  }
}

interface Batch {
  x: tf.Tensor2D;
  u: tf.Tensor2D;
  y: tf.Tensor2D;
}

function disposeBatch(batch: Batch): void {
  batch.x.dispose();
  batch.u.dispose();
  batch.y.dispose();
}
