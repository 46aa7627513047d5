/**
 * ForwardModel: control sequence + initial state → predicted trajectory.
 *
 * Per time step:
 *   operating variable → MembershipEncoder → activations
 *   → SuperpositionCombiner over the gated local models (with per-model
 *     bias/polynomial corrections)
 *   → tanh-state channel corrections (hidden state carried across steps,
 *     reset at every episode start)
 *   → optional friction-ellipse saturation
 *   → integrator → next state
 *
 * Training is staged and each stage is a barrier:
 *   1. train():           local models + learned gates, teacher-forced next-state MSE
 *   2. fitNonlinearity(): method A by least squares, then tanh-state phase 1/2
 *   3. freeze():          every forward group frozen; the inverse model may
 *                         now train against this model
 */

import * as tf from "@tensorflow/tfjs";
import Queue from "queue";
import { FrozenParameterViolation, ModelConfigurationError } from "../errors";
import { encode } from "../fuzzy/encoder";
import type { FuzzySet } from "../fuzzy/membership";
import { validateFuzzySet } from "../fuzzy/membership";
import { combineTensors } from "../gating/combiner";
import type { TermContribution, TermTensor } from "../gating/combiner";
import type { Gate, GateSpec } from "../gating/gate";
import { createGate } from "../gating/gate";
import { LocalModelBank } from "../local/bank";
import { SignalHistory } from "../local/context";
import type { StepContext } from "../local/context";
import type { LocalModel, LocalModelSpec } from "../local/local-model";
import { leastSquares } from "../nonlinearity/least-squares";
import { orderOf } from "../nonlinearity/polynomial";
import { TanhStateLearner } from "../nonlinearity/tanh-state";
import type { StateSequence } from "../nonlinearity/tanh-state";
import { ParameterGroup, trainableVariables } from "../params/group";
import type { ParameterSnapshot } from "../params/group";
import type { ConvergenceCriterion, TrainingReport } from "../training";
import { optimizerStep, runQueued, trainUntil } from "../training";
import type { Episode, SignalRef } from "../types";
import type { Vec } from "../vec";
import type { FrictionEllipseConfig, IntegratorKind } from "./vehicle";
import {
  effectiveFriction,
  integrateTensor,
  saturateFrictionEllipse,
  saturateFrictionEllipseTensor,
} from "./vehicle";

// ============================================================================
// Configuration
// ============================================================================

export interface ForwardModelConfig {
  /** Sample time Ts in seconds */
  sampleTime: number;
  stateDim: number;
  controlDim: number;
  /** Scalar scheduling variable fed to the fuzzy encoder */
  operatingVariable: SignalRef;
  fuzzySet: FuzzySet;
  localModels: LocalModelSpec[];
  gates: GateSpec[];
  integrator: IntegratorKind;
  frictionEllipse?: FrictionEllipseConfig;
  learningRate: number;
  verbose: boolean;
}

export type ForwardModelConfigInput = Omit<
  ForwardModelConfig,
  "integrator" | "learningRate" | "verbose"
> &
  Partial<Pick<ForwardModelConfig, "integrator" | "learningRate" | "verbose">>;

export const defaultForwardModelConfig: Pick<
  ForwardModelConfig,
  "integrator" | "learningRate" | "verbose"
> = {
  integrator: "euler",
  learningRate: 0.02,
  verbose: false,
};

export interface NonlinearityCriteria {
  phase1: ConvergenceCriterion;
  phase2: ConvergenceCriterion;
}

export interface NonlinearityReport {
  /** Fitted bias / polynomial coefficient per local model id */
  coefficients: Record<string, number>;
  /** Tanh-state learner reports per local model id */
  tanhState: Record<string, { phase1: TrainingReport; phase2: TrainingReport | null }>;
  /** Samples left out because the friction ellipse was saturating */
  saturatedSamples: number;
}

export interface StepDiagnostics {
  step: number;
  operatingValue: number;
  activations: number[];
  terms: TermContribution[];
  /** Channel accelerations after corrections and saturation */
  acceleration: number[];
  /** μ_eff when the friction ellipse is configured */
  mu: number | null;
}

interface StepOptions {
  corrections: boolean;
  tanhState: boolean;
  saturation: boolean;
}

interface StepOutput {
  accel: tf.Tensor1D;
  ctx: StepContext;
  terms: TermTensor[];
}

const ALL_STAGES: StepOptions = { corrections: true, tanhState: true, saturation: true };

// ============================================================================
// ForwardModel
// ============================================================================

export class ForwardModel {
  readonly cfg: ForwardModelConfig;
  readonly bank: LocalModelBank;
  readonly gates: readonly Gate[];

  private readonly corrections: ParameterGroup;
  private readonly tanhLearners = new Map<string, { learner: TanhStateLearner; channel: number }>();
  private readonly queue: Queue;
  private readonly optimizer: tf.Optimizer;
  private frozen = false;
  /** Set by a converged stage-1 report or by importing exported parameters */
  private converged = false;

  constructor(config: ForwardModelConfigInput, queue?: Queue) {
    this.cfg = { ...defaultForwardModelConfig, ...config };
    this.validate();

    this.bank = LocalModelBank.fromSpecs(this.cfg.localModels);
    const activationCount = this.cfg.fuzzySet.functions.length;
    this.gates = this.cfg.gates.map((g) => createGate(g, this.bank, activationCount));

    this.corrections = new ParameterGroup("forward/corrections", {
      coef: tf.zeros([this.bank.size]),
    });

    this.queue = queue ?? new Queue({ autostart: true, concurrency: 1 });
    this.optimizer = tf.train.adam(this.cfg.learningRate);

    for (const model of this.bank.all()) {
      if (model.nonlinearity !== "tanh-state") continue;
      const channel = this.channelOf(model.id);
      this.tanhLearners.set(model.id, {
        channel,
        learner: new TanhStateLearner(
          { stateDim: 1, inputDim: 1, label: `tanh/${model.id}`, verbose: this.cfg.verbose },
          this.queue
        ),
      });
    }
  }

  // --------------------------------------------------------------------------
  // Prediction
  // --------------------------------------------------------------------------

  /**
   * Predict the trajectory produced by `controls` from `initialState`.
   * N controls give N + 1 states; the first is the initial state.
   */
  predict(controls: readonly Vec[], initialState: readonly number[]): Vec[] {
    let states: Vec[] = [];
    tf.tidy(() => {
      states = this.rollout(controls.map((u) => tf.tensor1d([...u])), initialState).map((s) =>
        Array.from(s.dataSync())
      );
    });
    return states;
  }

  /**
   * Differentiable rollout. Returns rank-1 state tensors x_0 … x_N; the caller
   * owns them (call inside `tf.tidy` or an optimizer closure).
   */
  rollout(controls: readonly tf.Tensor1D[], initialState: readonly number[]): tf.Tensor1D[] {
    this.assertDims(initialState.length, this.cfg.stateDim, "initial state");
    const history = new SignalHistory();
    history.pushStateValues(initialState);
    const hidden = new Map<string, tf.Tensor1D>();
    const states: tf.Tensor1D[] = [history.currentState()];

    controls.forEach((u, k) => {
      history.pushControlTensor(u);
      const { accel } = this.stepAt(history, k, hidden, ALL_STAGES);
      const next = integrateTensor(this.cfg.integrator, history.currentState(), accel, this.cfg.sampleTime);
      history.pushStateTensor(next);
      states.push(next);
    });

    return states;
  }

  /**
   * Per-step activations, gated contributions and μ_eff along a rollout
   * (the ax/ay/μ diagnostic outputs).
   */
  diagnostics(controls: readonly Vec[], initialState: readonly number[]): StepDiagnostics[] {
    const out: StepDiagnostics[] = [];
    tf.tidy(() => {
      const history = new SignalHistory();
      history.pushStateValues(initialState);
      const hidden = new Map<string, tf.Tensor1D>();

      controls.forEach((u, k) => {
        history.pushControlValues(u);
        const { accel, ctx, terms } = this.stepAt(history, k, hidden, ALL_STAGES);
        const fe = this.cfg.frictionEllipse;
        out.push({
          step: k,
          operatingValue: ctx.value(this.cfg.operatingVariable),
          activations: [...ctx.activations],
          terms: terms.map(({ gate, phi, contribution }) => ({
            label: gate.label,
            model: gate.model.id,
            channel: gate.channel,
            phi: typeof phi === "number" ? phi : phi.dataSync()[0] ?? 0,
            contribution: contribution.dataSync()[0] ?? 0,
          })),
          acceleration: Array.from(accel.dataSync()),
          mu: fe ? effectiveFriction(ctx.value(fe.speed), ctx.value(fe.brake), fe) : null,
        });
        history.pushStateTensor(
          integrateTensor(this.cfg.integrator, history.currentState(), accel, this.cfg.sampleTime)
        );
      });
    });
    return out;
  }

  // --------------------------------------------------------------------------
  // Training stages
  // --------------------------------------------------------------------------

  /**
   * Stage 1: fit local models and learned gates by teacher-forced next-state
   * MSE until the criterion holds.
   */
  async train(episodes: readonly Episode[], criterion: ConvergenceCriterion): Promise<TrainingReport> {
    this.assertMutable();
    const usable = this.usableEpisodes(episodes);
    const varList = trainableVariables([
      ...this.bank.groups(),
      ...this.gates.flatMap((g) => (g.params ? [g.params] : [])),
    ]);

    const report = await runQueued(this.queue, () =>
      trainUntil(
        criterion,
        () => optimizerStep(this.optimizer, () => this.teacherForcedLoss(usable), varList),
        "forward",
        this.cfg.verbose
      )
    );
    this.converged = report.converged;
    return report;
  }

  /** Teacher-forced next-state MSE over the episodes with current parameters. */
  evaluate(episodes: readonly Episode[]): number {
    const usable = this.usableEpisodes(episodes);
    return tf.tidy(() => this.teacherForcedLoss(usable).dataSync()[0] ?? Number.NaN);
  }

  /**
   * Stage 2: fit bias/quadratic/cubic corrections by least squares against
   * the acceleration residual, then train the tanh-state learners on what
   * remains (phase 1, and phase 2 once phase 1 has converged).
   */
  async fitNonlinearity(
    episodes: readonly Episode[],
    criteria: NonlinearityCriteria
  ): Promise<NonlinearityReport> {
    this.assertMutable();
    const usable = this.usableEpisodes(episodes);
    const n = this.bank.size;
    const design: number[][] = [];
    const targets: number[] = [];
    const rowsByEpisode: Array<Array<{ row: number[]; target: number; channel: number; raw: number[] }>> = [];
    let saturatedSamples = 0;

    tf.tidy(() => {
      for (const episode of usable) {
        const history = this.observedHistory(episode);
        const rows: (typeof rowsByEpisode)[number] = [];
        for (let k = 0; k + 1 < episode.steps.length; k++) {
          const { accel, terms, ctx } = this.stepAt(history, k, new Map(), {
            corrections: false,
            tanhState: false,
            saturation: false,
          });
          const base = Array.from(accel.dataSync());
          const observed = this.observedAcceleration(episode, k);
          const raw = this.bank.all().map((m) => m.evaluate(ctx).dataSync()[0] ?? 0);
          const saturated = this.isSaturated(base, ctx);
          if (saturated) saturatedSamples++;

          for (let c = 0; c < this.cfg.stateDim; c++) {
            const row = new Array<number>(n).fill(0);
            for (const term of terms) {
              if (term.gate.channel !== c) continue;
              const i = this.bank.indexOf(term.gate.model.id);
              const phi = typeof term.phi === "number" ? term.phi : term.phi.dataSync()[0] ?? 0;
              const y = raw[i]!;
              const family = term.gate.model.nonlinearity;
              const basis =
                family === "bias"
                  ? 1
                  : family === "quadratic" || family === "cubic"
                    ? y ** orderOf(family)
                    : 0;
              row[i]! += term.gate.sign * phi * basis;
            }
            const target = observed[c]! - base[c]!;
            rows.push({ row, target, channel: c, raw });
            if (!saturated) {
              design.push(row);
              targets.push(target);
            }
          }
        }
        rowsByEpisode.push(rows);
      }
    });

    const coef = design.length > 0 ? leastSquares(design, targets) : new Array<number>(n).fill(0);
    this.corrections.assignValues("coef", coef);

    const coefficients: Record<string, number> = {};
    this.bank.all().forEach((m, i) => {
      if (m.nonlinearity === "bias" || m.nonlinearity === "quadratic" || m.nonlinearity === "cubic") {
        coefficients[m.id] = coef[i]!;
      }
    });

    const tanhState: NonlinearityReport["tanhState"] = {};
    for (const [id, { learner, channel }] of this.tanhLearners) {
      const i = this.bank.indexOf(id);
      const sequences: StateSequence[] = rowsByEpisode.map((rows) => {
        const own = rows.filter((r) => r.channel === channel);
        const residual = own.map((r) => r.target - r.row.reduce((s, v, j) => s + v * coef[j]!, 0));
        return {
          states: residual.map((r) => [r]),
          inputs: own.slice(0, -1).map((r) => [r.raw[i]!]),
        };
      });
      const phase1 = await learner.fitBase(sequences.filter((s) => s.inputs.length > 0), criteria.phase1);
      const phase2 = phase1.converged
        ? await learner.refine(sequences.filter((s) => s.inputs.length > 0), criteria.phase2)
        : null;
      tanhState[id] = { phase1, phase2 };
    }

    if (this.cfg.verbose) {
      console.log(`[forward] corrections ${JSON.stringify(coefficients)}`);
    }

    return { coefficients, tanhState, saturatedSamples };
  }

  /**
   * Stage 3: freeze every forward parameter group. The model is read-only
   * from here on; it counts as converged only if stage 1 converged or its
   * parameters were imported.
   */
  freeze(): void {
    for (const group of this.parameterGroups()) group.freeze();
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /** Frozen after a converged stage 1 (or an import): ready for inverse training. */
  isConverged(): boolean {
    return this.frozen && this.converged;
  }

  parameterGroups(): ParameterGroup[] {
    return [
      ...this.bank.groups(),
      ...this.gates.flatMap((g) => (g.params ? [g.params] : [])),
      this.corrections,
      ...Array.from(this.tanhLearners.values()).flatMap(({ learner }) => learner.groups()),
    ];
  }

  /** True if `variable` belongs to any forward parameter group. */
  owns(variable: tf.Variable): boolean {
    return this.parameterGroups().some((g) => g.owns(variable));
  }

  tanhLearner(modelId: string): TanhStateLearner | undefined {
    return this.tanhLearners.get(modelId)?.learner;
  }

  exportParameters(): Record<string, ParameterSnapshot> {
    const out: Record<string, ParameterSnapshot> = {};
    for (const g of this.parameterGroups()) out[g.name] = g.snapshot();
    return out;
  }

  /**
   * Restore parameters produced by `exportParameters()`. Groups missing from
   * `snapshots` keep their values; unknown group names are rejected.
   */
  importParameters(snapshots: Record<string, ParameterSnapshot>): void {
    this.assertMutable();
    const groups = new Map(this.parameterGroups().map((g) => [g.name, g]));
    for (const [name, snapshot] of Object.entries(snapshots)) {
      const group = groups.get(name);
      if (!group) {
        throw new ModelConfigurationError(`Unknown forward parameter group "${name}"`);
      }
      for (const [key, values] of Object.entries(snapshot)) group.assignValues(key, values);
    }
    this.converged = true;
  }

  dispose(): void {
    for (const g of this.parameterGroups()) g.dispose();
    this.optimizer.dispose();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private stepAt(
    history: SignalHistory,
    k: number,
    hidden: Map<string, tf.Tensor1D>,
    options: StepOptions
  ): StepOutput {
    const x = history.at(k, []).value(this.cfg.operatingVariable);
    const ctx = history.at(k, encode(x, this.cfg.fuzzySet));

    const { total, terms } = combineTensors(this.gates, ctx, {
      outputDim: this.cfg.stateDim,
      correct: options.corrections ? (model, y) => this.correct(model, y) : undefined,
    });

    let accel = total;
    if (options.tanhState && this.tanhLearners.size > 0) {
      const parts = tf.unstack(accel);
      for (const [id, { learner, channel }] of this.tanhLearners) {
        const h = hidden.get(id) ?? tf.tensor1d([0]);
        const current = parts[channel];
        if (!current) throw new RangeError(`Channel ${channel} out of range`);
        parts[channel] = tf.add(current, h.reshape([]));
        const y = this.bank.byId(id).evaluate(ctx).reshape([1]) as tf.Tensor1D;
        hidden.set(id, learner.stepTensor(h, y));
      }
      accel = tf.stack(parts) as tf.Tensor1D;
    }

    const fe = this.cfg.frictionEllipse;
    if (fe && options.saturation) {
      const mu = effectiveFriction(ctx.value(fe.speed), ctx.value(fe.brake), fe);
      accel = saturateFrictionEllipseTensor(accel, mu, fe);
    }

    return { accel, ctx, terms };
  }

  private correct(model: LocalModel, y: tf.Scalar): tf.Scalar {
    const family = model.nonlinearity;
    if (family !== "bias" && family !== "quadratic" && family !== "cubic") return y;
    const i = this.bank.indexOf(model.id);
    const c = this.corrections.get("coef").slice([i], [1]).reshape([]);
    if (family === "bias") return tf.add(y, c);
    return tf.add(y, tf.mul(c, tf.pow(y, orderOf(family))));
  }

  private teacherForcedLoss(episodes: readonly Episode[]): tf.Scalar {
    const losses = episodes.map((episode) => {
      const history = this.observedHistory(episode);
      const hidden = new Map<string, tf.Tensor1D>();
      const preds: tf.Tensor1D[] = [];
      const targets: Vec[] = [];
      for (let k = 0; k + 1 < episode.steps.length; k++) {
        const { accel } = this.stepAt(history, k, hidden, ALL_STAGES);
        const current = tf.tensor1d([...episode.steps[k]!.state]);
        preds.push(integrateTensor(this.cfg.integrator, current, accel, this.cfg.sampleTime));
        targets.push([...episode.steps[k + 1]!.state]);
      }
      return tf.losses.meanSquaredError(tf.tensor2d(targets), tf.stack(preds)) as tf.Scalar;
    });
    return tf.div(tf.addN(losses), losses.length);
  }

  private observedHistory(episode: Episode): SignalHistory {
    const history = new SignalHistory();
    for (const step of episode.steps) {
      history.pushStateValues(step.state);
      history.pushControlValues(step.control);
    }
    return history;
  }

  /** Acceleration that maps step k to step k+1 under the configured integrator. */
  private observedAcceleration(episode: Episode, k: number): number[] {
    const x = episode.steps[k]!.state;
    const next = episode.steps[k + 1]!.state;
    const ts = this.cfg.sampleTime;
    if (this.cfg.integrator === "euler") {
      return x.map((v, i) => (next[i]! - v) / ts);
    }
    const [vx = 0, vy = 0, r = 0] = x;
    const [vx1 = 0, vy1 = 0, r1 = 0] = next;
    return [(vx1 - vx) / ts, (vy1 - vy) / ts + r * vx, (r1 - r) / ts];
  }

  private isSaturated(accel: readonly number[], ctx: StepContext): boolean {
    const fe = this.cfg.frictionEllipse;
    if (!fe) return false;
    const mu = effectiveFriction(ctx.value(fe.speed), ctx.value(fe.brake), fe);
    return saturateFrictionEllipse(accel[fe.axChannel] ?? 0, accel[fe.ayChannel] ?? 0, mu, fe).eta > 1;
  }

  private usableEpisodes(episodes: readonly Episode[]): Episode[] {
    const usable = episodes.filter((e) => e.steps.length >= 2);
    if (usable.length === 0) {
      throw new ModelConfigurationError("Forward model needs episodes with at least 2 steps");
    }
    for (const e of usable) {
      const step = e.steps[0]!;
      this.assertDims(step.state.length, this.cfg.stateDim, `episode "${e.id}" state`);
      this.assertDims(step.control.length, this.cfg.controlDim, `episode "${e.id}" control`);
    }
    return usable;
  }

  private channelOf(modelId: string): number {
    const channels = new Set(this.cfg.gates.filter((g) => g.model === modelId).map((g) => g.channel));
    const [channel] = channels;
    if (channels.size !== 1 || channel === undefined) {
      throw new ModelConfigurationError(
        `Tanh-state model "${modelId}" must feed exactly one channel (got ${channels.size})`
      );
    }
    return channel;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new FrozenParameterViolation("forward", "model has been frozen for inverse training");
    }
  }

  private assertDims(actual: number, expected: number, what: string): void {
    if (actual !== expected) {
      throw new ModelConfigurationError(`${what} has dimension ${actual}, expected ${expected}`);
    }
  }

  private validate(): void {
    const cfg = this.cfg;
    if (!(cfg.sampleTime > 0)) {
      throw new ModelConfigurationError(`sampleTime must be > 0 (got ${cfg.sampleTime})`);
    }
    if (cfg.stateDim < 1 || cfg.controlDim < 0) {
      throw new ModelConfigurationError("stateDim must be >= 1 and controlDim >= 0");
    }
    if (cfg.integrator === "planar-body" && cfg.stateDim !== 3) {
      throw new ModelConfigurationError("planar-body integrator needs stateDim 3 (vx, vy, r)");
    }
    validateFuzzySet(cfg.fuzzySet);
    for (const g of cfg.gates) {
      if (g.channel < 0 || g.channel >= cfg.stateDim) {
        throw new ModelConfigurationError(
          `Gate for "${g.model}" targets channel ${g.channel}; model has ${cfg.stateDim}`
        );
      }
    }
    const tanhChannels = new Set<number>();
    for (const spec of cfg.localModels) {
      if (spec.nonlinearity !== "tanh-state") continue;
      for (const g of cfg.gates.filter((gate) => gate.model === spec.id)) {
        if (tanhChannels.has(g.channel)) {
          throw new ModelConfigurationError(
            `Channel ${g.channel} has more than one tanh-state correction`
          );
        }
        tanhChannels.add(g.channel);
      }
    }
  }
}
