/**
 * Local models: independently parameterized force/response sub-models.
 *
 * Each local model represents one physical effect (drag, rolling resistance,
 * drive torque, ...) and owns exactly one ParameterGroup. Models never share
 * variables, so training one cannot move another.
 *
 * Kinds:
 * - fir: finite impulse response over a time window of one signal
 *   (captures actuator lag and transients)
 * - mlp: small dense network over the current values of several signals
 *   (captures static nonlinear effects such as quadratic drag)
 */

import * as tf from "@tensorflow/tfjs";
import { ModelConfigurationError } from "../errors";
import { ParameterGroup } from "../params/group";
import type { SignalRef } from "../types";
import type { StepContext } from "./context";

export type NonlinearityFamily = "none" | "bias" | "quadratic" | "cubic" | "tanh-state";

export interface FirModelSpec {
  kind: "fir";
  id: string;
  signal: SignalRef;
  /** Window length in samples (1 = current sample only) */
  window: number;
  nonlinearity?: NonlinearityFamily;
}

export interface MlpModelSpec {
  kind: "mlp";
  id: string;
  inputs: SignalRef[];
  hiddenUnits: number;
  activation?: "tanh" | "relu";
  /** Seed for weight initialization */
  seed?: number;
  nonlinearity?: NonlinearityFamily;
}

export type LocalModelSpec = FirModelSpec | MlpModelSpec;

export interface LocalModel {
  readonly id: string;
  readonly kind: LocalModelSpec["kind"];
  readonly nonlinearity: NonlinearityFamily;
  readonly params: ParameterGroup;
  evaluate(ctx: StepContext): tf.Scalar;
  dispose(): void;
}

export class FirLocalModel implements LocalModel {
  readonly id: string;
  readonly kind = "fir" as const;
  readonly nonlinearity: NonlinearityFamily;
  readonly params: ParameterGroup;
  readonly signal: SignalRef;
  readonly window: number;

  constructor(spec: FirModelSpec) {
    if (!Number.isInteger(spec.window) || spec.window < 1) {
      throw new ModelConfigurationError(
        `FIR model "${spec.id}" needs an integer window >= 1 (got ${spec.window})`
      );
    }
    this.id = spec.id;
    this.signal = spec.signal;
    this.window = spec.window;
    this.nonlinearity = spec.nonlinearity ?? "none";
    // Zero taps: an untrained FIR contributes nothing
    this.params = new ParameterGroup(`local/${spec.id}`, {
      taps: tf.zeros([spec.window]),
    });
  }

  evaluate(ctx: StepContext): tf.Scalar {
    const samples: tf.Scalar[] = [];
    for (let lag = 0; lag < this.window; lag++) {
      samples.push(ctx.signal(this.signal, lag));
    }
    return tf.sum(tf.mul(tf.stack(samples), this.params.get("taps")));
  }

  dispose(): void {
    this.params.dispose();
  }
}

export class MlpLocalModel implements LocalModel {
  readonly id: string;
  readonly kind = "mlp" as const;
  readonly nonlinearity: NonlinearityFamily;
  readonly params: ParameterGroup;
  readonly inputs: SignalRef[];
  private readonly activation: "tanh" | "relu";

  constructor(spec: MlpModelSpec) {
    if (spec.inputs.length === 0) {
      throw new ModelConfigurationError(`MLP model "${spec.id}" has no inputs`);
    }
    if (!Number.isInteger(spec.hiddenUnits) || spec.hiddenUnits < 1) {
      throw new ModelConfigurationError(
        `MLP model "${spec.id}" needs hiddenUnits >= 1 (got ${spec.hiddenUnits})`
      );
    }
    this.id = spec.id;
    this.inputs = spec.inputs;
    this.activation = spec.activation ?? "tanh";
    this.nonlinearity = spec.nonlinearity ?? "none";

    const seed = spec.seed ?? 7;
    const nIn = spec.inputs.length;
    const h = spec.hiddenUnits;
    // Glorot-style scale; small output layer so an untrained model starts near 0
    this.params = new ParameterGroup(`local/${spec.id}`, {
      w1: tf.randomNormal([nIn, h], 0, Math.sqrt(2 / (nIn + h)), "float32", seed),
      b1: tf.zeros([h]),
      w2: tf.randomNormal([h, 1], 0, 0.01, "float32", seed + 1),
      b2: tf.zeros([1]),
    });
  }

  evaluate(ctx: StepContext): tf.Scalar {
    const x = tf.stack(this.inputs.map((ref) => ctx.signal(ref))).reshape([1, this.inputs.length]);
    const pre = tf.add(tf.matMul(x, this.params.get("w1")), this.params.get("b1"));
    const hidden = this.activation === "relu" ? tf.relu(pre) : tf.tanh(pre);
    const out = tf.add(tf.matMul(hidden, this.params.get("w2")), this.params.get("b2"));
    return out.reshape([]) as tf.Scalar;
  }

  dispose(): void {
    this.params.dispose();
  }
}

export function createLocalModel(spec: LocalModelSpec): LocalModel {
  switch (spec.kind) {
    case "fir":
      return new FirLocalModel(spec);
    case "mlp":
      return new MlpLocalModel(spec);
  }
}
