/**
 * Gates: evaluatable activations φ_i paired with a local model.
 *
 * Fixed gates (membership, constant, control-rule) yield plain numbers and
 * are constant-function special cases of the same interface as learned gates,
 * which yield scalar tensors so their parameters can be trained.
 */

import * as tf from "@tensorflow/tfjs";
import { ModelConfigurationError } from "../errors";
import type { LocalModel } from "../local/local-model";
import type { StepContext } from "../local/context";
import type { LocalModelBank } from "../local/bank";
import { ParameterGroup } from "../params/group";
import type { SignalRef } from "../types";
import { clamp } from "../vec";

export type ActivationSpec =
  | { kind: "membership"; index: number }
  | { kind: "constant"; value: number }
  | {
      kind: "control-rule";
      signal: SignalRef;
      /** Gate opens when the signal exceeds this threshold */
      threshold: number;
    }
  | {
      kind: "learned";
      /** Initial bias of the gate's logit */
      initialBias?: number;
    };

export interface GateSpec {
  model: string;
  /** Fixed force direction: +1 or -1 */
  sign: 1 | -1;
  /** Output channel the term accumulates into */
  channel: number;
  activation: ActivationSpec;
}

export type GateValue = number | tf.Scalar;

export interface Gate {
  readonly model: LocalModel;
  readonly sign: 1 | -1;
  readonly channel: number;
  readonly label: string;
  /** φ(x) in [0, 1] */
  evaluate(ctx: StepContext): GateValue;
  /** Parameters of a learned gate, null for fixed gates */
  readonly params: ParameterGroup | null;
}

abstract class FixedGate implements Gate {
  readonly params = null;

  constructor(
    readonly model: LocalModel,
    readonly sign: 1 | -1,
    readonly channel: number,
    readonly label: string
  ) {}

  abstract evaluate(ctx: StepContext): number;
}

export class MembershipGate extends FixedGate {
  constructor(model: LocalModel, sign: 1 | -1, channel: number, private readonly index: number) {
    super(model, sign, channel, `${model.id}@membership[${index}]`);
  }

  evaluate(ctx: StepContext): number {
    const a = ctx.activations[this.index];
    if (a === undefined) {
      throw new RangeError(
        `Gate ${this.label}: activation index out of range (${ctx.activations.length} activations)`
      );
    }
    return a;
  }
}

export class ConstantGate extends FixedGate {
  private readonly value: number;

  constructor(model: LocalModel, sign: 1 | -1, channel: number, value: number) {
    super(model, sign, channel, `${model.id}@constant(${value})`);
    this.value = clamp(value, 0, 1);
  }

  evaluate(): number {
    return this.value;
  }
}

/**
 * Hard switch on a control signal, e.g. brake torque only while the brake
 * pedal is pressed. Mutual exclusion with other gates is not enforced.
 */
export class ControlRuleGate extends FixedGate {
  constructor(
    model: LocalModel,
    sign: 1 | -1,
    channel: number,
    private readonly signal: SignalRef,
    private readonly threshold: number
  ) {
    super(model, sign, channel, `${model.id}@${signal.source}[${signal.index}]>${threshold}`);
  }

  evaluate(ctx: StepContext): number {
    return ctx.value(this.signal) > this.threshold ? 1 : 0;
  }
}

/**
 * Learned gate: φ = sigmoid(wᵀ·activations + c) over the fuzzy activations.
 */
export class LearnedGate implements Gate {
  readonly params: ParameterGroup;
  readonly label: string;

  constructor(
    readonly model: LocalModel,
    readonly sign: 1 | -1,
    readonly channel: number,
    activationCount: number,
    initialBias = 0
  ) {
    this.label = `${model.id}@learned`;
    this.params = new ParameterGroup(`gate/${model.id}/${channel}`, {
      w: tf.zeros([activationCount]),
      c: tf.scalar(initialBias),
    });
  }

  evaluate(ctx: StepContext): tf.Scalar {
    const a = tf.tensor1d([...ctx.activations]);
    return tf.sigmoid(tf.add<tf.Scalar>(tf.sum(tf.mul(a, this.params.get("w"))), this.params.get("c")));
  }
}

export function createGate(spec: GateSpec, bank: LocalModelBank, activationCount: number): Gate {
  const model = bank.byId(spec.model);
  if (spec.sign !== 1 && spec.sign !== -1) {
    throw new ModelConfigurationError(`Gate for "${spec.model}" needs sign +1 or -1`);
  }
  const a = spec.activation;
  switch (a.kind) {
    case "membership":
      if (a.index < 0 || a.index >= activationCount) {
        throw new ModelConfigurationError(
          `Gate for "${spec.model}" references membership ${a.index} of ${activationCount}`
        );
      }
      return new MembershipGate(model, spec.sign, spec.channel, a.index);
    case "constant":
      return new ConstantGate(model, spec.sign, spec.channel, a.value);
    case "control-rule":
      return new ControlRuleGate(model, spec.sign, spec.channel, a.signal, a.threshold);
    case "learned":
      return new LearnedGate(model, spec.sign, spec.channel, activationCount, a.initialBias);
  }
}
