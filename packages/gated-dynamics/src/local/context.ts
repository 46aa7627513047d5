/**
 * StepContext: what a local model or gate sees at one time step.
 *
 * Signals are kept as scalar tensors so gradients flow through rollouts;
 * plain values are kept alongside for scheduling variables (fuzzy encoding,
 * control rules), which are treated as constants with respect to gradients.
 */

import * as tf from "@tensorflow/tfjs";
import type { SignalRef } from "../types";

export interface StepContext {
  /**
   * Signal `lag` steps before the current one (lag 0 = current).
   * Before the first sample the earliest sample repeats.
   */
  signal(ref: SignalRef, lag?: number): tf.Scalar;

  /** Plain value of a signal at the current step. */
  value(ref: SignalRef): number;

  /** Fuzzy activations of the operating variable at the current step. */
  readonly activations: readonly number[];
}

interface Sample {
  tensors: tf.Scalar[];
  values: number[];
}

/**
 * Growing history of state and control samples. The caller owns tensor
 * lifetimes (histories are built inside `tf.tidy` or an optimizer closure).
 */
export class SignalHistory {
  private readonly states: Sample[] = [];
  private readonly controls: Sample[] = [];

  get length(): number {
    return this.states.length;
  }

  /** Append a state sample given as plain numbers. */
  pushStateValues(values: readonly number[]): void {
    this.states.push({
      tensors: values.map((v) => tf.scalar(v)),
      values: [...values],
    });
  }

  /** Append a state sample produced by the model (rank-1 tensor). */
  pushStateTensor(state: tf.Tensor1D): void {
    this.states.push({
      tensors: tf.unstack(state) as tf.Scalar[],
      values: Array.from(state.dataSync()),
    });
  }

  pushControlValues(values: readonly number[]): void {
    this.controls.push({
      tensors: values.map((v) => tf.scalar(v)),
      values: [...values],
    });
  }

  pushControlTensor(control: tf.Tensor1D): void {
    this.controls.push({
      tensors: tf.unstack(control) as tf.Scalar[],
      values: Array.from(control.dataSync()),
    });
  }

  /** Current state as a rank-1 tensor. */
  currentState(): tf.Tensor1D {
    const last = this.states[this.states.length - 1];
    if (!last) throw new Error("SignalHistory has no state samples");
    return tf.stack(last.tensors) as tf.Tensor1D;
  }

  currentStateValues(): number[] {
    return [...(this.states[this.states.length - 1]?.values ?? [])];
  }

  /**
   * Context for step `k` (index into the state history). Controls are read at
   * the same index.
   */
  at(k: number, activations: readonly number[]): StepContext {
    const pick = (ref: SignalRef, lag: number): Sample => {
      const series = ref.source === "state" ? this.states : this.controls;
      const sample = series[Math.max(0, Math.min(k, series.length - 1) - lag)];
      if (!sample) {
        throw new Error(`No ${ref.source} sample available at step ${k}`);
      }
      return sample;
    };

    return {
      activations,
      signal(ref, lag = 0) {
        const t = pick(ref, lag).tensors[ref.index];
        if (!t) {
          throw new RangeError(`Signal ${ref.source}[${ref.index}] out of range`);
        }
        return t;
      },
      value(ref) {
        const v = pick(ref, 0).values[ref.index];
        if (v === undefined) {
          throw new RangeError(`Signal ${ref.source}[${ref.index}] out of range`);
        }
        return v;
      },
    };
  }
}
