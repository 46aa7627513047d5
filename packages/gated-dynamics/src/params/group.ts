/**
 * ParameterGroup: a named set of tfjs variables with a frozen flag.
 *
 * Stage gates (phase 1 → phase 2 of the tanh-state learner, forward → inverse
 * training) are expressed by freezing groups. A frozen group hands no
 * variables to optimizers and rejects every write.
 */

import * as tf from "@tensorflow/tfjs";
import { FrozenParameterViolation } from "../errors";

export type ParameterSnapshot = Record<string, number[]>;

export class ParameterGroup {
  readonly name: string;
  private readonly vars = new Map<string, tf.Variable>();
  private frozen = false;

  constructor(name: string, initial: Record<string, tf.Tensor>) {
    this.name = name;
    for (const [key, value] of Object.entries(initial)) {
      this.vars.set(key, tf.variable(value, true));
      value.dispose();
    }
  }

  get(key: string): tf.Variable {
    const v = this.vars.get(key);
    if (!v) {
      throw new Error(`Parameter "${key}" not found in group "${this.name}"`);
    }
    return v;
  }

  keys(): string[] {
    return Array.from(this.vars.keys());
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): void {
    this.frozen = true;
    for (const v of this.vars.values()) v.trainable = false;
  }

  unfreeze(): void {
    this.frozen = false;
    for (const v of this.vars.values()) v.trainable = true;
  }

  /** Variables an optimizer may update; empty while frozen. */
  trainable(): tf.Variable[] {
    return this.frozen ? [] : Array.from(this.vars.values());
  }

  /** True if `variable` belongs to this group. */
  owns(variable: tf.Variable): boolean {
    for (const v of this.vars.values()) {
      if (v.id === variable.id) return true;
    }
    return false;
  }

  assign(key: string, value: tf.Tensor): void {
    if (this.frozen) {
      throw new FrozenParameterViolation(this.name, `write to "${key}"`);
    }
    this.get(key).assign(value);
  }

  /** Convenience write from plain numbers, keeping the variable's shape. */
  assignValues(key: string, values: readonly number[]): void {
    const v = this.get(key);
    const t = tf.tensor(values as number[], v.shape);
    try {
      this.assign(key, t);
    } finally {
      t.dispose();
    }
  }

  read(key: string): number[] {
    return Array.from(this.get(key).dataSync());
  }

  snapshot(): ParameterSnapshot {
    const out: ParameterSnapshot = {};
    for (const key of this.vars.keys()) out[key] = this.read(key);
    return out;
  }

  dispose(): void {
    for (const v of this.vars.values()) v.dispose();
    this.vars.clear();
  }
}

/** Trainable variables across groups, skipping frozen ones. */
export function trainableVariables(groups: readonly ParameterGroup[]): tf.Variable[] {
  return groups.flatMap((g) => g.trainable());
}
