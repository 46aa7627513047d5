/**
 * LocalModelBank: fixed-cardinality collection of local models.
 *
 * Cardinality is set at construction. `trainModel` restricts the optimizer
 * to one model's variables, which is what lets independently trained
 * networks be summed afterwards.
 */

import type * as tf from "@tensorflow/tfjs";
import { ModelConfigurationError } from "../errors";
import type { ParameterGroup } from "../params/group";
import { optimizerStep } from "../training";
import type { LocalModel, LocalModelSpec } from "./local-model";
import { createLocalModel } from "./local-model";

export class LocalModelBank {
  private readonly models: readonly LocalModel[];
  private readonly index = new Map<string, number>();

  constructor(models: readonly LocalModel[]) {
    models.forEach((m, i) => {
      if (this.index.has(m.id)) {
        throw new ModelConfigurationError(`Duplicate local model id "${m.id}"`);
      }
      this.index.set(m.id, i);
    });
    this.models = Object.freeze([...models]);
  }

  static fromSpecs(specs: readonly LocalModelSpec[]): LocalModelBank {
    return new LocalModelBank(specs.map(createLocalModel));
  }

  get size(): number {
    return this.models.length;
  }

  get(i: number): LocalModel {
    const m = this.models[i];
    if (!m) {
      throw new RangeError(`Local model index ${i} out of range (size ${this.models.length})`);
    }
    return m;
  }

  all(): readonly LocalModel[] {
    return this.models;
  }

  byId(id: string): LocalModel {
    const i = this.index.get(id);
    if (i === undefined) {
      throw new ModelConfigurationError(`Unknown local model "${id}"`);
    }
    return this.get(i);
  }

  indexOf(id: string): number {
    return this.index.get(id) ?? -1;
  }

  groups(): ParameterGroup[] {
    return this.models.map((m) => m.params);
  }

  /**
   * One optimizer step on model `i` only. The loss may read any model; only
   * model `i`'s variables are updated.
   */
  trainModel(i: number, loss: () => tf.Scalar, optimizer: tf.Optimizer): number {
    return optimizerStep(optimizer, loss, this.get(i).params.trainable());
  }

  dispose(): void {
    for (const m of this.models) m.dispose();
  }
}
