/**
 * Shared training plumbing: convergence criteria, queued execution and
 * the optimizer step used by every trainable component.
 */

import * as tf from "@tensorflow/tfjs";
import type Queue from "queue";
import { ModelConfigurationError } from "./errors";

// ============================================================================
// Convergence
// ============================================================================

/**
 * Caller-supplied convergence test. Receives the per-epoch loss history
 * (most recent last) and decides whether training has converged.
 */
export interface ConvergenceCriterion {
  readonly maxEpochs: number;
  converged(history: readonly number[]): boolean;
}

/** Converged once `epochs` epochs have run. */
export function fixedEpochs(epochs: number): ConvergenceCriterion {
  return {
    maxEpochs: epochs,
    converged: (history) => history.length >= epochs,
  };
}

export interface LossPlateauOptions {
  /** Epochs without sufficient improvement before declaring a plateau */
  patience: number;
  /** Improvement smaller than this counts as no improvement */
  minDelta: number;
  maxEpochs: number;
  /** Losses below this count as converged immediately */
  targetLoss?: number;
}

export function lossPlateau(options: LossPlateauOptions): ConvergenceCriterion {
  return {
    maxEpochs: options.maxEpochs,
    converged(history) {
      const last = history[history.length - 1];
      if (last === undefined) return false;
      if (options.targetLoss !== undefined && last <= options.targetLoss) return true;
      if (history.length <= options.patience) return false;

      const best = Math.min(...history.slice(0, history.length - options.patience));
      const recent = Math.min(...history.slice(-options.patience));
      return best - recent < options.minDelta;
    },
  };
}

export interface TrainingReport {
  epochs: number;
  converged: boolean;
  losses: number[];
  finalLoss: number;
}

// ============================================================================
// Execution
// ============================================================================

/**
 * Run a job on the shared training queue and resolve with its result.
 * Training jobs never overlap, so a stage boundary is a plain await.
 */
export function runQueued<T>(queue: Queue, job: () => T | Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    queue.push(async () => {
      try {
        resolve(await job());
      } catch (error) {
        reject(error);
      }
    });
  });
}

/**
 * One optimizer step over an explicit variable list; returns the loss.
 */
export function optimizerStep(
  optimizer: tf.Optimizer,
  loss: () => tf.Scalar,
  varList: tf.Variable[]
): number {
  if (varList.length === 0) {
    throw new ModelConfigurationError("No trainable parameters in the current stage");
  }
  const cost = optimizer.minimize(loss, true, varList);
  if (!cost) return Number.NaN;
  const value = cost.dataSync()[0] ?? Number.NaN;
  cost.dispose();
  return value;
}

/**
 * Epoch loop shared by the trainable components: run `epoch` until the
 * criterion holds or `maxEpochs` is reached.
 */
export async function trainUntil(
  criterion: ConvergenceCriterion,
  epoch: (index: number) => number | Promise<number>,
  label?: string,
  verbose = false
): Promise<TrainingReport> {
  const losses: number[] = [];
  let converged = false;

  for (let i = 0; i < criterion.maxEpochs; i++) {
    const loss = await epoch(i);
    if (!Number.isFinite(loss)) {
      throw new ModelConfigurationError(
        `${label ?? "training"}: loss diverged at epoch ${i} (${loss})`
      );
    }
    losses.push(loss);

    if (verbose && (i % 10 === 0 || i === criterion.maxEpochs - 1)) {
      console.log(`[${label ?? "train"}] epoch ${i} loss ${loss.toFixed(6)}`);
    }

    if (criterion.converged(losses)) {
      converged = true;
      break;
    }
  }

  return {
    epochs: losses.length,
    converged,
    losses,
    finalLoss: losses[losses.length - 1] ?? Number.NaN,
  };
}
