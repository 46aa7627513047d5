/**
 * Evaluation utilities: trajectory error metrics and timed model runs.
 */

import type { ForwardModel } from "../model/forward";
import type { InverseModel } from "../model/inverse";
import type { Episode } from "../types";
import { episodeControls, episodeStates } from "../types";
import type { Vec } from "../vec";
import { column, maxAbs, mean, mse, sub } from "../vec";

/**
 * Trajectory error metrics
 */
export interface TrajectoryMetrics {
  /** RMSE per state channel */
  rmsePerChannel: number[];
  /** RMSE over all channels and steps */
  rmse: number;
  maxAbsError: number;
  /** Wall-clock time of the model call in milliseconds (0 when not timed) */
  computeMs: number;
}

/**
 * Compare a predicted trajectory with the reference, step by step.
 * Both must have the same length and channel count.
 */
export function evaluateTrajectory(
  predicted: readonly (readonly number[])[],
  actual: readonly (readonly number[])[],
  computeMs = 0
): TrajectoryMetrics {
  if (predicted.length !== actual.length) {
    throw new RangeError(`Trajectory lengths differ: ${predicted.length} vs ${actual.length}`);
  }
  const channels = actual[0]?.length ?? 0;
  predicted.forEach((p, k) => {
    if (p.length !== channels || actual[k]!.length !== channels) {
      throw new RangeError(`Channel count mismatch at step ${k}`);
    }
  });

  const channelMse = Array.from({ length: channels }, (_, c) =>
    mse(column(predicted, c), column(actual, c))
  );
  const rmsePerChannel = channelMse.map(Math.sqrt);
  const rmse = Math.sqrt(mean(channelMse));
  const maxAbsError = maxAbs(predicted.flatMap((p, k) => sub(p, actual[k]!)));

  return { rmsePerChannel, rmse, maxAbsError, computeMs };
}

/**
 * Free-running forward prediction of an episode from its first state and
 * recorded controls. The last control has no successor state and is unused.
 */
export function evaluateForward(model: ForwardModel, episode: Episode): TrajectoryMetrics {
  const states = episodeStates(episode);
  const controls = episodeControls(episode).slice(0, -1);
  const initial = states[0];
  if (!initial) throw new RangeError(`Episode "${episode.id}" is empty`);

  const start = performance.now();
  const predicted = model.predict(controls, initial);
  const computeMs = performance.now() - start;

  return evaluateTrajectory(predicted, states, computeMs);
}

/**
 * Inverse model tracking: controls from the episode's trajectory, replayed
 * through the forward model.
 */
export function evaluateInverse(
  inverse: InverseModel,
  forward: ForwardModel,
  episode: Episode
): TrajectoryMetrics & { controls: Vec[] } {
  const states = episodeStates(episode);
  const [initial, ...target] = states;
  if (!initial) throw new RangeError(`Episode "${episode.id}" is empty`);

  const start = performance.now();
  const controls = inverse.predict(target, initial);
  const computeMs = performance.now() - start;

  return { ...evaluateTrajectory(forward.predict(controls, initial), states, computeMs), controls };
}
