/**
 * Core types shared across the modelling pipeline.
 *
 * - Signals: where a scalar is read from in a time step
 * - Episodes: recorded or synthesized trajectories
 * - Augmented episodes: derived episodes with provenance
 */

import type { Vec } from "./vec";

// ============================================================================
// Signals
// ============================================================================

export type SignalSource = "state" | "control";

/**
 * Reference to one scalar channel of a time step, e.g. the speed channel of
 * the state or the brake channel of the control vector.
 */
export interface SignalRef {
  source: SignalSource;
  index: number;
}

// ============================================================================
// Episodes
// ============================================================================

export interface EpisodeStep {
  readonly state: readonly number[];
  readonly control: readonly number[];
  readonly time: number;
}

/**
 * An ordered sequence of (state, control, time) samples describing one
 * trajectory. Episodes are frozen once recorded.
 */
export interface Episode {
  readonly id: string;
  readonly steps: readonly EpisodeStep[];
}

export type AugmentationOperator = "crossover" | "mutation";

export type PerturbationTarget = "state" | "control" | "both";

export type Perturbation =
  | {
      kind: "gaussian";
      sigma: number;
      target: PerturbationTarget;
      /** Channels to perturb (all when omitted) */
      channels?: number[];
    }
  | {
      kind: "scale";
      factor: number;
      target: PerturbationTarget;
      channels?: number[];
    };

export interface Provenance {
  readonly operator: AugmentationOperator;
  readonly parents: readonly string[];
  /** Seed of the generator that drew the split point or noise, if any */
  readonly seed: number | null;
  readonly splitTime?: number;
  readonly splitIndex?: number;
  readonly perturbation?: Perturbation;
}

export interface AugmentedEpisode extends Episode {
  readonly provenance: Provenance;
}

// ============================================================================
// Helpers
// ============================================================================

function freezeStep(step: EpisodeStep): EpisodeStep {
  return Object.freeze({
    state: Object.freeze([...step.state]),
    control: Object.freeze([...step.control]),
    time: step.time,
  });
}

/**
 * Create an immutable episode. Steps must be strictly increasing in time and
 * share state/control dimensions.
 */
export function createEpisode(id: string, steps: readonly EpisodeStep[]): Episode {
  const first = steps[0];
  if (first) {
    for (let i = 1; i < steps.length; i++) {
      const step = steps[i]!;
      if (step.time <= steps[i - 1]!.time) {
        throw new RangeError(`Episode "${id}": time must increase at step ${i}`);
      }
      if (
        step.state.length !== first.state.length ||
        step.control.length !== first.control.length
      ) {
        throw new RangeError(`Episode "${id}": dimension change at step ${i}`);
      }
    }
  }
  return Object.freeze({ id, steps: Object.freeze(steps.map(freezeStep)) });
}

/** Build an episode from state and control arrays on a uniform time base. */
export function episodeFromArrays(
  id: string,
  states: readonly Vec[],
  controls: readonly Vec[],
  sampleTime: number,
  startTime = 0
): Episode {
  if (states.length !== controls.length) {
    throw new RangeError(
      `Episode "${id}": ${states.length} states vs ${controls.length} controls`
    );
  }
  return createEpisode(
    id,
    states.map((state, i) => ({
      state,
      control: controls[i]!,
      time: startTime + i * sampleTime,
    }))
  );
}

export function episodeStates(episode: Episode): Vec[] {
  return episode.steps.map((s) => [...s.state]);
}

export function episodeControls(episode: Episode): Vec[] {
  return episode.steps.map((s) => [...s.control]);
}
