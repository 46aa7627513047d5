/**
 * EpisodeAugmenter: derives new training episodes from recorded ones.
 *
 * - crossover: prefix of one episode spliced onto the suffix of another at a
 *   split time on their shared time base
 * - mutation: additive Gaussian noise or scaling on chosen channels, clamped
 *   to caller-supplied bounds
 *
 * Operators are pure: parents are never touched, and every derived episode
 * records operator, parent ids and seed so it can be regenerated.
 */

import { IncompatibleEpisodeError, ModelConfigurationError } from "../errors";
import type { AugmentedEpisode, Episode, EpisodeStep, Perturbation, Provenance } from "../types";
import { createEpisode } from "../types";
import { clamp } from "../vec";
import { createRng, deriveSeed, gaussian, randomInt } from "./rng";

export type ChannelBounds = Array<[number, number] | null>;

export interface AugmenterConfig {
  /** Tolerance when comparing sample periods and start times */
  timeTolerance: number;
  /** Physical limits applied to mutated values, per channel */
  bounds: { state: ChannelBounds; control: ChannelBounds };
  /** Random split points are drawn within this fraction of the shared span */
  splitRange: [number, number];
}

export const defaultAugmenterConfig: AugmenterConfig = {
  timeTolerance: 1e-9,
  bounds: { state: [], control: [] },
  splitRange: [0.25, 0.75],
};

export interface AugmentationPlan {
  seed: number;
  crossovers: number;
  mutations: Array<{ perturbation: Perturbation; count: number }>;
}

export interface AugmentationResult {
  episodes: AugmentedEpisode[];
  /** Crossover draws skipped because the chosen parents were incompatible */
  skipped: number;
}

export class EpisodeAugmenter {
  readonly cfg: AugmenterConfig;

  constructor(config?: Partial<AugmenterConfig>) {
    this.cfg = { ...defaultAugmenterConfig, ...(config ?? {}) };
    const [lo, hi] = this.cfg.splitRange;
    if (!(lo >= 0 && hi <= 1 && lo <= hi)) {
      throw new ModelConfigurationError(`splitRange must lie within [0, 1] (got [${lo}, ${hi}])`);
    }
  }

  // --------------------------------------------------------------------------
  // Crossover
  // --------------------------------------------------------------------------

  /**
   * Steps of `e1` with time < splitTime followed by steps of `e2` with
   * time >= splitTime.
   */
  crossover(e1: Episode, e2: Episode, splitTime: number): AugmentedEpisode {
    return this.splice(e1, e2, splitTime, null);
  }

  /** Crossover at a sample time drawn from the configured split range. */
  crossoverRandom(e1: Episode, e2: Episode, seed: number): AugmentedEpisode {
    this.assertCompatible(e1, e2);
    const rng = createRng(seed);
    const last = Math.min(e1.steps.length, e2.steps.length) - 1;
    const [lo, hi] = this.cfg.splitRange;
    const index = randomInt(rng, Math.ceil(lo * last), Math.floor(hi * last));
    const step = e1.steps[index];
    if (!step) {
      throw new IncompatibleEpisodeError(e1.id, e2.id, "no shared split point");
    }
    return this.splice(e1, e2, step.time, seed);
  }

  /**
   * Throws IncompatibleEpisodeError unless both episodes share a time base:
   * every sample time over the shorter episode's span must agree within
   * `timeTolerance`. A 1-step episode only has to agree on its start time.
   */
  assertCompatible(e1: Episode, e2: Episode): void {
    const a = e1.steps;
    const b = e2.steps;
    const tol = this.cfg.timeTolerance;
    if (a.length === 0 || b.length === 0) {
      throw new IncompatibleEpisodeError(e1.id, e2.id, "empty episode");
    }
    if (a[0]!.state.length !== b[0]!.state.length || a[0]!.control.length !== b[0]!.control.length) {
      throw new IncompatibleEpisodeError(e1.id, e2.id, "state or control dimensions differ");
    }
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
      const ta = a[i]!.time;
      const tb = b[i]!.time;
      if (Math.abs(ta - tb) > tol) {
        throw new IncompatibleEpisodeError(
          e1.id,
          e2.id,
          i === 0 ? `start times differ (${ta} vs ${tb})` : `sample times differ at step ${i} (${ta} vs ${tb})`
        );
      }
    }
  }

  isCompatible(e1: Episode, e2: Episode): boolean {
    try {
      this.assertCompatible(e1, e2);
      return true;
    } catch (error) {
      if (error instanceof IncompatibleEpisodeError) return false;
      throw error;
    }
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Apply a perturbation. Gaussian noise is drawn from the seeded generator,
   * one draw per perturbed value in step order, state before control.
   */
  mutate(e: Episode, perturbation: Perturbation, seed?: number): AugmentedEpisode {
    if (perturbation.kind === "gaussian" && seed === undefined) {
      throw new ModelConfigurationError("Gaussian mutation needs an explicit seed");
    }
    if (perturbation.kind === "gaussian" && !(perturbation.sigma >= 0)) {
      throw new ModelConfigurationError(`Noise sigma must be >= 0 (got ${perturbation.sigma})`);
    }
    const rng = createRng(seed ?? 0);
    const touches = (part: "state" | "control") =>
      perturbation.target === part || perturbation.target === "both";

    const apply = (values: readonly number[], part: "state" | "control"): number[] => {
      if (!touches(part)) return [...values];
      const bounds = this.cfg.bounds[part];
      return values.map((v, i) => {
        if (perturbation.channels && !perturbation.channels.includes(i)) return v;
        const next =
          perturbation.kind === "gaussian" ? v + perturbation.sigma * gaussian(rng) : v * perturbation.factor;
        const b = bounds[i];
        return b ? clamp(next, b[0], b[1]) : next;
      });
    };

    const steps: EpisodeStep[] = e.steps.map((step) => ({
      state: apply(step.state, "state"),
      control: apply(step.control, "control"),
      time: step.time,
    }));

    return derive(`${e.id}~${perturbation.kind}${seed ?? ""}`, steps, {
      operator: "mutation",
      parents: [e.id],
      seed: seed ?? null,
      perturbation,
    });
  }

  // --------------------------------------------------------------------------
  // Corpus
  // --------------------------------------------------------------------------

  /**
   * Derive a batch of episodes from a corpus. Parents and child seeds are
   * drawn from `plan.seed`, so the same plan on the same corpus gives the
   * same batch.
   */
  augmentCorpus(corpus: readonly Episode[], plan: AugmentationPlan): AugmentationResult {
    if (corpus.length === 0) {
      throw new ModelConfigurationError("Cannot augment an empty corpus");
    }
    const rng = createRng(plan.seed);
    const episodes: AugmentedEpisode[] = [];
    let skipped = 0;

    for (let i = 0; i < plan.crossovers; i++) {
      const e1 = corpus[randomInt(rng, 0, corpus.length - 1)]!;
      const e2 = corpus[randomInt(rng, 0, corpus.length - 1)]!;
      const seed = deriveSeed(rng);
      if (e1 === e2 || !this.isCompatible(e1, e2)) {
        skipped++;
        continue;
      }
      episodes.push(this.crossoverRandom(e1, e2, seed));
    }

    for (const { perturbation, count } of plan.mutations) {
      for (let i = 0; i < count; i++) {
        const parent = corpus[randomInt(rng, 0, corpus.length - 1)]!;
        episodes.push(this.mutate(parent, perturbation, deriveSeed(rng)));
      }
    }

    return { episodes, skipped };
  }

  private splice(e1: Episode, e2: Episode, splitTime: number, seed: number | null): AugmentedEpisode {
    this.assertCompatible(e1, e2);
    const prefix = e1.steps.filter((s) => s.time < splitTime);
    const suffix = e2.steps.filter((s) => s.time >= splitTime);
    if (prefix.length + suffix.length === 0) {
      throw new IncompatibleEpisodeError(e1.id, e2.id, `split at ${splitTime} leaves no steps`);
    }
    return derive(`${e1.id}x${e2.id}@${splitTime}`, [...prefix, ...suffix], {
      operator: "crossover",
      parents: [e1.id, e2.id],
      seed,
      splitTime,
      splitIndex: prefix.length,
    });
  }
}

function derive(id: string, steps: readonly EpisodeStep[], provenance: Provenance): AugmentedEpisode {
  const episode = createEpisode(id, steps);
  return Object.freeze({ ...episode, provenance: Object.freeze(provenance) });
}
