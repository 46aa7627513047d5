import { describe, expect, it } from "vitest";

import { EpisodeAugmenter } from "../src/augment/augmenter";
import { createRng, gaussian } from "../src/augment/rng";
import { IncompatibleEpisodeError, ModelConfigurationError } from "../src/errors";
import type { Episode, Perturbation } from "../src/types";
import { createEpisode, episodeFromArrays } from "../src/types";

function ramp(id: string, offset: number, options: { sampleTime?: number; startTime?: number } = {}): Episode {
  const states = Array.from({ length: 10 }, (_, k) => [offset + k, 0.5 * k]);
  const controls = Array.from({ length: 10 }, (_, k) => [k % 2]);
  return episodeFromArrays(id, states, controls, options.sampleTime ?? 0.1, options.startTime ?? 0);
}

const noise: Perturbation = { kind: "gaussian", sigma: 0.1, target: "both" };

describe("EpisodeAugmenter: crossover", () => {
  it("reproduces the prefix of e1 and the suffix of e2 exactly", () => {
    const aug = new EpisodeAugmenter();
    const e1 = ramp("e1", 0);
    const e2 = ramp("e2", 100);

    const child = aug.crossover(e1, e2, 0.5);

    expect(child.steps).toHaveLength(10);
    expect(child.steps.slice(0, 5)).toEqual(e1.steps.slice(0, 5));
    expect(child.steps.slice(5)).toEqual(e2.steps.slice(5));
    expect(child.provenance).toEqual({
      operator: "crossover",
      parents: ["e1", "e2"],
      seed: null,
      splitTime: 0.5,
      splitIndex: 5,
    });
  });

  it("never modifies the parents", () => {
    const aug = new EpisodeAugmenter();
    const e1 = ramp("e1", 0);
    const e2 = ramp("e2", 100);
    const copy1 = JSON.parse(JSON.stringify(e1));
    aug.crossover(e1, e2, 0.3);
    expect(JSON.parse(JSON.stringify(e1))).toEqual(copy1);
    expect(Object.isFrozen(e1.steps[0]!.state)).toBe(true);
  });

  it("rejects episodes on different time bases", () => {
    const aug = new EpisodeAugmenter();
    const e1 = ramp("e1", 0);
    expect(() => aug.crossover(e1, ramp("slow", 0, { sampleTime: 0.2 }), 0.5)).toThrow(IncompatibleEpisodeError);
    expect(() => aug.crossover(e1, ramp("late", 0, { startTime: 1 }), 0.5)).toThrow(IncompatibleEpisodeError);

    const narrow = episodeFromArrays("narrow", [[0], [1]], [[0], [0]], 0.1);
    expect(() => aug.crossover(e1, narrow, 0.1)).toThrow(IncompatibleEpisodeError);
    expect(aug.isCompatible(e1, narrow)).toBe(false);
  });

  it("rejects a partner whose sample times drift after a matching start", () => {
    const aug = new EpisodeAugmenter();
    const at = (id: string, times: number[]): Episode =>
      createEpisode(
        id,
        times.map((time, k) => ({ state: [k, 0], control: [0], time }))
      );
    const regular = at("regular", [0, 0.1, 0.2, 0.3, 0.4]);
    const irregular = at("irregular", [0, 0.1, 0.5, 0.9, 1.3]);

    expect(() => aug.crossover(regular, irregular, 0.25)).toThrow(IncompatibleEpisodeError);
    expect(() => aug.crossover(regular, irregular, 0.25)).toThrow(/sample times differ at step 2/);
    expect(aug.isCompatible(regular, irregular)).toBe(false);

    const single = at("single", [0]);
    expect(aug.isCompatible(regular, single)).toBe(true);
    expect(aug.crossover(regular, single, 0.25).steps.map((s) => s.time)).toEqual([0, 0.1, 0.2]);
  });

  it("draws a reproducible split point within the configured range", () => {
    const aug = new EpisodeAugmenter({ splitRange: [0.25, 0.75] });
    const e1 = ramp("e1", 0);
    const e2 = ramp("e2", 100);

    const a = aug.crossoverRandom(e1, e2, 7);
    const b = aug.crossoverRandom(e1, e2, 7);
    expect(a).toEqual(b);
    expect(a.provenance.seed).toBe(7);
    // 9 intervals: indices ceil(2.25) … floor(6.75)
    expect(a.provenance.splitIndex).toBeGreaterThanOrEqual(3);
    expect(a.provenance.splitIndex).toBeLessThanOrEqual(6);
  });
});

describe("EpisodeAugmenter: mutation", () => {
  it("is reproducible for a fixed seed", () => {
    const aug = new EpisodeAugmenter();
    const e = ramp("e", 0);
    const first = aug.mutate(e, noise, 42);
    const second = aug.mutate(e, noise, 42);

    expect(first).toEqual(second);
    expect(first.provenance).toEqual({ operator: "mutation", parents: ["e"], seed: 42, perturbation: noise });
    expect(first.steps.map((s) => s.state)).not.toEqual(e.steps.map((s) => s.state));
    expect(aug.mutate(e, noise, 43)).not.toEqual(first);
  });

  it("keeps the time base", () => {
    const aug = new EpisodeAugmenter();
    const e = ramp("e", 0);
    expect(aug.mutate(e, noise, 1).steps.map((s) => s.time)).toEqual(e.steps.map((s) => s.time));
  });

  it("touches only the targeted channels", () => {
    const aug = new EpisodeAugmenter();
    const e = ramp("e", 0);
    const child = aug.mutate(e, { kind: "scale", factor: 2, target: "state", channels: [1] });

    child.steps.forEach((s, k) => {
      expect(s.state).toEqual([k, k]);
      expect(s.control).toEqual([k % 2]);
    });
    expect(child.provenance.seed).toBeNull();
  });

  it("clamps to caller-supplied bounds", () => {
    const aug = new EpisodeAugmenter({ bounds: { state: [[0, 5], null], control: [] } });
    const child = aug.mutate(ramp("e", 0), { kind: "scale", factor: 10, target: "state" });
    expect(child.steps.map((s) => s.state[0])).toEqual([0, 5, 5, 5, 5, 5, 5, 5, 5, 5]);
    expect(child.steps[9]!.state[1]).toBe(45);
  });

  it("requires a seed for gaussian noise", () => {
    expect(() => new EpisodeAugmenter().mutate(ramp("e", 0), noise)).toThrow(ModelConfigurationError);
  });
});

describe("EpisodeAugmenter: corpus", () => {
  it("derives the same batch from the same plan", () => {
    const aug = new EpisodeAugmenter();
    const corpus = [ramp("a", 0), ramp("b", 50), ramp("c", 100)];
    const plan = { seed: 11, crossovers: 6, mutations: [{ perturbation: noise, count: 3 }] };

    const first = aug.augmentCorpus(corpus, plan);
    const second = aug.augmentCorpus(corpus, plan);

    expect(first).toEqual(second);
    expect(first.episodes).toHaveLength(6 - first.skipped + 3);
    first.episodes.forEach((e) => expect(e.provenance.parents.length).toBeGreaterThan(0));
  });
});

describe("Seeded generator", () => {
  it("repeats for the same seed", () => {
    const a = createRng(5);
    const b = createRng(5);
    expect([gaussian(a), gaussian(a)]).toEqual([gaussian(b), gaussian(b)]);
  });
});
