/**
 * Assemble runtime components from a validated configuration.
 */

import type Queue from "queue";
import { EpisodeAugmenter } from "../augment/augmenter";
import type { FuzzySet } from "../fuzzy/membership";
import { uniformTriangularSet } from "../fuzzy/membership";
import { ForwardModel } from "../model/forward";
import { InverseModel } from "../model/inverse";
import { StabilityAnalyzer } from "../stability/analyzer";
import type { ModelConfig } from "./schema";

export function toFuzzySet(config: ModelConfig["fuzzySet"]): FuzzySet {
  if ("uniformTriangles" in config) {
    return uniformTriangularSet(config.name, config.domain, config.uniformTriangles, {
      normalized: config.normalized,
      tolerance: config.tolerance,
    });
  }
  return {
    name: config.name,
    domain: config.domain,
    functions: config.functions,
    normalized: config.normalized,
    tolerance: config.tolerance,
  };
}

export function buildForwardModel(config: ModelConfig, queue?: Queue): ForwardModel {
  return new ForwardModel(
    {
      sampleTime: config.sampleTime,
      stateDim: config.stateDim,
      controlDim: config.controlDim,
      operatingVariable: config.operatingVariable,
      fuzzySet: toFuzzySet(config.fuzzySet),
      localModels: config.localModels,
      gates: config.gates,
      integrator: config.integrator,
      frictionEllipse: config.frictionEllipse,
      learningRate: config.training.learningRate,
      verbose: config.training.verbose,
    },
    queue
  );
}

export function buildInverseModel(forward: ForwardModel, config: ModelConfig, queue?: Queue): InverseModel {
  return new InverseModel(
    forward,
    {
      order: config.inverse.order,
      bounds: config.inverse.bounds,
      learningRate: config.inverse.learningRate,
      verbose: config.training.verbose,
    },
    queue
  );
}

export function buildAugmenter(config: ModelConfig): EpisodeAugmenter {
  return new EpisodeAugmenter(config.augmentation);
}

export function buildStabilityAnalyzer(config: ModelConfig): StabilityAnalyzer {
  return new StabilityAnalyzer({ margin: config.stability.margin });
}
