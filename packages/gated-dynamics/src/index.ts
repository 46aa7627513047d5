/**
 * gated-dynamics - fuzzy-gated local models for vehicle dynamics
 *
 * A framework for learning forward and inverse vehicle models as a
 * superposition of simple local models switched by gates.
 *
 * Core concepts:
 * - Operating regions: a scheduling variable is fuzzified into activations
 * - Superposition: Σ sign · φ · LocalModel, one term per physical effect
 * - Nonlinearity: bias/polynomial corrections, then a two-phase tanh-state learner
 * - Stage gates: parameter groups are frozen between training stages
 * - Inverse model: trained through a frozen forward model, checked for stability
 * - Augmentation: crossover and mutation of recorded episodes with provenance
 */

// ============================================================================
// Core Types
// ============================================================================

export {
  type SignalSource,
  type SignalRef,
  type EpisodeStep,
  type Episode,
  type AugmentationOperator,
  type PerturbationTarget,
  type Perturbation,
  type Provenance,
  type AugmentedEpisode,
  createEpisode,
  episodeFromArrays,
  episodeStates,
  episodeControls,
} from "./types";

export {
  type ErrorCode,
  GatedDynamicsError,
  DegenerateEncodingError,
  PrematureRefinementError,
  IncompatibleEpisodeError,
  FrozenParameterViolation,
  ModelConfigurationError,
  UnstableModelWarning,
} from "./errors";

// ============================================================================
// Vector Utilities
// ============================================================================

export {
  type Vec,
  sub,
  clamp,
  sum,
  mean,
  sigmoid,
  mse,
  maxAbs,
  column,
} from "./vec";

// ============================================================================
// Training
// ============================================================================

export {
  type ConvergenceCriterion,
  type LossPlateauOptions,
  type TrainingReport,
  fixedEpochs,
  lossPlateau,
  runQueued,
  optimizerStep,
  trainUntil,
} from "./training";

export { type ParameterSnapshot, ParameterGroup, trainableVariables } from "./params/group";

// ============================================================================
// Components
// ============================================================================

export * from "./fuzzy";
export * from "./local";
export * from "./gating";
export * from "./nonlinearity";
export * from "./model";
export * from "./augment";
export * from "./stability";

// ============================================================================
// Configuration & Harness
// ============================================================================

export * from "./config";
export * from "./harness";
