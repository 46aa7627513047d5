/**
 * Error kinds raised by the modelling core.
 *
 * None of them is fatal: each names a condition the caller can recover from
 * by adjusting configuration or retraining.
 */

export type ErrorCode =
  | "DEGENERATE_ENCODING"
  | "PREMATURE_REFINEMENT"
  | "INCOMPATIBLE_EPISODE"
  | "FROZEN_PARAMETER"
  | "MODEL_CONFIGURATION"
  | "UNSTABLE_MODEL";

export class GatedDynamicsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Every membership function returned 0 for the input, or the input was NaN. */
export class DegenerateEncodingError extends GatedDynamicsError {
  readonly input: number;

  constructor(fuzzySet: string, input: number) {
    super(
      "DEGENERATE_ENCODING",
      `Fuzzy set "${fuzzySet}" has no active membership for x=${input}`
    );
    this.input = input;
  }
}

/** Phase-2 refinement requested before phase 1 converged. */
export class PrematureRefinementError extends GatedDynamicsError {
  constructor(phase: string) {
    super(
      "PREMATURE_REFINEMENT",
      `Cannot refine coupling while learner is ${phase}; phase 1 must converge first`
    );
  }
}

/** Crossover across episodes that do not share a time base. */
export class IncompatibleEpisodeError extends GatedDynamicsError {
  constructor(first: string, second: string, reason: string) {
    super(
      "INCOMPATIBLE_EPISODE",
      `Episodes "${first}" and "${second}" are incompatible: ${reason}`
    );
  }
}

/** Write attempted on a parameter group that is frozen for the current stage. */
export class FrozenParameterViolation extends GatedDynamicsError {
  readonly group: string;

  constructor(group: string, detail?: string) {
    super(
      "FROZEN_PARAMETER",
      `Parameter group "${group}" is frozen${detail ? `: ${detail}` : ""}`
    );
    this.group = group;
  }
}

export class ModelConfigurationError extends GatedDynamicsError {
  constructor(message: string) {
    super("MODEL_CONFIGURATION", message);
  }
}

/**
 * Non-fatal: a pole sits on or outside the unit circle.
 * Returned by the stability analyzer, never thrown by it.
 */
export class UnstableModelWarning extends GatedDynamicsError {
  readonly maxMagnitude: number;

  constructor(maxMagnitude: number) {
    super(
      "UNSTABLE_MODEL",
      `Closed loop has a pole with magnitude ${maxMagnitude.toFixed(4)} (>= 1)`
    );
    this.maxMagnitude = maxMagnitude;
  }
}
