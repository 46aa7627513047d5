export {
  type ModelConfig,
  type ModelConfigInput,
  signalRefSchema,
  membershipFunctionSchema,
  fuzzySetSchema,
  localModelSchema,
  activationSchema,
  gateSchema,
  frictionEllipseSchema,
  modelConfigSchema,
  parseModelConfig,
  loadModelConfig,
} from "./schema";
export {
  toFuzzySet,
  buildForwardModel,
  buildInverseModel,
  buildAugmenter,
  buildStabilityAnalyzer,
} from "./build";
