export {
  type FrictionEllipseConfig,
  type IntegratorKind,
  defaultFrictionEllipseConfig,
  effectiveFriction,
  saturateFrictionEllipse,
  saturateFrictionEllipseTensor,
  integrate,
  integrateTensor,
} from "./vehicle";
export {
  type ForwardModelConfig,
  type ForwardModelConfigInput,
  type NonlinearityCriteria,
  type NonlinearityReport,
  type StepDiagnostics,
  defaultForwardModelConfig,
  ForwardModel,
} from "./forward";
export {
  type InverseModelConfig,
  type TransferFunction,
  defaultInverseModelConfig,
  InverseModel,
} from "./inverse";
