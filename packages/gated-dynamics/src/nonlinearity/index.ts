export { solveLinearSystem, leastSquares } from "./least-squares";
export {
  type PolynomialOrder,
  type Correction,
  orderOf,
  applyCorrection,
  fitBias,
  fitPolynomialCorrection,
} from "./polynomial";
export {
  type LearnerPhase,
  type StateSequence,
  type TanhStateConfig,
  defaultTanhStateConfig,
  TanhStateLearner,
} from "./tanh-state";
