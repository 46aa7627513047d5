export {
  type Complex,
  complex,
  cadd,
  csub,
  cmul,
  cdiv,
  cabs,
  polyval,
} from "./complex";
export { type RootOptions, defaultRootOptions, polynomialRoots } from "./roots";
export {
  type StabilityConfig,
  type Pole,
  type StabilityVerdict,
  type StabilityReport,
  type TransferFunctionSource,
  defaultStabilityConfig,
  StabilityAnalyzer,
} from "./analyzer";
