export {
  type MembershipFunction,
  type FuzzySet,
  defaultFuzzySetOptions,
  evaluateMembership,
  validateMembership,
  validateFuzzySet,
  uniformTriangularSet,
} from "./membership";
export { encode, isPartitionOfUnity, MembershipEncoder } from "./encoder";
