export {
  type ActivationSpec,
  type GateSpec,
  type GateValue,
  type Gate,
  MembershipGate,
  ConstantGate,
  ControlRuleGate,
  LearnedGate,
  createGate,
} from "./gate";
export {
  type CombineOptions,
  type TermTensor,
  type CombinedTensors,
  type TermContribution,
  type SuperpositionResult,
  combineTensors,
  combine,
  SuperpositionCombiner,
} from "./combiner";
