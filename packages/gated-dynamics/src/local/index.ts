export { type StepContext, SignalHistory } from "./context";
export {
  type NonlinearityFamily,
  type FirModelSpec,
  type MlpModelSpec,
  type LocalModelSpec,
  type LocalModel,
  FirLocalModel,
  MlpLocalModel,
  createLocalModel,
} from "./local-model";
export { LocalModelBank } from "./bank";
