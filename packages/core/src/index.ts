export {
  ConfigError, CheckpointError, StateError, DataError, FeederError, OptimizerError,
  BatchError, HookError, describeCause, type HookFailure,
} from "./errors.js";
export type {
  TensorData, Module, Optimizer, OptimizerState, Rng, Batch, BatchSource,
} from "./interfaces.js";
export {
  shapeSize, sameShape, logLevelNames, defaultTrainConfig,
  type Shape, type LogLevelName, type TrainConfig,
} from "./types.js";
export { loadTrainConfig, mergeTrainConfig, validateTrainConfig, positiveInt } from "./config.js";
export {
  isTensorData, isStateDict, isStateArray,
  getNumber, getNullableNumber, getString, getDict, getTensorMap, getNumberMap,
  tensorMapToState,
  type StateValue, type StateDict, type Stateful, type LoadOptions,
} from "./state.js";
export { restoreParams, type RestoreReport, type DroppedParam } from "./params.js";
export { SeededRng, deriveSeed } from "./rng.js";
export { hashConfig, runId } from "./hash.js";
export { Registry } from "./registry.js";
