export { EngineEvent, engineEvents } from "./events.js";
export {
  Engine,
  type EngineStatus, type EngineFailure, type EpochFinalizer, type EngineOptions,
} from "./engine.js";
export { Trainer, type TrainerOptions, type TrainStep, type TrainStepOutput } from "./trainer.js";
export { Evaluator, type EvaluatorOptions, type EvalStep } from "./evaluator.js";
export {
  RunningAverageMeter, TimeMeter, SequenceErrorMeter, editDistance, type Meter,
} from "./meters.js";
export { DataLoader, type DataLoaderOptions, type Collate } from "./data.js";
export { BaseFeeder, ItemFeeder, TensorFeeder, feeder, type Feeder } from "./feeders.js";
