export { Experiment, TRAIN_LOSS, type ExperimentOptions, type MetricFn } from "./experiment.js";
export { ErrorRateMeter, delimiters, splitWords, type WordDelimiterPolicy } from "./error-rate.js";
export {
  configureTraining, resumeExperiment, metricSlug,
  type TrainingPolicy, type ConfiguredTraining,
} from "./setup.js";
