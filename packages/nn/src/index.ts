export { Linear, mseStep, type LinearConfig, type RegressionBatch } from "./linear.js";
export {
  SGD, AdamW, createOptimizerRegistry,
  type SGDConfig, type AdamWConfig, type OptimizerSettings,
} from "./optimizers.js";
export {
  syntheticRegression, collateRegression,
  type RegressionSample, type SyntheticConfig, type SyntheticTask,
} from "./synthetic.js";
