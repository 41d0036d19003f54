/**
 * Linear layer y = x·Wᵀ + b with a hand-derived mean-squared-error step.
 */
import { DataError, SeededRng, type Batch, type Module, type TensorData } from "@lockstep/core";
import type { TrainStepOutput } from "@lockstep/engine";

export interface LinearConfig {
  inFeatures: number;
  outFeatures: number;
  seed?: number;
  /** Std-dev of the Gaussian weight init (default 1/sqrt(inFeatures)). */
  initScale?: number;
}

export class Linear implements Module {
  readonly name: string;
  readonly inFeatures: number;
  readonly outFeatures: number;
  readonly weight: TensorData;
  readonly bias: TensorData;

  constructor(name: string, config: LinearConfig) {
    this.name = name;
    this.inFeatures = config.inFeatures;
    this.outFeatures = config.outFeatures;
    const rng = new SeededRng(config.seed ?? 42);
    const scale = config.initScale ?? 1 / Math.sqrt(config.inFeatures);
    const w = new Float32Array(config.outFeatures * config.inFeatures);
    for (let i = 0; i < w.length; i++) w[i] = rng.nextGauss() * scale;
    this.weight = { shape: [config.outFeatures, config.inFeatures], data: w };
    this.bias = { shape: [config.outFeatures], data: new Float32Array(config.outFeatures) };
  }

  parameters(): ReadonlyMap<string, TensorData> {
    return new Map([
      [`${this.name}.weight`, this.weight],
      [`${this.name}.bias`, this.bias],
    ]);
  }

  /** inputs [B, in] → outputs [B, out] */
  forward(inputs: TensorData): TensorData {
    const [rows, cols] = inputs.shape;
    if (inputs.shape.length !== 2 || cols !== this.inFeatures) {
      throw new DataError({ message: `${this.name}: expected inputs [B, ${this.inFeatures}], got [${inputs.shape.join(", ")}]` });
    }
    const out = new Float32Array(rows * this.outFeatures);
    const w = this.weight.data;
    const b = this.bias.data;
    for (let r = 0; r < rows; r++) {
      for (let o = 0; o < this.outFeatures; o++) {
        let s = b[o];
        for (let i = 0; i < cols; i++) s += inputs.data[r * cols + i] * w[o * cols + i];
        out[r * this.outFeatures + o] = s;
      }
    }
    return { shape: [rows, this.outFeatures], data: out };
  }
}

export interface RegressionBatch {
  /** [B, in] */
  readonly inputs: TensorData;
  /** [B, out] */
  readonly targets: TensorData;
}

/** Mean squared error over every output element, with gradients for W and b. */
export function mseStep(layer: Linear, batch: Batch<RegressionBatch>): TrainStepOutput {
  const { inputs, targets } = batch.data;
  const pred = layer.forward(inputs);
  if (pred.data.length !== targets.data.length) {
    throw new DataError({ message: `targets [${targets.shape.join(", ")}] do not match predictions [${pred.shape.join(", ")}]` });
  }
  const rows = inputs.shape[0];
  const cols = layer.inFeatures;
  const outs = layer.outFeatures;
  const n = pred.data.length;

  const gw = new Float32Array(layer.weight.data.length);
  const gb = new Float32Array(outs);
  let loss = 0;
  for (let r = 0; r < rows; r++) {
    for (let o = 0; o < outs; o++) {
      const err = pred.data[r * outs + o] - targets.data[r * outs + o];
      loss += err * err;
      const g = (2 * err) / n;
      gb[o] += g;
      for (let i = 0; i < cols; i++) gw[o * cols + i] += g * inputs.data[r * cols + i];
    }
  }

  return {
    loss: loss / n,
    grads: new Map([
      [`${layer.name}.weight`, { shape: layer.weight.shape, data: gw }],
      [`${layer.name}.bias`, { shape: layer.bias.shape, data: gb }],
    ]),
  };
}
