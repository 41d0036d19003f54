/**
 * Synthetic regression data: y = x·w* + b* + noise, for smoke-testing a training loop.
 */
import { SeededRng, type TensorData } from "@lockstep/core";
import type { RegressionBatch } from "./linear.js";

export interface RegressionSample {
  readonly id: string;
  readonly x: readonly number[];
  readonly y: number;
}

export interface SyntheticConfig {
  samples: number;
  features: number;
  noise: number;
  seed: number;
}

export interface SyntheticTask {
  readonly trueWeights: readonly number[];
  readonly trueBias: number;
  readonly samples: readonly RegressionSample[];
}

export function syntheticRegression(config: SyntheticConfig): SyntheticTask {
  const rng = new SeededRng(config.seed);
  const trueWeights = Array.from({ length: config.features }, () => rng.nextGauss());
  const trueBias = rng.nextGauss();
  const samples: RegressionSample[] = [];
  for (let n = 0; n < config.samples; n++) {
    const x = Array.from({ length: config.features }, () => rng.nextGauss());
    let y = trueBias;
    for (let i = 0; i < x.length; i++) y += x[i] * trueWeights[i];
    samples.push({ id: `s${n}`, x, y: y + config.noise * rng.nextGauss() });
  }
  return { trueWeights, trueBias, samples };
}

/**
 * Stack samples into a batch. `jitter` adds Gaussian input noise drawn from the
 * worker's RNG (a stand-in for augmentation).
 */
export function collateRegression(jitter = 0) {
  return (items: readonly RegressionSample[], rng: SeededRng): RegressionBatch => {
    const features = items.length > 0 ? items[0].x.length : 0;
    const x = new Float32Array(items.length * features);
    const y = new Float32Array(items.length);
    items.forEach((s, r) => {
      for (let i = 0; i < features; i++) {
        x[r * features + i] = s.x[i] + (jitter > 0 ? jitter * rng.nextGauss() : 0);
      }
      y[r] = s.y;
    });
    const inputs: TensorData = { shape: [items.length, features], data: x };
    const targets: TensorData = { shape: [items.length, 1], data: y };
    return { inputs, targets };
  };
}
