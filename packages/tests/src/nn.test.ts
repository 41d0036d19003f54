import { describe, it, expect } from "vitest";
import { DataLoader, Trainer } from "@lockstep/engine";
import { Experiment } from "@lockstep/experiment";
import { Linear, SGD, collateRegression, mseStep, syntheticRegression } from "@lockstep/nn";
import { DataError, SeededRng } from "@lockstep/core";
import { run } from "./helpers.js";

describe("Linear", () => {
  it("computes x·Wᵀ + b", () => {
    const layer = new Linear("fc", { inFeatures: 2, outFeatures: 1 });
    layer.weight.data.set([1, 2]);
    layer.bias.data.set([0.5]);
    const y = layer.forward({ shape: [2, 2], data: Float32Array.of(1, 1, 0, -1) });
    expect(y.shape).toEqual([2, 1]);
    expect(Array.from(y.data)).toEqual([3.5, -1.5]);
    expect([...layer.parameters().keys()]).toEqual(["fc.weight", "fc.bias"]);
  });

  it("rejects inputs of the wrong width", () => {
    const layer = new Linear("fc", { inFeatures: 2, outFeatures: 1 });
    expect(() => layer.forward({ shape: [1, 3], data: new Float32Array(3) })).toThrow(DataError);
  });
});

describe("mseStep", () => {
  it("returns the loss and its gradients", () => {
    const layer = new Linear("fc", { inFeatures: 2, outFeatures: 1 });
    layer.weight.data.set([1, 2]);
    layer.bias.data.set([0.5]);
    const out = mseStep(layer, {
      ids: ["s0"],
      data: {
        inputs: { shape: [1, 2], data: Float32Array.of(1, 1) },
        targets: { shape: [1, 1], data: Float32Array.of(4) },
      },
    });
    // prediction 3.5, error -0.5
    expect(out.loss).toBe(0.25);
    expect(Array.from(out.grads.get("fc.weight")?.data ?? [])).toEqual([-1, -1]);
    expect(Array.from(out.grads.get("fc.bias")?.data ?? [])).toEqual([-1]);
  });
});

describe("synthetic regression", () => {
  it("is reproducible from its seed", () => {
    const a = syntheticRegression({ samples: 4, features: 3, noise: 0.1, seed: 5 });
    const b = syntheticRegression({ samples: 4, features: 3, noise: 0.1, seed: 5 });
    expect(a).toEqual(b);
    expect(a.samples.map((s) => s.id)).toEqual(["s0", "s1", "s2", "s3"]);
  });

  it("collates samples into input and target tensors", () => {
    const { samples } = syntheticRegression({ samples: 3, features: 2, noise: 0, seed: 1 });
    const batch = collateRegression()(samples, new SeededRng(0));
    expect(batch.inputs.shape).toEqual([3, 2]);
    expect(batch.targets.shape).toEqual([3, 1]);
    expect(batch.targets.data[2]).toBeCloseTo(samples[2].y, 5);
  });

  it("trains a linear model down to a small loss", async () => {
    const task = syntheticRegression({ samples: 64, features: 2, noise: 0, seed: 3 });
    const layer = new Linear("fc", { inFeatures: 2, outFeatures: 1, seed: 11 });
    const trainer = new Trainer({
      name: "train",
      batches: new DataLoader({ items: task.samples, batchSize: 8, shuffle: true, collate: collateRegression() }),
      model: layer,
      optimizer: new SGD({ lr: 0.1 }),
      step: (_model, batch) => mseStep(layer, batch),
      maxEpochs: 20,
    });
    const experiment = new Experiment({ trainer });
    await run(experiment.run());

    const losses = experiment.metric("train loss").values();
    expect(losses).toHaveLength(20);
    expect(losses[19]).toBeLessThan(losses[0] / 10);
  });
});
