/**
 * Shared fixtures for the suites: in-memory batch sources, a scalar model, a
 * recording optimizer and temp-directory / Effect runners.
 */
import { Effect, Layer } from "effect";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { Batch, BatchSource, Module, Optimizer, OptimizerState, TensorData } from "@lockstep/core";
import { silentLogging } from "@lockstep/effect-runtime";

export function run<A, E>(effect: Effect.Effect<A, E>, logging: Layer.Layer<never> = silentLogging): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(logging)));
}

/** Run an effect that is expected to fail; resolves with its error. */
export function runFail<A, E>(effect: Effect.Effect<A, E>, logging: Layer.Layer<never> = silentLogging): Promise<E> {
  return Effect.runPromise(Effect.flip(effect).pipe(Effect.provide(logging)));
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "lockstep-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function listNames(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export function get<K, V>(map: ReadonlyMap<K, V>, key: K): V {
  const v = map.get(key);
  if (v === undefined) throw new Error(`missing ${String(key)}`);
  return v;
}

/** Replays the same values every epoch, `perBatch` values per batch. */
export function arraySource<T>(values: readonly T[], perBatch = 1): BatchSource<T[]> & { readonly epochsServed: number[] } {
  const epochsServed: number[] = [];
  return {
    epochsServed,
    async *batches(epoch: number) {
      epochsServed.push(epoch);
      for (let i = 0; i < values.length; i += perBatch) {
        const chunk = values.slice(i, i + perBatch);
        yield { ids: chunk.map((_, j) => `b${i + j}`), data: chunk };
      }
    },
  };
}

export const emptySource: BatchSource<number[]> = {
  async *batches() {},
};

/** A model with one named scalar parameter per entry. */
export class ScalarModel implements Module {
  readonly name = "scalars";
  private readonly params = new Map<string, TensorData>();

  constructor(init: Record<string, number[]>) {
    for (const [name, values] of Object.entries(init)) {
      this.params.set(name, { shape: [values.length], data: Float32Array.from(values) });
    }
  }

  parameters(): ReadonlyMap<string, TensorData> {
    return this.params;
  }

  values(name: string): number[] {
    return Array.from(get(this.params, name).data);
  }
}

export interface RecordedStep {
  readonly grads: Record<string, number[]>;
  readonly gradScale: number;
}

/** Records every step and applies plain `p -= lr * scale * g`. */
export class RecordingOptimizer implements Optimizer {
  readonly name = "recording";
  readonly steps: RecordedStep[] = [];
  private stepCount = 0;

  constructor(private readonly lr = 1) {}

  step(params: ReadonlyMap<string, TensorData>, grads: ReadonlyMap<string, TensorData>, gradScale = 1): void {
    this.stepCount++;
    const recorded: Record<string, number[]> = {};
    for (const [name, g] of grads) {
      recorded[name] = Array.from(g.data);
      const p = params.get(name);
      if (!p) continue;
      for (let i = 0; i < p.data.length; i++) p.data[i] -= this.lr * gradScale * g.data[i];
    }
    this.steps.push({ grads: recorded, gradScale });
  }

  stateDict(): OptimizerState {
    return { step: this.stepCount, buffers: new Map(), scalars: { lr: this.lr } };
  }

  loadStateDict(state: OptimizerState): void {
    this.stepCount = state.step;
  }
}

/** Gradient of each batch = its values, loss = their mean. */
export function meanStep(paramName: string) {
  return (_model: Module, batch: Batch<number[]>) => ({
    loss: batch.data.reduce((a, b) => a + b, 0) / batch.data.length,
    grads: new Map<string, TensorData>([
      [paramName, { shape: [1], data: Float32Array.of(batch.data.reduce((a, b) => a + b, 0)) }],
    ]),
  });
}
