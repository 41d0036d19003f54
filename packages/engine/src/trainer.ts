/**
 * Trainer: an Engine whose compute step produces a loss and gradients, applied
 * to the model through the optimizer once every `iterationsPerUpdate` batches.
 */
import { Effect } from "effect";
import {
  OptimizerError, describeCause, getDict, getNumber, getNumberMap, getTensorMap,
  positiveInt, restoreParams, tensorMapToState,
  type Batch, type LoadOptions, type Module, type Optimizer, type RestoreReport, type StateDict, type TensorData,
} from "@lockstep/core";
import { Engine, type EngineOptions } from "./engine.js";
import { RunningAverageMeter, TimeMeter } from "./meters.js";

export interface TrainStepOutput {
  readonly loss: number;
  /** Gradients keyed like `model.parameters()`. */
  readonly grads: ReadonlyMap<string, TensorData>;
}

export type TrainStep<T> = (model: Module, batch: Batch<T>) => TrainStepOutput | Promise<TrainStepOutput>;

export interface TrainerOptions<T> extends EngineOptions<T> {
  readonly model: Module;
  readonly optimizer: Optimizer;
  readonly step: TrainStep<T>;
  readonly iterationsPerUpdate?: number;
}

export class Trainer<T> extends Engine<T> {
  readonly model: Module;
  readonly optimizer: Optimizer;
  readonly iterationsPerUpdate: number;
  readonly loss = new RunningAverageMeter("train loss");
  readonly timer = new TimeMeter("epoch time");
  private readonly step: TrainStep<T>;
  // Gradient sums over the current update window
  private readonly accumulated = new Map<string, Float32Array>();
  private pending = 0;

  constructor(options: TrainerOptions<T>) {
    super(options);
    this.model = options.model;
    this.optimizer = options.optimizer;
    this.step = options.step;
    this.iterationsPerUpdate = options.iterationsPerUpdate ?? 1;
    positiveInt(`${this.name}.iterationsPerUpdate`, this.iterationsPerUpdate);
  }

  /** Batches accumulated since the last optimizer update. */
  get pendingBatches(): number {
    return this.pending;
  }

  protected beginEpoch(): void {
    this.loss.reset();
    this.timer.reset();
  }

  protected processBatch(batch: Batch<T>): Effect.Effect<void, unknown> {
    return Effect.gen(this, function* () {
      const out = yield* Effect.tryPromise({
        try: async () => this.step(this.model, batch),
        catch: (e) => e,
      });
      if (Number.isFinite(out.loss)) {
        this.loss.add(out.loss);
        yield* Effect.try({ try: () => this.accumulate(out.grads), catch: (e) => e });
      } else {
        yield* Effect.logWarning(
          `${this.name}: loss=${out.loss} on batch [${batch.ids.join(", ")}], skipping its gradients`,
        );
      }
      this.pending++;
      if (this.pending >= this.iterationsPerUpdate) yield* this.applyUpdate();
    });
  }

  private accumulate(grads: ReadonlyMap<string, TensorData>): void {
    for (const [name, g] of grads) {
      const acc = this.accumulated.get(name);
      if (!acc) {
        this.accumulated.set(name, new Float32Array(g.data));
        continue;
      }
      if (acc.length !== g.data.length) {
        throw new OptimizerError({
          message: `gradient "${name}" has ${g.data.length} elements, window so far has ${acc.length}`,
        });
      }
      for (let i = 0; i < acc.length; i++) acc[i] += g.data[i];
    }
  }

  private applyUpdate(): Effect.Effect<void, OptimizerError> {
    return Effect.gen(this, function* () {
      const window = this.pending;
      this.pending = 0;
      if (this.accumulated.size === 0) {
        yield* Effect.logWarning(`${this.name}: no finite gradients in the last ${window} batch(es), skipping update`);
        return;
      }
      const params = this.model.parameters();
      const grads = new Map<string, TensorData>();
      for (const [name, data] of this.accumulated) {
        grads.set(name, { shape: params.get(name)?.shape ?? [data.length], data });
      }
      yield* Effect.try({
        try: () => this.optimizer.step(params, grads, 1 / window),
        catch: (e) => new OptimizerError({ message: `${this.optimizer.name} step failed: ${describeCause(e)}`, cause: e }),
      });
      this.accumulated.clear();
    });
  }

  stateDict(): StateDict {
    const opt = this.optimizer.stateDict();
    const accumulated = new Map<string, TensorData>();
    for (const [name, data] of this.accumulated) accumulated.set(name, { shape: [data.length], data });
    return {
      ...super.stateDict(),
      model: tensorMapToState(this.model.parameters()),
      optimizer: {
        name: this.optimizer.name,
        step: opt.step,
        scalars: { ...opt.scalars },
        buffers: tensorMapToState(opt.buffers),
      },
      accumulator: { pending: this.pending, grads: tensorMapToState(accumulated) },
    };
  }

  protected restore(state: StateDict, options: LoadOptions): RestoreReport {
    const params = getTensorMap(state, "model");
    const opt = getDict(state, "optimizer");
    const step = getNumber(opt, "step");
    const scalars = getNumberMap(opt, "scalars");
    const buffers = getTensorMap(opt, "buffers");
    const acc = getDict(state, "accumulator");
    const pending = getNumber(acc, "pending");
    const grads = getTensorMap(acc, "grads");

    super.restore(state, options);
    const report = restoreParams(this.model, params, options.strict ?? true);
    const dropped = new Set(report.dropped.map((d) => d.name));

    this.optimizer.loadStateDict({
      step,
      scalars,
      buffers: new Map([...buffers].filter(([key]) => !dropped.has(bufferParam(key)))),
    });

    this.pending = pending;
    this.accumulated.clear();
    for (const [name, t] of grads) {
      if (!dropped.has(name)) this.accumulated.set(name, new Float32Array(t.data));
    }
    return report;
  }
}

/** Optimizer buffers are keyed `<parameter>.<slot>`. */
function bufferParam(key: string): string {
  const dot = key.lastIndexOf(".");
  return dot < 0 ? key : key.slice(0, dot);
}
