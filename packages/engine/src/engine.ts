/**
 * Engine core: drives epochs over a batch source and fires lifecycle hooks.
 *
 * The engine only sequences things. What a batch means is up to the subclass
 * (Trainer, Evaluator), and what happens at each event is up to the hooks
 * registered against it. Everything runs on one fiber: hooks, checkpoint I/O and
 * compute steps never overlap.
 *
 *   idle ──run()──▶ running ──stop() honoured at epoch boundary──▶ stopped
 *                          ├──horizon reached / source drained────▶ exhausted
 *                          └──batch, hook or source failure───────▶ failed
 */
import { Effect } from "effect";
import {
  BatchError, DataError, StateError, describeCause, getDict, getNumber, isStateArray, positiveInt,
  type Batch, type BatchSource, type HookError, type LoadOptions, type RestoreReport,
  type StateDict, type StateValue, type Stateful,
} from "@lockstep/core";
import { Counter, HookList, type Hook, type HookContext } from "@lockstep/hooks";
import { EngineEvent } from "./events.js";

export type EngineStatus = "idle" | "running" | "stopped" | "exhausted" | "failed";

export type EngineFailure = BatchError | HookError | DataError;

/** Work that must happen after an epoch's batches and before its epochEnd hooks. */
export type EpochFinalizer = (ctx: HookContext) => Effect.Effect<void, EngineFailure>;

export interface EngineOptions<T> {
  readonly name: string;
  readonly batches: BatchSource<T>;
  /** Explicit horizon: the run ends `exhausted` once this many epochs have completed. */
  readonly maxEpochs?: number | null;
}

export abstract class Engine<T> implements Stateful {
  readonly name: string;
  readonly epochs = new Counter("epochs");
  readonly iterations = new Counter("iterations");
  protected readonly source: BatchSource<T>;
  private readonly maxEpochs: number | null;
  private readonly hooks = new Map<string, HookList>();
  private readonly finalizers: EpochFinalizer[] = [];
  private _status: EngineStatus = "idle";
  private stopRequested = false;

  constructor(options: EngineOptions<T>) {
    this.name = options.name;
    this.source = options.batches;
    this.maxEpochs = options.maxEpochs ?? null;
    if (this.maxEpochs !== null) positiveInt(`${this.name}.maxEpochs`, this.maxEpochs);
  }

  /** Process one batch. Any failure is reported as a BatchError carrying the batch ids. */
  protected abstract processBatch(batch: Batch<T>): Effect.Effect<void, unknown>;

  /** Called before epochStart hooks fire; subclasses reset per-epoch meters here. */
  protected beginEpoch(): void {}

  /** Upper bound on epochs per run() call (null = until stopped or exhausted). */
  protected epochsPerRun(): number | null {
    return null;
  }

  get status(): EngineStatus {
    return this._status;
  }

  addHook(event: EngineEvent, hook: Hook): this {
    this.hookList(event).add(hook);
    return this;
  }

  hookList(event: EngineEvent): HookList {
    let list = this.hooks.get(event);
    if (!list) {
      list = new HookList();
      this.hooks.set(event, list);
    }
    return list;
  }

  onEpochComplete(finalizer: EpochFinalizer): this {
    this.finalizers.push(finalizer);
    return this;
  }

  /** Request a stop. The current epoch finishes; the next one never starts. */
  stop(): void {
    this.stopRequested = true;
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  run(): Effect.Effect<EngineStatus, EngineFailure> {
    return Effect.gen(this, function* () {
      this._status = "running";
      yield* Effect.logDebug(`${this.name}: running from epoch ${this.epochs.value}`);
      yield* this.fire(EngineEvent.Start);

      const limit = this.epochsPerRun();
      let ran = 0;
      let status: EngineStatus = "running";
      while (status === "running") {
        if (this.stopRequested) {
          status = "stopped";
        } else if (this.maxEpochs !== null && this.epochs.value >= this.maxEpochs) {
          status = "exhausted";
        } else if (limit !== null && ran >= limit) {
          status = "exhausted";
        } else {
          const processed = yield* this.runEpoch();
          if (processed === 0) status = "exhausted";
          ran++;
        }
      }

      this.stopRequested = false;
      this._status = status;
      yield* this.fire(EngineEvent.End);
      yield* Effect.logDebug(
        `${this.name}: ${status} after ${this.epochs.value} epoch(s), ${this.iterations.value} iteration(s)`,
      );
      return status;
    }).pipe(
      Effect.onError(() => Effect.sync(() => {
        this.stopRequested = false;
        this._status = "failed";
      })),
    );
  }

  protected context(event: EngineEvent): HookContext {
    return { event, epoch: this.epochs.value, iteration: this.iterations.value };
  }

  private fire(event: EngineEvent): Effect.Effect<void, HookError> {
    const list = this.hooks.get(event);
    if (!list || list.size === 0) return Effect.void;
    return Effect.asVoid(list.fire(this.context(event)));
  }

  /** One pass over the source. Succeeds with the number of batches processed. */
  private runEpoch(): Effect.Effect<number, EngineFailure> {
    return Effect.gen(this, function* () {
      this.beginEpoch();
      yield* this.fire(EngineEvent.EpochStart);

      const epoch = this.epochs.value;
      const iterator = this.source.batches(epoch)[Symbol.asyncIterator]();
      const close = Effect.tryPromise(async () => {
        await iterator.return?.();
      }).pipe(
        Effect.catchAll((e) => Effect.logWarning(`${this.name}: closing batch source failed: ${describeCause(e)}`)),
      );

      const processed = yield* Effect.ensuring(
        Effect.gen(this, function* () {
          let count = 0;
          for (;;) {
            const next = yield* Effect.tryPromise({
              try: () => iterator.next(),
              catch: (e) => new DataError({
                message: `${this.name}: batch source failed during epoch ${epoch + 1}: ${describeCause(e)}`,
                cause: e,
              }),
            });
            if (next.done) break;
            yield* this.runIteration(next.value);
            count++;
          }
          return count;
        }),
        close,
      );

      if (processed === 0) {
        yield* Effect.logDebug(`${this.name}: batch source yielded nothing for epoch ${epoch + 1}`);
        return 0;
      }

      this.epochs.increment();
      for (const finalize of this.finalizers) {
        yield* finalize(this.context(EngineEvent.EpochEnd));
      }
      yield* this.fire(EngineEvent.EpochEnd);
      return processed;
    });
  }

  private runIteration(batch: Batch<T>): Effect.Effect<void, EngineFailure> {
    return Effect.gen(this, function* () {
      yield* this.fire(EngineEvent.IterationStart);
      const epoch = this.epochs.value + 1;
      const iteration = this.iterations.value + 1;
      yield* this.processBatch(batch).pipe(
        Effect.mapError((cause) => new BatchError({
          message: `${this.name}: batch [${batch.ids.join(", ")}] failed at epoch ${epoch}, iteration ${iteration}: ${describeCause(cause)}`,
          engine: this.name,
          batchIds: batch.ids,
          epoch,
          iteration,
          cause,
        })),
        Effect.tapError((e) => Effect.logError(e.message)),
      );
      this.iterations.increment();
      yield* this.fire(EngineEvent.IterationEnd);
    });
  }

  stateDict(): StateDict {
    const hooks: Record<string, StateValue> = {};
    for (const [event, list] of this.hooks) {
      if (list.size > 0) hooks[event] = list.stateDict();
    }
    return { epochs: this.epochs.value, iterations: this.iterations.value, hooks };
  }

  /**
   * Restore a saved state. All or nothing: if any part is rejected the engine
   * is put back exactly as it was before the call.
   */
  loadStateDict(state: StateDict, options: LoadOptions = {}): RestoreReport | void {
    const before = this.stateDict();
    try {
      return this.restore(state, options);
    } catch (e) {
      this.restore(before, { strict: true });
      throw e;
    }
  }

  /** Apply `state` field by field. May throw part way; loadStateDict rolls back. */
  protected restore(state: StateDict, _options: LoadOptions): RestoreReport | void {
    const hooks = getDict(state, "hooks");
    for (const event of Object.keys(hooks)) {
      const list = this.hooks.get(event);
      if (!list || list.size === 0) {
        throw new StateError({ message: `${this.name}: saved state has ${event} hooks that are not registered` });
      }
    }
    for (const [event, list] of this.hooks) {
      if (list.size === 0) continue;
      const saved = hooks[event];
      if (!isStateArray(saved)) {
        throw new StateError({ message: `${this.name}: no saved state for ${event} hooks` });
      }
      list.loadStateDict(saved);
    }
    this.epochs.set(getNumber(state, "epochs"));
    this.iterations.set(getNumber(state, "iterations"));
    this.stopRequested = false;
    this._status = "idle";
  }
}
