/**
 * Experiment: a Trainer, an optional Evaluator and the metric streams derived
 * from them, saved and restored as one unit.
 *
 * After every training epoch (before the trainer's epochEnd hooks) the
 * experiment appends the epoch's train loss, runs the evaluator when due and
 * appends each defined metric. Hooks registered on the trainer therefore see
 * this epoch's values.
 */
import { Effect } from "effect";
import {
  ConfigError, StateError, getDict, isStateArray, isStateDict, positiveInt,
  type LoadOptions, type RestoreReport, type StateDict, type StateValue, type Stateful,
} from "@lockstep/core";
import type { Evaluator, EngineFailure, EngineStatus, Trainer } from "@lockstep/engine";
import { MetricStream, type HookContext, type Observable } from "@lockstep/hooks";

export const TRAIN_LOSS = "train loss";

export type MetricFn = () => number | undefined;

export interface ExperimentOptions<T, V, R> {
  readonly trainer: Trainer<T>;
  readonly evaluator?: Evaluator<V, R>;
  /** Named scalars read after each evaluation (or each epoch, without an evaluator). */
  readonly metrics?: Readonly<Record<string, MetricFn>>;
  /** Run the evaluator every N training epochs. */
  readonly evaluateEvery?: number;
}

export class Experiment<T, V = unknown, R = unknown> implements Stateful {
  readonly trainer: Trainer<T>;
  readonly evaluator: Evaluator<V, R> | undefined;
  readonly evaluateEvery: number;
  private readonly definitions = new Map<string, MetricFn>();
  private readonly streams = new Map<string, MetricStream>();
  // Trainer epoch at which each stream last received a value
  private readonly updatedAt = new Map<string, number>();

  constructor(options: ExperimentOptions<T, V, R>) {
    this.trainer = options.trainer;
    this.evaluator = options.evaluator;
    this.evaluateEvery = options.evaluateEvery ?? 1;
    positiveInt("evaluateEvery", this.evaluateEvery);

    this.define(TRAIN_LOSS, () => this.trainer.loss.value);
    for (const [name, fn] of Object.entries(options.metrics ?? {})) {
      if (name === TRAIN_LOSS) {
        throw new ConfigError({ message: `metric name "${TRAIN_LOSS}" is reserved` });
      }
      this.define(name, fn);
    }
    this.trainer.onEpochComplete((ctx) => this.afterEpoch(ctx));
  }

  private define(name: string, fn: MetricFn): void {
    this.definitions.set(name, fn);
    this.streams.set(name, new MetricStream(name));
  }

  run(): Effect.Effect<EngineStatus, EngineFailure> {
    return this.trainer.run();
  }

  metricNames(): string[] {
    return [...this.streams.keys()];
  }

  /** Full history of a metric. */
  metric(name: string): MetricStream {
    const stream = this.streams.get(name);
    if (!stream) {
      throw new ConfigError({
        message: `Unknown metric "${name}". Available: ${this.metricNames().join(", ")}`,
      });
    }
    return stream;
  }

  /**
   * The metric as seen by conditions: its newest value during an epoch that
   * produced one, undefined otherwise. Streak and best-so-far conditions then
   * count evaluations rather than epochs.
   */
  observe(name: string): Observable {
    const stream = this.metric(name);
    return {
      name,
      latest: () => (this.updatedAt.get(name) === this.trainer.epochs.value ? stream.latest() : undefined),
    };
  }

  private afterEpoch(ctx: HookContext): Effect.Effect<void, EngineFailure> {
    return Effect.gen(this, function* () {
      this.push(TRAIN_LOSS, this.trainer.loss.value ?? Number.NaN, ctx.epoch);

      const evaluate = ctx.epoch % this.evaluateEvery === 0;
      if (this.evaluator && evaluate) yield* this.evaluator.run();
      if (!this.evaluator || evaluate) {
        for (const [name, fn] of this.definitions) {
          if (name === TRAIN_LOSS) continue;
          const value = fn();
          if (value !== undefined) this.push(name, value, ctx.epoch);
        }
      }

      const parts: string[] = [];
      for (const [name, stream] of this.streams) {
        const v = this.updatedAt.get(name) === ctx.epoch ? stream.latest() : undefined;
        if (v !== undefined) parts.push(`${name}=${v.toFixed(4)}`);
      }
      yield* Effect.logInfo(
        `epoch ${ctx.epoch} | ${parts.join(" | ")} | ${Math.round(this.trainer.timer.value)}ms`,
      );
    });
  }

  private push(name: string, value: number, epoch: number): void {
    this.metric(name).push(value);
    this.updatedAt.set(name, epoch);
  }

  stateDict(): StateDict {
    const metrics: Record<string, StateValue> = {};
    for (const [name, stream] of this.streams) metrics[name] = [...stream.values()];
    const state: Record<string, StateValue> = { trainer: this.trainer.stateDict(), metrics };
    if (this.evaluator) state["evaluator"] = this.evaluator.stateDict();
    return state;
  }

  /**
   * Restore everything `stateDict()` produced. Nothing changes unless every
   * part is accepted: a rejected trainer state also rolls the evaluator back.
   */
  loadStateDict(state: StateDict, options: LoadOptions = {}): RestoreReport | void {
    const saved = getDict(state, "metrics");
    const restored = new Map<string, number[]>();
    for (const name of Object.keys(saved)) {
      if (!this.streams.has(name)) throw new StateError({ message: `saved metric "${name}" is not defined` });
    }
    for (const name of this.streams.keys()) {
      const values = saved[name];
      if (!isStateArray(values)) throw new StateError({ message: `no saved values for metric "${name}"` });
      const numbers: number[] = [];
      for (const v of values) {
        if (typeof v !== "number") throw new StateError({ message: `metric "${name}" holds a non-number` });
        numbers.push(v);
      }
      restored.set(name, numbers);
    }

    const evaluatorState = state["evaluator"];
    if (this.evaluator && !isStateDict(evaluatorState)) {
      throw new StateError({ message: "saved state has no evaluator" });
    }
    if (!this.evaluator && evaluatorState !== undefined) {
      throw new StateError({ message: "saved state has an evaluator but this experiment does not" });
    }
    const trainerState = getDict(state, "trainer");

    const evaluatorBefore = this.evaluator?.stateDict();
    try {
      if (this.evaluator && isStateDict(evaluatorState)) this.evaluator.loadStateDict(evaluatorState);
      const report = this.trainer.loadStateDict(trainerState, options);
      for (const [name, values] of restored) this.metric(name).restore(values);
      this.updatedAt.clear();
      return report;
    } catch (e) {
      if (this.evaluator && evaluatorBefore) this.evaluator.loadStateDict(evaluatorBefore);
      throw e;
    }
  }
}
