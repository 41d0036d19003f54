/**
 * Evaluator: one pass over a validation source per run(), feeding each step's
 * result into the tracked meters.
 */
import { Effect } from "effect";
import type { Batch } from "@lockstep/core";
import { Engine, type EngineOptions } from "./engine.js";
import type { Meter } from "./meters.js";

export type EvalStep<T, R> = (batch: Batch<T>) => R | Promise<R>;

export interface EvaluatorOptions<T, R> extends EngineOptions<T> {
  readonly step: EvalStep<T, R>;
}

interface Tracked<R> {
  readonly meter: Meter;
  readonly update: (result: R, batch: Batch<unknown>) => void;
}

export class Evaluator<T, R> extends Engine<T> {
  private readonly step: EvalStep<T, R>;
  private readonly tracked: Tracked<R>[] = [];

  constructor(options: EvaluatorOptions<T, R>) {
    super(options);
    this.step = options.step;
  }

  /** Reset `meter` at every pass and call `update` with each batch's result. */
  track<M extends Meter>(meter: M, update: (meter: M, result: R, batch: Batch<unknown>) => void): M {
    this.tracked.push({ meter, update: (result, batch) => update(meter, result, batch) });
    return meter;
  }

  meters(): readonly Meter[] {
    return this.tracked.map((t) => t.meter);
  }

  protected beginEpoch(): void {
    for (const t of this.tracked) t.meter.reset();
  }

  protected epochsPerRun(): number {
    return 1;
  }

  protected processBatch(batch: Batch<T>): Effect.Effect<void, unknown> {
    return Effect.tryPromise({
      try: async () => {
        const result = await this.step(batch);
        for (const t of this.tracked) t.update(result, batch);
      },
      catch: (e) => e,
    });
  }
}
