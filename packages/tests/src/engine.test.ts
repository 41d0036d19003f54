import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { Engine, EngineEvent, engineEvents, type EngineOptions } from "@lockstep/engine";
import { Always, GEqThan, Hook, action, named, type HookContext } from "@lockstep/hooks";
import { BatchError, HookError, StateError, type Batch } from "@lockstep/core";
import { captureLogging, type CapturedLine } from "@lockstep/effect-runtime";
import { arraySource, emptySource, run, runFail } from "./helpers.js";

class Recorder extends Engine<number[]> {
  readonly seen: number[] = [];
  failOn: number | undefined;

  constructor(options: EngineOptions<number[]>) {
    super(options);
  }

  protected processBatch(batch: Batch<number[]>): Effect.Effect<void, unknown> {
    return Effect.suspend(() => {
      if (this.failOn !== undefined && batch.data.includes(this.failOn)) {
        return Effect.fail(new Error("bad sample"));
      }
      this.seen.push(...batch.data);
      return Effect.void;
    });
  }
}

function trace(engine: Recorder, log: string[]): void {
  for (const event of engineEvents) {
    engine.addHook(event, new Hook(new Always(), action((c: HookContext) => {
      log.push(`${c.event}:${c.epoch}:${c.iteration}`);
    })));
  }
}

describe("Engine", () => {
  it("fires events in order with completed-epoch counts", async () => {
    const engine = new Recorder({ name: "rec", batches: arraySource([1, 2]), maxEpochs: 1 });
    const log: string[] = [];
    trace(engine, log);

    expect(await run(engine.run())).toBe("exhausted");
    expect(log).toEqual([
      "start:0:0",
      "epochStart:0:0",
      "iterationStart:0:0",
      "iterationEnd:0:1",
      "iterationStart:0:1",
      "iterationEnd:0:2",
      "epochEnd:1:2",
      "end:1:2",
    ]);
    expect(engine.seen).toEqual([1, 2]);
  });

  it("honours stop() at the next epoch boundary", async () => {
    const engine = new Recorder({ name: "rec", batches: arraySource([1, 2, 3]) });
    engine.addHook(EngineEvent.IterationEnd, new Hook(
      new GEqThan(engine.iterations, 1),
      action(() => engine.stop()),
    ));
    expect(await run(engine.run())).toBe("stopped");
    // the epoch in flight still finishes
    expect(engine.seen).toEqual([1, 2, 3]);
    expect(engine.epochs.value).toBe(1);
    expect(engine.status).toBe("stopped");
  });

  it("consumes a stop so a later run continues", async () => {
    const engine = new Recorder({ name: "rec", batches: arraySource([1]) });
    engine.addHook(EngineEvent.EpochEnd, new Hook(new GEqThan(engine.epochs, 2), action(() => engine.stop())));

    expect(await run(engine.run())).toBe("stopped");
    expect(engine.epochs.value).toBe(2);
    expect(engine.stopping).toBe(false);
    expect(await run(engine.run())).toBe("stopped");
    expect(engine.epochs.value).toBe(3);
  });

  it("ends exhausted when the source yields nothing", async () => {
    const engine = new Recorder({ name: "rec", batches: emptySource });
    const log: string[] = [];
    trace(engine, log);
    expect(await run(engine.run())).toBe("exhausted");
    expect(engine.epochs.value).toBe(0);
    expect(log).toEqual(["start:0:0", "epochStart:0:0", "end:0:0"]);
  });

  it("passes each epoch number to the source", async () => {
    const source = arraySource([1]);
    const engine = new Recorder({ name: "rec", batches: source, maxEpochs: 3 });
    await run(engine.run());
    expect(source.epochsServed).toEqual([0, 1, 2]);
  });

  it("reports a failing batch with its ids, epoch and iteration", async () => {
    const engine = new Recorder({ name: "rec", batches: arraySource([1, 2, 3, 4], 2), maxEpochs: 2 });
    engine.failOn = 4;
    const lines: CapturedLine[] = [];
    const error = await runFail(engine.run(), captureLogging(lines));

    expect(error).toBeInstanceOf(BatchError);
    if (!(error instanceof BatchError)) return;
    expect(error.batchIds).toEqual(["b2", "b3"]);
    expect(error.epoch).toBe(1);
    expect(error.iteration).toBe(2);
    expect(error.message).toBe("rec: batch [b2, b3] failed at epoch 1, iteration 2: bad sample");
    expect(lines.filter((l) => l.level === "ERROR").map((l) => l.message)).toEqual([error.message]);
    expect(engine.iterations.value).toBe(1);
  });

  it("marks a failed run and forgets a stop requested during it", async () => {
    const engine = new Recorder({ name: "rec", batches: arraySource([1, 2]), maxEpochs: 1 });
    let armed = true;
    engine.addHook(EngineEvent.IterationEnd, new Hook(new Always(), action(() => {
      if (armed) {
        armed = false;
        engine.stop();
      }
    })));
    engine.failOn = 2;
    expect(await runFail(engine.run())).toBeInstanceOf(BatchError);
    expect(engine.status).toBe("failed");
    expect(engine.stopping).toBe(false);

    engine.failOn = undefined;
    expect(await run(engine.run())).toBe("exhausted");
    expect(engine.seen).toEqual([1, 1, 2]);
  });

  it("terminates the run when a hook fails", async () => {
    const engine = new Recorder({ name: "rec", batches: arraySource([1]), maxEpochs: 5 });
    engine.addHook(EngineEvent.EpochEnd, new Hook(
      new Always(),
      named("explode", action(() => { throw new Error("hook broke"); })),
    ));
    const error = await runFail(engine.run());
    expect(error).toBeInstanceOf(HookError);
    expect(engine.epochs.value).toBe(1);
  });

  it("round-trips counters and hook state", async () => {
    const make = () => {
      const e = new Recorder({ name: "rec", batches: arraySource([1, 2]), maxEpochs: 2 });
      e.addHook(EngineEvent.EpochEnd, new Hook(new Always(), action(() => {}), "noop"));
      return e;
    };
    const a = make();
    await run(a.run());
    expect(a.stateDict()).toEqual({
      epochs: 2,
      iterations: 4,
      hooks: { epochEnd: [{ hook: "noop", condition: null }] },
    });

    const b = make();
    b.loadStateDict(a.stateDict());
    expect(b.epochs.value).toBe(2);
    expect(b.iterations.value).toBe(4);
    expect(await run(b.run())).toBe("exhausted");
    expect(b.seen).toEqual([]);
  });

  it("refuses state whose hooks do not match", () => {
    const a = new Recorder({ name: "rec", batches: emptySource });
    a.addHook(EngineEvent.Start, new Hook(new Always(), action(() => {}), "greet"));
    const b = new Recorder({ name: "rec", batches: emptySource });
    expect(() => b.loadStateDict(a.stateDict())).toThrow(StateError);
    expect(() => a.loadStateDict(b.stateDict())).toThrow(StateError);
  });
});
