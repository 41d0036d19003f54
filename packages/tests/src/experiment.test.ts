import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EngineEvent, Evaluator, RunningAverageMeter, Trainer } from "@lockstep/engine";
import { Always, Hook, action } from "@lockstep/hooks";
import { Experiment, configureTraining, metricSlug, resumeExperiment, type TrainingPolicy } from "@lockstep/experiment";
import { ConfigError, StateError } from "@lockstep/core";
import { captureLogging, type CapturedLine } from "@lockstep/effect-runtime";
import { RecordingOptimizer, ScalarModel, arraySource, listNames, meanStep, removeDir, run, runFail, tempDir } from "./helpers.js";

/**
 * Two batches per epoch ([1, 2] and [3, 4]); "valid loss" reads the scripted
 * value for the epoch just completed.
 */
function build(script: readonly number[], policy: TrainingPolicy, init: number[] = [0]) {
  const model = new ScalarModel({ w: init });
  const optimizer = new RecordingOptimizer(0.1);
  const trainer = new Trainer({
    name: "train",
    batches: arraySource([1, 2, 3, 4], 2),
    model,
    optimizer,
    step: meanStep("w"),
  });
  const experiment = new Experiment({
    trainer,
    metrics: { "valid loss": () => script[trainer.epochs.value - 1] },
  });
  const configured = configureTraining(experiment, policy);
  return { model, optimizer, trainer, experiment, configured };
}

describe("Experiment with a training policy", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const policy = (overrides: Partial<TrainingPolicy> = {}): TrainingPolicy => ({
    directory: dir,
    keep: 2,
    checkpointEvery: 1,
    bestOn: ["valid loss"],
    earlyStop: { metric: "valid loss", patience: 2 },
    maxEpochs: null,
    ...overrides,
  });

  it("stops early after `patience` evaluations without a new minimum", async () => {
    const { experiment, trainer } = build([5, 4, 4.5, 4.2, 1], policy());
    expect(await run(experiment.run())).toBe("stopped");

    expect(trainer.epochs.value).toBe(4);
    expect(experiment.metric("valid loss").values()).toEqual([5, 4, 4.5, 4.2]);
    expect(experiment.metric("train loss").values()).toEqual([2.5, 2.5, 2.5, 2.5]);
    expect(await listNames(dir)).toEqual(["epoch-3.ckpt", "epoch-4.ckpt", "lowest-valid-loss.ckpt"]);
  });

  it("stops at the horizon", async () => {
    const { experiment, trainer } = build([3, 2, 1, 0], policy({ maxEpochs: 3, checkpointEvery: null, earlyStop: null }));
    expect(await run(experiment.run())).toBe("stopped");
    expect(trainer.epochs.value).toBe(3);
    expect(await listNames(dir)).toEqual(["lowest-valid-loss.ckpt"]);
  });

  it("logs one summary line per epoch", async () => {
    const { experiment } = build([5], policy({ maxEpochs: 1, checkpointEvery: null, earlyStop: null, bestOn: [] }));
    const lines: CapturedLine[] = [];
    await run(experiment.run(), captureLogging(lines));
    const summaries = lines.filter((l) => l.message.startsWith("epoch "));
    expect(summaries).toHaveLength(1);
    expect(summaries[0].message).toMatch(/^epoch 1 \| train loss=2\.5000 \| valid loss=5\.0000 \| \d+ms$/);
  });

  it("resumes an interrupted run to the same result as an uninterrupted one", async () => {
    const script = [5, 4, 3, 2, 1];
    const referenceDir = `${dir}/reference`;
    const reference = build(script, { ...policy({ maxEpochs: 5 }), directory: referenceDir });
    expect(await run(reference.experiment.run())).toBe("stopped");
    expect(reference.trainer.epochs.value).toBe(5);
    expect(reference.model.values("w")[0]).toBeCloseTo(-5, 4);

    const interrupted = build(script, policy({ maxEpochs: 3 }));
    await run(interrupted.experiment.run());
    expect(await listNames(dir)).toEqual(["epoch-2.ckpt", "epoch-3.ckpt", "lowest-valid-loss.ckpt", "reference"]);

    const resumed = build(script, policy({ maxEpochs: 5 }));
    const from = await run(resumeExperiment(resumed.experiment, dir, "epoch-*.ckpt"));
    expect(from).toBe(`${dir}/epoch-3.ckpt`);
    expect(resumed.trainer.epochs.value).toBe(3);

    expect(await run(resumed.experiment.run())).toBe("stopped");
    expect(resumed.trainer.epochs.value).toBe(5);
    expect(resumed.model.values("w")).toEqual(reference.model.values("w"));
    expect(resumed.experiment.metric("valid loss").values()).toEqual(script);
    expect(resumed.optimizer.stateDict().step).toBe(reference.optimizer.stateDict().step);
    expect(await listNames(dir)).toEqual(["epoch-4.ckpt", "epoch-5.ckpt", "lowest-valid-loss.ckpt", "reference"]);
  });

  it("does not train again when resumed at its horizon", async () => {
    const first = build([3, 2], policy({ maxEpochs: 2 }));
    await run(first.experiment.run());

    const again = build([3, 2], policy({ maxEpochs: 2 }));
    await run(resumeExperiment(again.experiment, dir, "epoch-*.ckpt"));
    expect(await run(again.experiment.run())).toBe("stopped");
    expect(again.trainer.epochs.value).toBe(2);
    expect(again.optimizer.steps).toEqual([]);
  });

  it("starts fresh when no checkpoint matches", async () => {
    const fresh = build([1], policy({ maxEpochs: 1 }));
    expect(await run(resumeExperiment(fresh.experiment, dir, "epoch-*.ckpt"))).toBeUndefined();
    expect(fresh.trainer.epochs.value).toBe(0);
  });

  it("refuses to resume under a different hook layout", async () => {
    const first = build([3, 2], policy({ maxEpochs: 2 }));
    await run(first.experiment.run());

    const changed = build([3, 2], policy({ maxEpochs: 2, earlyStop: null }));
    const error = await runFail(resumeExperiment(changed.experiment, dir, "epoch-*.ckpt"));
    expect(error).toBeInstanceOf(StateError);
    expect(changed.trainer.epochs.value).toBe(0);
  });

  it("leaves the experiment untouched when the saved model does not fit", async () => {
    const first = build([3, 2], policy({ maxEpochs: 2 }));
    await run(first.experiment.run());

    const wider = build([3, 2], policy({ maxEpochs: 2 }), [0, 0]);
    const before = wider.experiment.stateDict();
    const error = await runFail(resumeExperiment(wider.experiment, dir, "epoch-*.ckpt"));

    expect(error).toBeInstanceOf(StateError);
    expect(error.message).toBe(
      `cannot restore ${dir}/epoch-2.ckpt: parameters of "scalars" do not match: w: saved [1] vs model [2]`,
    );
    expect(wider.trainer.epochs.value).toBe(0);
    expect(wider.experiment.stateDict()).toEqual(before);
  });

  it("resumes from the lowest-metric record to the same stopping epoch", async () => {
    const script = [5, 3, 4, 4, 4, 4, 4];
    const settings = { checkpointEvery: null, maxEpochs: null };
    const reference = build(script, { ...policy(settings), directory: `${dir}/reference` });
    expect(await run(reference.experiment.run())).toBe("stopped");
    expect(reference.trainer.epochs.value).toBe(4);

    const first = build(script, policy(settings));
    await run(first.experiment.run());
    const resumed = build(script, policy(settings));
    const from = await run(resumeExperiment(resumed.experiment, dir, "lowest-*.ckpt"));
    expect(from).toBe(`${dir}/lowest-valid-loss.ckpt`);
    expect(resumed.trainer.epochs.value).toBe(2);

    expect(await run(resumed.experiment.run())).toBe("stopped");
    expect(resumed.trainer.epochs.value).toBe(4);
    expect(resumed.experiment.metric("valid loss").values()).toEqual([5, 3, 4, 4]);
    expect(resumed.model.values("w")).toEqual(reference.model.values("w"));
  });

  it("validates metric names before registering anything", () => {
    const model = new ScalarModel({ w: [0] });
    const trainer = new Trainer({
      name: "train", batches: arraySource([1]), model, optimizer: new RecordingOptimizer(), step: meanStep("w"),
    });
    const experiment = new Experiment({ trainer });
    expect(() => configureTraining(experiment, policy({ bestOn: ["valid loss"] }))).toThrow(ConfigError);
    expect(trainer.hookList(EngineEvent.EpochEnd).size).toBe(0);
    expect(() => experiment.metric("nope")).toThrow('Unknown metric "nope". Available: train loss');
  });
});

describe("Experiment", () => {
  function trainer() {
    return new Trainer({
      name: "train",
      batches: arraySource([1, 2]),
      model: new ScalarModel({ w: [0] }),
      optimizer: new RecordingOptimizer(),
      step: meanStep("w"),
      maxEpochs: 4,
    });
  }

  it("reserves the train loss metric name", () => {
    expect(() => new Experiment({ trainer: trainer(), metrics: { "train loss": () => 1 } })).toThrow(ConfigError);
  });

  it("evaluates every N epochs and exposes values only on evaluation epochs", async () => {
    const evaluator = new Evaluator({
      name: "valid",
      batches: arraySource([1, 2]),
      step: (batch) => batch.data[0],
    });
    const loss = evaluator.track(new RunningAverageMeter("valid loss"), (m, r) => m.add(r));
    const t = trainer();
    const experiment = new Experiment({
      trainer: t,
      evaluator,
      metrics: { "valid loss": () => loss.value },
      evaluateEvery: 2,
    });
    const observed = experiment.observe("valid loss");
    const seen: (number | null)[] = [];
    t.addHook(EngineEvent.EpochEnd, new Hook(new Always(), action(() => { seen.push(observed.latest() ?? null); })));

    expect(await run(experiment.run())).toBe("exhausted");
    expect(seen).toEqual([null, 1.5, null, 1.5]);
    expect(experiment.metric("valid loss").values()).toEqual([1.5, 1.5]);
    expect(evaluator.epochs.value).toBe(2);
    expect(experiment.stateDict()["evaluator"]).toEqual({ epochs: 2, iterations: 4, hooks: {} });
  });

  it("round-trips metric history", async () => {
    const a = new Experiment({ trainer: trainer(), metrics: { acc: () => 0.5 } });
    await run(a.run());
    const b = new Experiment({ trainer: trainer(), metrics: { acc: () => 0.5 } });
    b.loadStateDict(a.stateDict());
    expect(b.metric("acc").values()).toEqual([0.5, 0.5, 0.5, 0.5]);
    expect(b.metric("train loss").values()).toEqual([1.5, 1.5, 1.5, 1.5]);
    expect(b.trainer.epochs.value).toBe(4);

    const c = new Experiment({ trainer: trainer() });
    expect(() => c.loadStateDict(a.stateDict())).toThrow('saved metric "acc" is not defined');
  });

  it("slugs metric names for file names", () => {
    expect(metricSlug("valid loss")).toBe("valid-loss");
    expect(metricSlug(" Valid CER (greedy) ")).toBe("valid-cer-greedy");
  });
});
