/**
 * Command: lockstep train
 *
 * Fits a linear model to a synthetic regression task under the standard
 * checkpoint / early-stop / horizon policy. Re-running with the same --runDir
 * and --resume continues where the previous run stopped.
 */
import { Effect } from "effect";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { hashConfig, type TrainConfig } from "@lockstep/core";
import { loggingLayer, parseLogLevel } from "@lockstep/effect-runtime";
import { DataLoader, Evaluator, RunningAverageMeter, Trainer } from "@lockstep/engine";
import { ModelCheckpointLoader } from "@lockstep/checkpoint";
import { Experiment, configureTraining, resumeExperiment } from "@lockstep/experiment";
import {
  Linear, collateRegression, createOptimizerRegistry, mseStep, syntheticRegression,
  type RegressionBatch, type RegressionSample,
} from "@lockstep/nn";
import { boolArg, floatArg, intArg, loadConfig, parseKV, strArg } from "../parse.js";

const VALID_LOSS = "valid loss";

export async function trainCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await loadConfig(kv);
  const samples = intArg(kv, "samples", 512);
  const features = intArg(kv, "features", 8);
  const noise = floatArg(kv, "noise", 0.1);
  const initModel = strArg(kv, "initModel", "");
  const strictResume = boolArg(kv, "strictResume", true);

  const task = syntheticRegression({ samples, features, noise, seed: config.seed });
  const split = Math.max(1, Math.floor(task.samples.length * 0.8));
  const trainItems = task.samples.slice(0, split);
  const validItems = task.samples.slice(split);

  const trainData = new DataLoader<RegressionSample, RegressionBatch>({
    items: trainItems,
    batchSize: config.batchSize,
    collate: collateRegression(),
    id: (s) => s.id,
    shuffle: true,
    samplesPerEpoch: config.samplesPerEpoch,
    seed: config.seed,
    numWorkers: config.numWorkers,
    prefetch: config.prefetch,
  });
  const validData = new DataLoader<RegressionSample, RegressionBatch>({
    items: validItems,
    batchSize: config.validBatchSize,
    collate: collateRegression(),
    id: (s) => s.id,
    seed: config.seed,
  });

  const model = new Linear("linear", { inFeatures: features, outFeatures: 1, seed: config.seed });
  const optimizer = createOptimizerRegistry().get(config.optimizer, { lr: config.lr, momentum: config.momentum });

  const trainer = new Trainer({
    name: "trainer",
    batches: trainData,
    model,
    optimizer,
    step: (_model, batch) => mseStep(model, batch),
    iterationsPerUpdate: config.iterationsPerUpdate,
  });
  const evaluator = new Evaluator({
    name: "evaluator",
    batches: validData,
    step: (batch) => mseStep(model, batch).loss,
  });
  const validLoss = evaluator.track(
    new RunningAverageMeter(VALID_LOSS),
    (meter, loss: number, batch) => meter.add(loss, batch.ids.length),
  );

  const experiment = new Experiment({
    trainer,
    evaluator,
    metrics: { [VALID_LOSS]: () => validLoss.value },
  });
  configureTraining(experiment, {
    directory: config.runDir,
    keep: config.checkpointKeep,
    checkpointEvery: config.checkpointEvery,
    bestOn: [VALID_LOSS],
    earlyStop: config.earlyStopPatience === null ? null : { metric: VALID_LOSS, patience: config.earlyStopPatience },
    maxEpochs: config.maxEpochs,
  });

  await writeRunConfig(config, { samples, features, noise });

  const program = Effect.gen(function* () {
    const hash = hashConfig(config);
    yield* Effect.logInfo(
      `run ${config.runDir} (config ${hash}): ${trainItems.length} train / ${validItems.length} valid samples, ` +
      `optimizer=${optimizer.name} lr=${config.lr}`,
    );
    if (initModel) yield* new ModelCheckpointLoader(model).load(initModel);
    if (config.resume !== null) yield* resumeExperiment(experiment, config.runDir, config.resume, { strict: strictResume });

    const status = yield* experiment.run();
    const best = experiment.metric(VALID_LOSS).values();
    yield* Effect.logInfo(
      `${status} after ${trainer.epochs.value} epoch(s); best ${VALID_LOSS}=` +
      `${best.length > 0 ? Math.min(...best).toFixed(4) : "n/a"}`,
    );
  });

  await Effect.runPromise(program.pipe(Effect.provide(loggingLayer(parseLogLevel(config.logLevel)))));
}

async function writeRunConfig(config: TrainConfig, task: Record<string, number>): Promise<void> {
  await fs.mkdir(config.runDir, { recursive: true });
  const body = { config, task, configHash: hashConfig(config) };
  await fs.writeFile(path.join(config.runDir, "config.json"), JSON.stringify(body, null, 2) + "\n");
}
