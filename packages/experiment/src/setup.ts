/**
 * Standard checkpoint / stopping policy for an Experiment, expressed as hooks
 * on its trainer.
 *
 * epochEnd hooks, in firing order:
 *   1. `new lowest <metric>` for every metric in `bestOn`: marks its record due
 *   2. early stop after `patience` evaluations without a new minimum
 *   3. stop once `maxEpochs` epochs have completed
 *   4. `save lowest`: writes the `lowest-<metric>` records marked due
 *   5. rolling `epoch-<n>` save every `checkpointEvery` epochs
 * Both saves come after every condition has seen this epoch, so any record
 * resumes the same decision history. The horizon check also runs on `start`,
 * so a run resumed past its horizon stops before training another epoch.
 *
 * Hook names carry no thresholds: a run may be resumed with a different
 * horizon, patience or save period.
 */
import { Effect } from "effect";
import {
  ConfigError, positiveInt, type CheckpointError, type LoadOptions, type StateError,
} from "@lockstep/core";
import { EngineEvent } from "@lockstep/engine";
import {
  Always, ConsecutiveNonDecreasing, GEqThan, Hook, Lowest, MultipleOf, action, effectAction,
} from "@lockstep/hooks";
import { RollingSaver, StateCheckpointLoader, StateCheckpointSaver } from "@lockstep/checkpoint";
import type { Experiment } from "./experiment.js";

export interface TrainingPolicy {
  readonly directory: string;
  /** Rolling epoch checkpoints to retain. */
  readonly keep: number;
  /** null disables rolling saves. */
  readonly checkpointEvery: number | null;
  /** Metrics whose new minimum triggers a `lowest-<metric>` save. */
  readonly bestOn?: readonly string[];
  /** null disables early stopping. */
  readonly earlyStop?: { readonly metric: string; readonly patience: number } | null;
  /** null means no horizon. */
  readonly maxEpochs: number | null;
}

export interface ConfiguredTraining {
  readonly rolling: RollingSaver | null;
  readonly best: ReadonlyMap<string, StateCheckpointSaver>;
}

/** File-name friendly form of a metric name: "valid cer" → "valid-cer". */
export function metricSlug(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
}

export function configureTraining<T, V, R>(
  experiment: Experiment<T, V, R>,
  policy: TrainingPolicy,
): ConfiguredTraining {
  positiveInt("keep", policy.keep);
  if (policy.checkpointEvery !== null) positiveInt("checkpointEvery", policy.checkpointEvery);
  if (policy.maxEpochs !== null) positiveInt("maxEpochs", policy.maxEpochs);
  if (policy.earlyStop) positiveInt("patience", policy.earlyStop.patience);
  const bestOn = policy.bestOn ?? [];
  // Resolve every metric up front so a typo fails before anything is registered.
  const bestStreams = bestOn.map((m) => experiment.observe(m));
  const stopOn = policy.earlyStop ? experiment.observe(policy.earlyStop.metric) : null;

  const slugs = bestOn.map((metric) => {
    const slug = metricSlug(metric);
    if (slug.length === 0) throw new ConfigError({ message: `metric "${metric}" has no usable file name` });
    return slug;
  });

  const trainer = experiment.trainer;
  const best = new Map<string, StateCheckpointSaver>();
  // Metrics that reached a new minimum this epoch, in bestOn order
  const due = new Set<string>();
  bestOn.forEach((metric, i) => {
    best.set(metric, new StateCheckpointSaver(policy.directory, `lowest-${slugs[i]}`, experiment));
    trainer.addHook(
      EngineEvent.EpochEnd,
      new Hook(new Lowest(bestStreams[i]), action(() => { due.add(metric); }), `new lowest ${metric}`),
    );
  });

  if (policy.earlyStop && stopOn) {
    const { metric, patience } = policy.earlyStop;
    trainer.addHook(
      EngineEvent.EpochEnd,
      new Hook(
        new ConsecutiveNonDecreasing(stopOn, patience),
        effectAction((ctx) => Effect.gen(function* () {
          yield* Effect.logInfo(`no new minimum of ${metric} in ${patience} evaluation(s), stopping after epoch ${ctx.epoch}`);
          trainer.stop();
        })),
        "early stop",
      ),
    );
  }

  if (policy.maxEpochs !== null) {
    const horizon = policy.maxEpochs;
    const stopAtHorizon = () => new Hook(
      new GEqThan(trainer.epochs, horizon),
      action(() => trainer.stop()),
      "stop at horizon",
    );
    trainer.addHook(EngineEvent.Start, stopAtHorizon());
    trainer.addHook(EngineEvent.EpochEnd, stopAtHorizon());
  }

  if (best.size > 0) {
    trainer.addHook(
      EngineEvent.EpochEnd,
      new Hook(
        new Always(),
        effectAction(() =>
          Effect.forEach([...best].filter(([metric]) => due.has(metric)), ([, saver]) => saver.save(), {
            discard: true,
          }).pipe(Effect.ensuring(Effect.sync(() => due.clear())))),
        "save lowest",
      ),
    );
  }

  let rolling: RollingSaver | null = null;
  if (policy.checkpointEvery !== null) {
    const saver = new RollingSaver(new StateCheckpointSaver(policy.directory, "epoch", experiment), {
      keep: policy.keep,
    });
    rolling = saver;
    trainer.addHook(
      EngineEvent.EpochEnd,
      new Hook(
        new MultipleOf(trainer.epochs, policy.checkpointEvery),
        effectAction((ctx) => saver.save(ctx.epoch)),
        "rolling save",
      ),
    );
  }

  return { rolling, best };
}

/**
 * Restore `experiment` from the newest record matching `pattern` under
 * `directory`. Call after configureTraining: hook state is matched against the
 * registered hooks. Succeeds with the restored path, or undefined on a fresh start.
 * A rejected record leaves the experiment untouched.
 */
export function resumeExperiment<T, V, R>(
  experiment: Experiment<T, V, R>,
  directory: string,
  pattern: string,
  options: LoadOptions = {},
): Effect.Effect<string | undefined, CheckpointError | StateError> {
  return new StateCheckpointLoader(experiment, options).resume(directory, pattern);
}
