/**
 * Loaders read checkpoint records back. None of them touches rotation state.
 */
import { Effect } from "effect";
import {
  StateError, describeCause, getDict, getTensorMap, isStateDict, restoreParams,
  type CheckpointError, type LoadOptions, type Module, type RestoreReport, type StateDict, type Stateful,
  type TensorData,
} from "@lockstep/core";
import { readCheckpoint } from "./format.js";
import { resolveCheckpoint } from "./resolve.js";

function asStateError(context: string) {
  return (e: unknown): StateError =>
    e instanceof StateError
      ? new StateError({ message: `${context}: ${e.message}`, cause: e })
      : new StateError({ message: `${context}: ${describeCause(e)}`, cause: e });
}

/** Log each parameter a non-strict load dropped or could not fill. */
function logRestoreReport(report: RestoreReport, file: string): Effect.Effect<void> {
  return Effect.gen(function* () {
    for (const d of report.dropped) {
      yield* Effect.logWarning(
        d.reason === "shape"
          ? `dropped "${d.name}": checkpoint shape [${d.saved.join(", ")}] vs model [${(d.expected ?? []).join(", ")}]`
          : `dropped "${d.name}": not a parameter of ${report.module}`,
      );
    }
    for (const name of report.missing) {
      yield* Effect.logWarning(`"${name}" is not in ${file}, keeping its current value`);
    }
  });
}

/** Raw state trees. */
export class CheckpointLoader {
  load(file: string): Effect.Effect<StateDict, CheckpointError> {
    return readCheckpoint(file).pipe(Effect.tap(() => Effect.logDebug(`read checkpoint ${file}`)));
  }

  /** Load the record `pattern` resolves to, or undefined when nothing matches. */
  loadMatching(
    directory: string,
    pattern: string,
  ): Effect.Effect<{ path: string; state: StateDict } | undefined, CheckpointError> {
    return Effect.gen(this, function* () {
      const resolved = yield* resolveCheckpoint(directory, pattern);
      if (resolved._tag === "NoMatch") return undefined;
      const state = yield* this.load(resolved.path);
      return { path: resolved.path, state };
    });
  }
}

/**
 * Full-state restore into a Stateful. Strict by default: any mismatch fails the
 * load and leaves the target as it was. With `strict: false` model parameters
 * that no longer fit are dropped and logged, and everything else is restored.
 */
export class StateCheckpointLoader {
  private readonly raw = new CheckpointLoader();

  constructor(private readonly target: Stateful, private readonly options: LoadOptions = {}) {}

  load(file: string): Effect.Effect<RestoreReport | undefined, CheckpointError | StateError> {
    return Effect.gen(this, function* () {
      const state = yield* this.raw.load(file);
      const report = yield* Effect.try({
        try: () => {
          const report = this.target.loadStateDict(state, this.options);
          return report ? report : undefined;
        },
        catch: asStateError(`cannot restore ${file}`),
      });
      if (report) yield* logRestoreReport(report, file);
      yield* Effect.logInfo(`restored training state from ${file}`);
      return report;
    });
  }

  /**
   * Restore from the record `pattern` resolves to. Succeeds with its path, or
   * with undefined (fresh start, target untouched) when nothing matches.
   */
  resume(directory: string, pattern: string): Effect.Effect<string | undefined, CheckpointError | StateError> {
    return Effect.gen(this, function* () {
      const resolved = yield* resolveCheckpoint(directory, pattern);
      if (resolved._tag === "NoMatch") {
        yield* Effect.logInfo(`no checkpoint matches "${pattern}" in ${directory}, starting fresh`);
        return undefined;
      }
      yield* this.load(resolved.path);
      return resolved.path;
    });
  }
}

/** Parameters are read from `model`, or from `trainer.model` in a full training state. */
export function modelParams(state: StateDict): Map<string, TensorData> {
  if (isStateDict(state["model"])) return getTensorMap(state, "model");
  const trainer = state["trainer"];
  if (isStateDict(trainer) && isStateDict(trainer["model"])) return getTensorMap(getDict(state, "trainer"), "model");
  throw new StateError({ message: "checkpoint holds no model parameters" });
}

/**
 * Weights-only load (initialising from another run, fine-tuning). Non-strict by
 * default: tensors whose shape differs or that the module lacks are dropped and
 * logged, parameters the record lacks keep their current values.
 */
export class ModelCheckpointLoader {
  private readonly raw = new CheckpointLoader();

  constructor(private readonly module: Module, private readonly strict = false) {}

  load(file: string): Effect.Effect<RestoreReport, CheckpointError | StateError> {
    return Effect.gen(this, function* () {
      const state = yield* this.raw.load(file);
      const report = yield* Effect.try({
        try: () => restoreParams(this.module, modelParams(state), this.strict),
        catch: asStateError(`cannot load model from ${file}`),
      });
      yield* logRestoreReport(report, file);
      yield* Effect.logInfo(
        `loaded ${report.loaded.length} parameter(s) of ${this.module.name} from ${file}`,
      );
      return report;
    });
  }
}
