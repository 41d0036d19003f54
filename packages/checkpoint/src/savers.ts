/**
 * Savers write one checkpoint record per call under `<directory>/<name>[-<suffix>].ckpt`.
 */
import { Effect } from "effect";
import * as path from "node:path";
import {
  CheckpointError, ConfigError, describeCause, tensorMapToState,
  type Module, type StateDict, type Stateful,
} from "@lockstep/core";
import { CHECKPOINT_EXTENSION, writeCheckpoint } from "./format.js";

export function checkpointFileName(name: string, suffix?: string | number): string {
  return suffix === undefined ? `${name}${CHECKPOINT_EXTENSION}` : `${name}-${suffix}${CHECKPOINT_EXTENSION}`;
}

export interface Saver {
  readonly directory: string;
  /** Logical record name, shared by every suffix. */
  readonly name: string;
  pathFor(suffix?: string | number): string;
  /** Write a record. Succeeds with its path. */
  save(suffix?: string | number): Effect.Effect<string, CheckpointError>;
}

export class CheckpointSaver implements Saver {
  readonly directory: string;
  readonly name: string;
  private readonly source: () => StateDict;

  constructor(directory: string, name: string, source: () => StateDict) {
    if (name.length === 0 || name.includes("/") || name.includes(path.sep)) {
      throw new ConfigError({ message: `checkpoint name must be a non-empty file name, got "${name}"` });
    }
    this.directory = directory;
    this.name = name;
    this.source = source;
  }

  pathFor(suffix?: string | number): string {
    return path.join(this.directory, checkpointFileName(this.name, suffix));
  }

  save(suffix?: string | number): Effect.Effect<string, CheckpointError> {
    return Effect.gen(this, function* () {
      const file = this.pathFor(suffix);
      const state = yield* Effect.try({
        try: () => this.source(),
        catch: (e) => new CheckpointError({
          message: `collecting state for ${file} failed: ${describeCause(e)}`,
          path: file,
          cause: e,
        }),
      });
      yield* writeCheckpoint(file, state);
      yield* Effect.logInfo(`saved checkpoint ${file}`);
      return file;
    });
  }
}

/** Saves the full state of a Stateful (typically the Experiment) for exact resumption. */
export class StateCheckpointSaver extends CheckpointSaver {
  constructor(directory: string, name: string, target: Stateful) {
    super(directory, name, () => target.stateDict());
  }
}

/** Saves model parameters only, under the `model` key. */
export class ModelCheckpointSaver extends CheckpointSaver {
  constructor(directory: string, name: string, model: Module) {
    super(directory, name, () => ({ model: tensorMapToState(model.parameters()) }));
  }
}
